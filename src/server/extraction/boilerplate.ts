/**
 * Boilerplate stripping.
 *
 * Removes elements that are never article text before any scoring happens.
 * Operates on (and mutates) a freshly parsed document.
 */

import { logger } from "@/lib/logger";
import { selectAll, type HtmlDocument } from "@/server/http/html";

/**
 * Tags that are removed outright.
 */
export const BOILERPLATE_TAGS = [
  "script",
  "style",
  "nav",
  "footer",
  "aside",
  "noscript",
  "iframe",
  "form",
] as const;

/**
 * Substrings which, found in an element's class or id, mark it as boilerplate.
 * Kept conservative: "content" or "header" would remove real articles.
 */
export const DEFAULT_BOILERPLATE_PATTERNS = [
  "sidebar",
  "comment",
  "newsletter",
  "popup",
  "modal",
  "promo",
  "sponsor",
] as const;

/**
 * Selectors for hidden elements.
 */
const HIDDEN_SELECTORS = [
  "[hidden]",
  '[style*="display:none"]',
  '[style*="display: none"]',
  '[aria-hidden="true"]',
];

/**
 * Removes every element matching a selector, tolerating selectors linkedom rejects.
 *
 * @returns The number of removed elements
 */
function removeAll(document: HtmlDocument, selector: string): number {
  try {
    const elements = selectAll(document, selector);
    for (const element of elements) {
      element.remove();
    }
    return elements.length;
  } catch (error) {
    logger.debug("Skipping boilerplate selector", {
      selector,
      error: error instanceof Error ? error.message : String(error),
    });
    return 0;
  }
}

/**
 * Strips scripts, navigation, denylisted and hidden elements from a document.
 *
 * @param document - The document to mutate
 * @param patterns - class/id substrings to remove (defaults to DEFAULT_BOILERPLATE_PATTERNS)
 * @returns The number of removed elements
 */
export function stripBoilerplate(
  document: HtmlDocument,
  patterns: readonly string[] = DEFAULT_BOILERPLATE_PATTERNS
): number {
  let removed = 0;

  for (const tag of BOILERPLATE_TAGS) {
    removed += removeAll(document, tag);
  }

  for (const pattern of patterns) {
    const escaped = pattern.replace(/["\\]/g, "\\$&");
    removed += removeAll(document, `[class*="${escaped}"]`);
    removed += removeAll(document, `[id*="${escaped}"]`);
  }

  for (const selector of HIDDEN_SELECTORS) {
    removed += removeAll(document, selector);
  }

  return removed;
}
