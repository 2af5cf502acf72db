/**
 * Text cleaning and the substantiality gate shared by every extraction strategy.
 */

import { elementText, selectAll, type HtmlElement } from "@/server/http/html";

/** Minimum characters for extracted text to count as an article. */
export const MIN_CONTENT_CHARS = 100;

/** Minimum whitespace-delimited tokens for extracted text to count as an article. */
export const MIN_CONTENT_WORDS = 20;

/**
 * Selector for the block elements whose text makes up an article body.
 */
const TEXT_BLOCK_SELECTOR = "p, h1, h2, h3, h4, h5, h6";

/**
 * Normalizes whitespace in extracted text.
 *
 * - runs of spaces/tabs become one space
 * - three or more newlines become exactly two
 * - every line is trimmed, then the whole result
 */
export function cleanText(text: string): string {
  return text
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
}

/**
 * Counts whitespace-delimited tokens.
 */
export function countTokens(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

/**
 * Whether text is long enough to be article content rather than a stub.
 */
export function isSubstantialContent(text: string): boolean {
  return text.length >= MIN_CONTENT_CHARS && countTokens(text) >= MIN_CONTENT_WORDS;
}

/**
 * Extracts readable text from a container element.
 *
 * Paragraph and heading descendants are cleaned and joined with blank lines,
 * in document order. Containers without any fall back to their full text.
 */
export function extractTextContent(element: HtmlElement): string {
  const blocks = selectAll(element, TEXT_BLOCK_SELECTOR);

  if (blocks.length === 0) {
    return cleanText(elementText(element));
  }

  return blocks
    .map((block) => cleanText(elementText(block)))
    .filter((text) => text.length > 0)
    .join("\n\n");
}
