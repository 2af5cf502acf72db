/**
 * Meta-tag fallback for pages that render their body with JavaScript.
 */

import { attributeValue, type HtmlDocument } from "@/server/http/html";
import { cleanText } from "./text";

const TITLE_META = [
  'meta[property="og:title"]',
  'meta[name="twitter:title"], meta[property="twitter:title"]',
];

const DESCRIPTION_META = [
  'meta[property="og:description"]',
  'meta[name="twitter:description"], meta[property="twitter:description"]',
  'meta[name="description"]',
];

/**
 * Returns the content of the first meta tag in preference order that has one.
 */
function firstMetaContent(document: HtmlDocument, selectors: string[]): string | null {
  for (const selector of selectors) {
    const element = document.querySelector(selector);
    const content = element ? attributeValue(element, "content") : null;
    if (content) {
      return content;
    }
  }
  return null;
}

/**
 * Builds article text from social/SEO meta tags: title, a blank line, description.
 *
 * @returns The cleaned text, or an empty string when neither tag is present
 */
export function extractMetaContent(document: HtmlDocument): string {
  const parts = [firstMetaContent(document, TITLE_META), firstMetaContent(document, DESCRIPTION_META)];
  return cleanText(parts.filter((part): part is string => part !== null).join("\n\n"));
}
