/**
 * Article title extraction.
 */

import { elementText, type HtmlDocument } from "@/server/http/html";

export const UNTITLED_ARTICLE = "Untitled Article";

/**
 * Characters that separate an article title from the site name,
 * as in "Article Title | Site Name" or "Article Title - Site".
 */
const TITLE_SEPARATORS = /[|—–-]/;

/**
 * Extracts the article title.
 *
 * Prefers `<title>` up to the first separator, then the first `<h1>`,
 * then a placeholder.
 */
export function extractTitle(document: HtmlDocument): string {
  const titleElement = document.querySelector("title");
  if (titleElement) {
    const titleText = elementText(titleElement);
    if (titleText) {
      const cleaned = titleText.split(TITLE_SEPARATORS)[0].trim();
      if (cleaned) {
        return cleaned;
      }
    }
  }

  const h1 = document.querySelector("h1");
  if (h1) {
    const h1Text = elementText(h1);
    if (h1Text) {
      return h1Text;
    }
  }

  return UNTITLED_ARTICLE;
}
