/**
 * Text-density scoring.
 *
 * Scores every structural container by
 *
 *   ln(textLength) + 10 * paragraphCount - 50 * linkDensity
 *
 * which rewards long, paragraph-rich, link-sparse regions (article bodies)
 * over navigation and link farms. The weights are empirical and kept as-is.
 */

import { logger } from "@/lib/logger";
import { elementText, selectAll, type HtmlDocument, type HtmlElement } from "@/server/http/html";
import { extractTextContent, isSubstantialContent } from "./text";

/** Weight of each paragraph or heading descendant. */
export const PARAGRAPH_WEIGHT = 10;

/** Penalty multiplier for link density. */
export const LINK_DENSITY_PENALTY = 50;

/**
 * Containers considered by the density scan.
 */
const CANDIDATE_SELECTOR = "article, main, section, div";

const PARAGRAPH_SELECTOR = "p, h1, h2, h3, h4, h5, h6";

export interface ContentScore {
  score: number;
  textLength: number;
  paragraphCount: number;
  linkDensity: number;
}

/**
 * Computes the density score for a single element.
 */
export function scoreElement(element: HtmlElement): ContentScore {
  const textLength = [...elementText(element)].length;
  const paragraphCount = selectAll(element, PARAGRAPH_SELECTOR).length;

  const linkTextLength = selectAll(element, "a").reduce(
    (total, link) => total + [...elementText(link)].length,
    0
  );
  const linkDensity = textLength > 0 ? linkTextLength / textLength : 1.0;

  const lengthScore = textLength > 0 ? Math.log(textLength) : 0;
  const score = Math.max(
    0,
    lengthScore + paragraphCount * PARAGRAPH_WEIGHT - linkDensity * LINK_DENSITY_PENALTY
  );

  return { score, textLength, paragraphCount, linkDensity };
}

export interface DensityResult {
  content: string;
  score: number;
}

/**
 * Finds the highest-scoring container whose text passes the substantiality gate.
 *
 * A failure on one element only drops that candidate; the scan continues.
 *
 * @returns The winning container's text and score, or null when none is substantial
 */
export function findBestContentByDensity(document: HtmlDocument): DensityResult | null {
  let best: DensityResult | null = null;

  for (const element of selectAll(document, CANDIDATE_SELECTOR)) {
    try {
      const { score } = scoreElement(element);
      if (score <= (best?.score ?? 0)) {
        continue;
      }

      const content = extractTextContent(element);
      if (isSubstantialContent(content)) {
        best = { content, score };
      }
    } catch (error) {
      logger.debug("Skipping candidate that failed to score", {
        tagName: element.tagName,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return best;
}
