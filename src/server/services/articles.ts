/**
 * Article service: saving articles from URLs, marking them read, and
 * summarizing them.
 */

import { randomUUID } from "node:crypto";

import { errorMessage, logger } from "@/lib/logger";
import type { Article } from "@/lib/types/article";
import { normalizeArticleUrl, stripFragment } from "@/lib/url";
import { InvalidUrlError } from "@/server/extraction/errors";
import { extractArticle, type ExtractArticleOptions } from "@/server/extraction/extractor";
import type { ReadingStore } from "@/server/storage/types";
import { truncateForSummarization, type Summarizer } from "./summarization";

/**
 * Extracts an article from a URL and saves it.
 *
 * @throws ExtractionError when extraction fails; nothing is saved
 */
export async function saveArticleFromUrl(
  store: ReadingStore,
  input: string,
  options: ExtractArticleOptions = {}
): Promise<Article> {
  const url = normalizeArticleUrl(input);
  if (!url) {
    throw new InvalidUrlError(input);
  }

  const { title, content } = await extractArticle(url.href, options);

  const article = await store.createArticle({
    id: randomUUID(),
    url: stripFragment(url.href),
    title,
    content,
    dateAdded: new Date(),
  });

  logger.info("Saved article", { articleId: article.id, url: article.url });
  return article;
}

/**
 * Records that an article was opened.
 *
 * @returns The updated article, or null if it doesn't exist
 */
export async function markArticleRead(
  store: ReadingStore,
  articleId: string,
  readAt: Date = new Date()
): Promise<Article | null> {
  return store.updateArticle(articleId, { lastRead: readAt });
}

/**
 * Generates and stores a summary for an article.
 *
 * Failures are logged and leave the summary unset.
 *
 * @returns The summary, or null if the article is missing or summarization failed
 */
export async function summarizeArticle(
  store: ReadingStore,
  summarizer: Summarizer,
  articleId: string
): Promise<string | null> {
  const article = await store.getArticle(articleId);
  if (!article) {
    logger.warn("Cannot summarize missing article", { articleId });
    return null;
  }

  let summary: string;
  try {
    const content = truncateForSummarization(article.content);
    summary = (await summarizer.summarize(content, article.title)).trim();
  } catch (error) {
    logger.error("Failed to summarize article", { articleId, error: errorMessage(error) });
    return null;
  }

  if (!summary) {
    logger.warn("Summarizer returned an empty summary", { articleId });
    return null;
  }

  await store.updateArticle(articleId, { summary });
  logger.info("Summarized article", { articleId, words: summary.split(/\s+/).length });
  return summary;
}
