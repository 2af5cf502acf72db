/**
 * Article Extraction
 *
 * Turns a URL into `{ title, content }`:
 *
 * 1. Normalizes the URL (adds https:// when the scheme is missing)
 * 2. Routes hosts with a plugin (social posts via oEmbed) to that plugin
 * 3. Otherwise fetches the page with a browser User-Agent and decodes it
 *    (UTF-8, falling back to Latin-1)
 * 4. Extracts the title, strips boilerplate, and picks the content by
 *    text density, then known content selectors, then meta tags
 *
 * No strategy is retried; the first terminal failure is thrown as an
 * ExtractionError.
 */

import { logger } from "@/lib/logger";
import { normalizeArticleUrl } from "@/lib/url";
import { extractionConfig } from "@/server/config/env";
import { decodeHtmlBody, fetchHtmlPage } from "@/server/http/fetch";
import { parseDocument, type HtmlDocument } from "@/server/http/html";
import { pluginRegistry, registerPlugins, type PluginRegistry } from "@/server/plugins";
import type { ExtractedArticle } from "@/server/plugins/types";
import { DEFAULT_BOILERPLATE_PATTERNS, stripBoilerplate } from "./boilerplate";
import { findBestContentByDensity } from "./density";
import {
  InvalidUrlError,
  NoContentFoundError,
  ParsingError,
  toNetworkError,
} from "./errors";
import { extractMetaContent } from "./meta";
import { extractTextContent, isSubstantialContent } from "./text";
import { extractTitle } from "./title";

export type { ExtractedArticle } from "@/server/plugins/types";

/**
 * Known content containers, tried in order when density scoring finds nothing.
 */
export const CONTENT_SELECTORS = [
  "article",
  "main",
  '[role="main"]',
  ".gh-content",
  ".post-content",
  ".article-content",
  ".entry-content",
  ".content-body",
  ".article-body",
  ".prose",
  ".markdown-body",
  '[itemprop="articleBody"]',
];

/**
 * Which strategy produced the content.
 */
export type ExtractionStrategy = "density" | "selector" | "meta";

export interface ContentResult {
  content: string;
  strategy: ExtractionStrategy;
}

export interface ExtractHtmlOptions {
  /** class/id substrings to strip. Defaults to the built-in list plus configured extras. */
  boilerplatePatterns?: readonly string[];
}

export interface ExtractArticleOptions extends ExtractHtmlOptions {
  /** Aborting abandons the in-flight request. */
  signal?: AbortSignal;
  /** Plugin registry to route through. Defaults to the global registry with built-ins. */
  registry?: PluginRegistry;
}

function defaultBoilerplatePatterns(): string[] {
  return [...DEFAULT_BOILERPLATE_PATTERNS, ...extractionConfig.extraBoilerplatePatterns];
}

/**
 * Tries the known content selectors in order.
 */
function findContentBySelectors(document: HtmlDocument): ContentResult | null {
  for (const selector of CONTENT_SELECTORS) {
    try {
      const element = document.querySelector(selector);
      if (!element) {
        continue;
      }
      const content = extractTextContent(element);
      if (isSubstantialContent(content)) {
        return { content, strategy: "selector" };
      }
    } catch (error) {
      logger.debug("Content selector failed", {
        selector,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  return null;
}

/**
 * Picks the article content from an already-stripped document.
 *
 * @returns The content and the strategy that found it, or null when every strategy fails
 */
export function findContent(document: HtmlDocument): ContentResult | null {
  const dense = findBestContentByDensity(document);
  if (dense) {
    return { content: dense.content, strategy: "density" };
  }

  const bySelector = findContentBySelectors(document);
  if (bySelector) {
    return bySelector;
  }

  const meta = extractMetaContent(document);
  if (isSubstantialContent(meta)) {
    return { content: meta, strategy: "meta" };
  }

  return null;
}

/**
 * Extracts the title and content from a page's HTML.
 *
 * @throws ParsingError if the HTML cannot be parsed
 * @throws NoContentFoundError if no strategy finds substantial content
 */
export function extractArticleFromHtml(
  html: string,
  options: ExtractHtmlOptions = {}
): ExtractedArticle {
  let document: HtmlDocument;
  try {
    document = parseDocument(html);
  } catch (error) {
    throw new ParsingError(error);
  }

  const title = extractTitle(document);

  stripBoilerplate(document, options.boilerplatePatterns ?? defaultBoilerplatePatterns());

  const result = findContent(document);
  if (!result) {
    throw new NoContentFoundError();
  }

  logger.debug("Extracted article content", {
    strategy: result.strategy,
    characters: result.content.length,
  });

  return { title, content: result.content };
}

/**
 * Extracts an article from a URL.
 *
 * @param input - A URL, with or without scheme
 * @throws InvalidUrlError, NetworkError, ParsingError or NoContentFoundError
 *
 * @example
 * const { title, content } = await extractArticle("example.com/posts/hello");
 */
export async function extractArticle(
  input: string,
  options: ExtractArticleOptions = {}
): Promise<ExtractedArticle> {
  const url = normalizeArticleUrl(input);
  if (!url) {
    throw new InvalidUrlError(input);
  }

  let registry = options.registry;
  if (!registry) {
    registerPlugins();
    registry = pluginRegistry;
  }

  const plugin = registry.findWithCapability(url, "article");
  if (plugin) {
    logger.debug("Using plugin for article", { url: url.href, plugin: plugin.name });
    return plugin.capabilities.article.fetchArticle(url, { signal: options.signal });
  }

  let body: Buffer;
  try {
    body = await fetchHtmlPage(url.href, { signal: options.signal });
  } catch (error) {
    const networkError = toNetworkError(error);
    logger.warn("Failed to fetch article page", {
      url: url.href,
      status: networkError.status,
      error: networkError.message,
    });
    throw networkError;
  }

  const html = decodeHtmlBody(body);
  if (html === null) {
    throw new ParsingError(new Error("Could not decode page content"));
  }

  const article = extractArticleFromHtml(html, options);
  logger.info("Extracted article", { url: url.href, title: article.title });
  return article;
}
