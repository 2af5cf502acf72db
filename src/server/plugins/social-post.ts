import { z } from "zod";
import { logger } from "@/lib/logger";
import { extractionConfig } from "@/server/config/env";
import { fetchJson } from "@/server/http/fetch";
import { elementText, parseDocument, selectAll } from "@/server/http/html";
import {
  NoContentFoundError,
  ParsingError,
  toNetworkError,
} from "@/server/extraction/errors";
import { cleanText } from "@/server/extraction/text";
import { UNTITLED_ARTICLE } from "@/server/extraction/title";
import type { ArticleFetchOptions, ExtractedArticle, UrlPlugin } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * The parts of an oEmbed response this plugin reads.
 * @see https://oembed.com/#section2.3
 */
const oembedResponseSchema = z.object({
  html: z.string(),
  author_name: z.string().optional(),
  author_url: z.string().optional(),
});

export type OEmbedResponse = z.infer<typeof oembedResponseSchema>;

// ============================================================================
// Constants
// ============================================================================

const BASE_HOSTS = ["twitter.com", "x.com"];

/**
 * Post hosts with and without the www./mobile. subdomains.
 */
export const SOCIAL_POST_HOSTS = BASE_HOSTS.flatMap((host) => [
  host,
  `www.${host}`,
  `mobile.${host}`,
]);

// ============================================================================
// Parsing
// ============================================================================

/**
 * Builds the oEmbed request URL for a post.
 */
export function buildOEmbedUrl(postUrl: URL, endpoint = extractionConfig.oembedEndpoint): string {
  const requestUrl = new URL(endpoint);
  requestUrl.searchParams.set("url", postUrl.href);
  requestUrl.searchParams.set("omit_script", "true");
  return requestUrl.href;
}

/**
 * Extracts the quoted post text from an embed's HTML fragment.
 *
 * The embed is a `<blockquote>` whose `<p>` holds the post; the trailing
 * attribution line ("— Name (@handle) date") sits outside it.
 */
export function extractEmbedText(html: string): string {
  const document = parseDocument(html);

  const paragraphs = selectAll(document, "blockquote p")
    .map((p) => cleanText(elementText(p)))
    .filter((text) => text.length > 0);
  if (paragraphs.length > 0) {
    return paragraphs.join("\n\n");
  }

  const blockquote = document.querySelector("blockquote");
  return blockquote ? cleanText(elementText(blockquote)) : "";
}

/**
 * Derives a title from the post author: "@handle" from the profile URL,
 * else the display name.
 */
export function authorTitle(embed: OEmbedResponse): string {
  if (embed.author_url) {
    try {
      const segments = new URL(embed.author_url).pathname.split("/").filter(Boolean);
      const handle = segments[segments.length - 1];
      if (handle) {
        return `@${handle}`;
      }
    } catch {
      logger.debug("Ignoring unparseable oEmbed author_url", { authorUrl: embed.author_url });
    }
  }

  return embed.author_name?.trim() || UNTITLED_ARTICLE;
}

// ============================================================================
// Plugin
// ============================================================================

async function fetchPost(url: URL, options?: ArticleFetchOptions): Promise<ExtractedArticle> {
  const requestUrl = buildOEmbedUrl(url);

  let payload: unknown;
  try {
    payload = await fetchJson(requestUrl, { signal: options?.signal });
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ParsingError(error);
    }
    throw toNetworkError(error);
  }

  const parsed = oembedResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ParsingError(parsed.error);
  }

  const content = extractEmbedText(parsed.data.html);
  if (!content) {
    throw new NoContentFoundError();
  }

  return { title: authorTitle(parsed.data), content };
}

export const socialPostPlugin: UrlPlugin = {
  name: "social-post",
  hosts: SOCIAL_POST_HOSTS,
  matchUrl: () => true,
  capabilities: {
    article: {
      fetchArticle: fetchPost,
    },
  },
};
