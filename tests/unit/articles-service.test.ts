/**
 * Unit tests for the article service.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  markArticleRead,
  saveArticleFromUrl,
  summarizeArticle,
} from "../../src/server/services/articles";
import type { Summarizer } from "../../src/server/services/summarization";
import { MemoryReadingStore } from "../../src/server/storage/memory";
import { InvalidUrlError } from "../../src/server/extraction/errors";

const PARAGRAPH =
  "Speed reading tools show words one at a time so that the eyes never have to move across the page.";

const PAGE = `<html><head><title>Reading Faster | Blog</title></head><body>
  <article><p>${PARAGRAPH}</p><p>${PARAGRAPH}</p></article>
</body></html>`;

afterEach(() => {
  vi.unstubAllGlobals();
});

async function storeWithArticle(content = "Article body text.") {
  const store = new MemoryReadingStore();
  await store.createArticle({
    id: "article-1",
    url: "https://example.com/a",
    title: "A Title",
    content,
  });
  return store;
}

describe("saveArticleFromUrl", () => {
  it("extracts and saves the article without the URL fragment", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response(PAGE, { status: 200 })));
    const store = new MemoryReadingStore();

    const article = await saveArticleFromUrl(store, "example.com/reading#comments");

    expect(article).toMatchObject({
      url: "https://example.com/reading",
      title: "Reading Faster",
      content: `${PARAGRAPH}\n\n${PARAGRAPH}`,
      summary: null,
      lastRead: null,
    });
    expect(article.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(await store.listArticles()).toEqual([article]);
  });

  it("saves nothing when extraction fails", async () => {
    const store = new MemoryReadingStore();

    await expect(saveArticleFromUrl(store, "::")).rejects.toBeInstanceOf(InvalidUrlError);
    expect(await store.listArticles()).toEqual([]);
  });
});

describe("markArticleRead", () => {
  it("records when the article was opened", async () => {
    const store = await storeWithArticle();
    const readAt = new Date("2024-06-01T08:00:00Z");

    const article = await markArticleRead(store, "article-1", readAt);

    expect(article?.lastRead).toEqual(readAt);
  });

  it("returns null for a missing article", async () => {
    const store = new MemoryReadingStore();
    expect(await markArticleRead(store, "missing")).toBeNull();
  });
});

describe("summarizeArticle", () => {
  it("stores the summary", async () => {
    const store = await storeWithArticle();
    const summarizer: Summarizer = { summarize: vi.fn().mockResolvedValue("  A short summary. ") };

    expect(await summarizeArticle(store, summarizer, "article-1")).toBe("A short summary.");
    expect((await store.getArticle("article-1"))?.summary).toBe("A short summary.");
    expect(summarizer.summarize).toHaveBeenCalledWith("Article body text.", "A Title");
  });

  it("sends at most 12,000 characters", async () => {
    const store = await storeWithArticle("x".repeat(20_000));
    const summarize = vi.fn().mockResolvedValue("Summary.");

    await summarizeArticle(store, { summarize }, "article-1");

    expect(summarize.mock.calls[0][0]).toHaveLength(12_000);
  });

  it("leaves the summary unset when summarization fails", async () => {
    const store = await storeWithArticle();
    const summarizer: Summarizer = {
      summarize: vi.fn().mockRejectedValue(new Error("model unavailable")),
    };

    expect(await summarizeArticle(store, summarizer, "article-1")).toBeNull();
    expect((await store.getArticle("article-1"))?.summary).toBeNull();
  });

  it("returns null for a missing article", async () => {
    const store = new MemoryReadingStore();
    const summarize = vi.fn();

    expect(await summarizeArticle(store, { summarize }, "missing")).toBeNull();
    expect(summarize).not.toHaveBeenCalled();
  });
});
