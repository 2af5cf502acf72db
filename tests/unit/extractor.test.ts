/**
 * Unit tests for article extraction: title, boilerplate stripping, the
 * density/selector/meta strategies, and fetch failures.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { extractArticle, extractArticleFromHtml, findContent } from "../../src/server/extraction/extractor";
import {
  InvalidUrlError,
  NetworkError,
  NoContentFoundError,
} from "../../src/server/extraction/errors";
import { stripBoilerplate } from "../../src/server/extraction/boilerplate";
import { findBestContentByDensity } from "../../src/server/extraction/density";
import { cleanText, isSubstantialContent } from "../../src/server/extraction/text";
import { parseDocument } from "../../src/server/http/html";

const P1 =
  "Reading quickly is a skill that improves with practice and patience over many weeks of steady effort.";
const P2 =
  "Most readers subvocalize each word, which limits their speed to roughly the pace of ordinary speech.";
const P3 =
  "Showing one word at a time removes eye movement and lets the reader focus on comprehension instead.";

const ARTICLE_BODY = `
  <h1>My Great Post</h1>
  <p>${P1}</p>
  <p>${P2}</p>
  <p>${P3}</p>
`;

function page(head: string, body: string): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

function mockFetch(response: Response) {
  const fetchMock = vi.fn().mockResolvedValue(response);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("cleanText", () => {
  it("collapses spaces and extra blank lines and trims lines", () => {
    expect(cleanText("  a \t b \n\n\n\n  c  ")).toBe("a b\n\nc");
  });
});

describe("isSubstantialContent", () => {
  it("needs 100 characters and 20 words", () => {
    expect(isSubstantialContent(P1)).toBe(false);
    expect(isSubstantialContent(`${P1} ${P2}`)).toBe(true);
    expect(isSubstantialContent("x".repeat(200))).toBe(false);
  });
});

describe("extractArticleFromHtml", () => {
  it("prefers the dense article body over a link list", () => {
    const html = page(
      "<title>My Great Post | Example Blog</title>",
      `<nav><a href="/">Home</a> <a href="/about">About</a></nav>
       <div class="links">
         <a href="/1">Another article you might enjoy reading today</a>
         <a href="/2">Yet another article you might enjoy reading later</a>
         <a href="/3">A third article that is also worth reading soon</a>
       </div>
       <article>${ARTICLE_BODY}</article>
       <footer>Copyright Example Blog</footer>`
    );

    expect(extractArticleFromHtml(html)).toEqual({
      title: "My Great Post",
      content: `My Great Post\n\n${P1}\n\n${P2}\n\n${P3}`,
    });
  });

  it("cuts the title at the first separator", () => {
    const html = page("<title>Speed Reading - A Guide</title>", `<article>${ARTICLE_BODY}</article>`);
    expect(extractArticleFromHtml(html).title).toBe("Speed Reading");
  });

  it("falls back to the first h1 for the title", () => {
    const html = page("", `<article>${ARTICLE_BODY}</article>`);
    expect(extractArticleFromHtml(html).title).toBe("My Great Post");
  });

  it("uses a placeholder when there is no title or h1", () => {
    const html = page("", `<article><p>${P1}</p><p>${P2}</p></article>`);
    expect(extractArticleFromHtml(html)).toEqual({
      title: "Untitled Article",
      content: `${P1}\n\n${P2}`,
    });
  });

  it("strips denylisted and hidden elements before picking content", () => {
    const html = page(
      "<title>My Great Post</title>",
      `<article>
         ${ARTICLE_BODY}
         <div class="newsletter-signup"><p>Subscribe to our newsletter for weekly updates.</p></div>
         <p style="display:none">Hidden tracking text</p>
         <p aria-hidden="true">Decorative text</p>
         <script>var tracking = true;</script>
       </article>`
    );

    expect(extractArticleFromHtml(html).content).toBe(
      `My Great Post\n\n${P1}\n\n${P2}\n\n${P3}`
    );
  });

  it("honors custom boilerplate patterns", () => {
    const html = page(
      "<title>Post</title>",
      `<article>${ARTICLE_BODY}<p class="byline-box">By Someone Somewhere</p></article>`
    );

    const content = extractArticleFromHtml(html, { boilerplatePatterns: ["byline"] }).content;
    expect(content).toBe(`My Great Post\n\n${P1}\n\n${P2}\n\n${P3}`);
  });

  it("falls back to known content selectors when no container qualifies", () => {
    const text = `${P1} ${P2}`;
    const html = page("<title>Post</title>", `<span class="prose">${text}</span>`);
    expect(extractArticleFromHtml(html).content).toBe(text);
  });

  it("falls back to meta tags for script-rendered pages", () => {
    const description = `${P1} ${P2}`;
    const html = page(
      `<meta property="og:title" content="Big News">
       <meta property="og:description" content="${description}">`,
      `<div id="app">Loading</div>`
    );

    expect(extractArticleFromHtml(html)).toEqual({
      title: "Untitled Article",
      content: `Big News\n\n${description}`,
    });
  });

  it("fails when nothing reaches the length threshold", () => {
    const html = page("<title>Short</title>", "<article><p>Too short to be an article.</p></article>");
    expect(() => extractArticleFromHtml(html)).toThrow(NoContentFoundError);
  });
});

describe("findContent", () => {
  it("reports the density strategy for article bodies", () => {
    const document = parseDocument(page("", `<main><p>${P1}</p><p>${P2}</p></main>`));
    expect(findContent(document)).toEqual({ content: `${P1}\n\n${P2}`, strategy: "density" });
  });
});

describe("findBestContentByDensity", () => {
  it("keeps scanning when one candidate fails to score", () => {
    const document = parseDocument(
      page(
        "",
        `<section id="broken"><p>${P1}</p><p>${P2}</p><p>${P3}</p></section>` +
          `<article><p>${P2}</p><p>${P3}</p></article>`
      )
    );
    const broken = document.querySelector("#broken");
    if (!broken) throw new Error("missing #broken section");
    const failingQuery = vi.spyOn(broken, "querySelectorAll").mockImplementation(() => {
      throw new Error("detached node");
    });

    const result = findBestContentByDensity(document);

    expect(failingQuery).toHaveBeenCalled();
    expect(result?.content).toBe(`${P2}\n\n${P3}`);
  });
});

describe("stripBoilerplate", () => {
  it("counts removed elements", () => {
    const document = parseDocument(
      page("", `<nav>Menu</nav><div id="sidebar">Side</div><div>Keep</div>`)
    );
    expect(stripBoilerplate(document)).toBe(2);
    expect(document.querySelector("div")?.textContent).toBe("Keep");
  });
});

describe("extractArticle", () => {
  it("fetches the page with browser headers and extracts it", async () => {
    const fetchMock = mockFetch(
      new Response(page("<title>My Great Post</title>", `<article>${ARTICLE_BODY}</article>`), {
        status: 200,
        headers: { "content-type": "text/html; charset=utf-8" },
      })
    );

    const article = await extractArticle("example.com/posts/great");

    expect(article.title).toBe("My Great Post");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://example.com/posts/great");
    expect(init.headers["User-Agent"]).toContain("Safari");
  });

  it("decodes non-UTF-8 pages as Latin-1", async () => {
    const body = `<p>${P1} Le café est ouvert.</p><p>${P2}</p>`;
    const html = page("<title>Café</title>", `<article>${body}</article>`);
    mockFetch(new Response(new Uint8Array(Buffer.from(html, "latin1")), { status: 200 }));

    const article = await extractArticle("https://example.com/cafe");

    expect(article.title).toBe("Café");
    expect(article.content).toBe(`${P1} Le café est ouvert.\n\n${P2}`);
  });

  it("rejects input that isn't a web address without fetching", async () => {
    const fetchMock = mockFetch(new Response("unused"));

    await expect(extractArticle("not a url")).rejects.toBeInstanceOf(InvalidUrlError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("reports non-2xx responses as network errors with the status", async () => {
    mockFetch(new Response("missing", { status: 404, statusText: "Not Found" }));

    const error = await extractArticle("https://example.com/missing").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      status: 404,
      code: "NETWORK_ERROR",
      message: "Network error: HTTP 404: Not Found",
    });
  });

  it("reports transport failures as network errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(extractArticle("https://example.com/")).rejects.toThrow(
      "Network error: fetch failed"
    );
  });

  it("reports pages without content", async () => {
    mockFetch(new Response(page("<title>Empty</title>", "<p>Nothing here.</p>"), { status: 200 }));

    await expect(extractArticle("https://example.com/empty")).rejects.toMatchObject({
      code: "NO_CONTENT_FOUND",
      message: "Could not find article content on this page.",
    });
  });
});
