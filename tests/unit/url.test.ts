/**
 * Unit tests for article URL normalization.
 */

import { describe, it, expect } from "vitest";
import { normalizeArticleUrl, stripFragment } from "../../src/lib/url";

describe("normalizeArticleUrl", () => {
  it("prepends https:// when the scheme is missing", () => {
    expect(normalizeArticleUrl("example.com/post")?.href).toBe("https://example.com/post");
  });

  it("keeps an explicit http scheme", () => {
    expect(normalizeArticleUrl("http://example.com/a?b=1")?.href).toBe("http://example.com/a?b=1");
  });

  it("trims surrounding whitespace", () => {
    expect(normalizeArticleUrl("  https://example.com  ")?.href).toBe("https://example.com/");
  });

  it("rejects empty input", () => {
    expect(normalizeArticleUrl("")).toBeNull();
    expect(normalizeArticleUrl("   ")).toBeNull();
  });

  it("rejects input that doesn't parse", () => {
    expect(normalizeArticleUrl("not a url")).toBeNull();
  });

  it("rejects non-web schemes", () => {
    expect(normalizeArticleUrl("ftp://example.com/file")).toBeNull();
  });
});

describe("stripFragment", () => {
  it("removes the fragment", () => {
    expect(stripFragment("https://example.com/article#section-2")).toBe(
      "https://example.com/article"
    );
  });

  it("returns invalid URLs unchanged", () => {
    expect(stripFragment("nope")).toBe("nope");
  });
});
