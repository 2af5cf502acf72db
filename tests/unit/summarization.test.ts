/**
 * Unit tests for the summarization service.
 */

import { describe, it, expect, vi } from "vitest";
import {
  AnthropicSummarizer,
  buildSummarizationPrompt,
  createSummarizer,
  extractSummaryFromResponse,
  isSummarizationAvailable,
  MAX_CONTENT_LENGTH,
  truncateForSummarization,
} from "../../src/server/services/summarization";

function fakeClient(text: string) {
  const create = vi.fn().mockResolvedValue({
    content: [{ type: "text", text }],
  });
  return { client: { messages: { create } }, create };
}

describe("extractSummaryFromResponse", () => {
  it("returns the text inside summary tags", () => {
    expect(extractSummaryFromResponse("Sure!\n<summary>\n  The gist.\n</summary>\nDone")).toBe(
      "The gist."
    );
  });

  it("falls back to the whole response", () => {
    expect(extractSummaryFromResponse("  Just text.  ")).toBe("Just text.");
  });
});

describe("truncateForSummarization", () => {
  it("cuts content to the maximum length", () => {
    expect(truncateForSummarization("a".repeat(MAX_CONTENT_LENGTH + 50))).toHaveLength(
      MAX_CONTENT_LENGTH
    );
    expect(truncateForSummarization("short")).toBe("short");
  });
});

describe("buildSummarizationPrompt", () => {
  it("includes the title and content", () => {
    const prompt = buildSummarizationPrompt("Body text.", "A Title");
    expect(prompt).toContain("The article is titled: A Title");
    expect(prompt).toContain("<content>\nBody text.\n</content>");
  });

  it("inserts dollar signs and placeholders literally", () => {
    const prompt = buildSummarizationPrompt("Costs $$5, see $' and $& here.", "Price of {{content}}");
    expect(prompt).toContain("The article is titled: Price of {{content}}\n");
    expect(prompt).toContain("<content>\nCosts $$5, see $' and $& here.\n</content>");
  });
});

describe("createSummarizer", () => {
  it("needs an API key", () => {
    expect(isSummarizationAvailable("")).toBe(false);
    expect(createSummarizer("")).toBeNull();
  });

  it("builds an Anthropic summarizer when a key is set", () => {
    expect(isSummarizationAvailable("test-secret")).toBe(true);
    expect(createSummarizer("test-secret")).toBeInstanceOf(AnthropicSummarizer);
  });
});

describe("AnthropicSummarizer", () => {
  it("sends the prompt to the configured model", async () => {
    const { client, create } = fakeClient("<summary>Two short paragraphs.</summary>");
    const summarizer = new AnthropicSummarizer({ client, model: "test-model" });

    expect(await summarizer.summarize("Body text.", "A Title")).toBe("Two short paragraphs.");
    expect(create).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 1024,
      messages: [{ role: "user", content: buildSummarizationPrompt("Body text.", "A Title") }],
    });
  });

  it("rejects an empty response", async () => {
    const { client } = fakeClient("");
    const summarizer = new AnthropicSummarizer({ client, model: "test-model" });

    await expect(summarizer.summarize("Body.", "Title")).rejects.toThrow(
      "Empty response from Anthropic API"
    );
  });

  it("requires an API key without a client", () => {
    expect(() => new AnthropicSummarizer({ apiKey: "" })).toThrow("Anthropic API key not configured");
  });
});
