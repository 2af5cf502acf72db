/**
 * Summarization service for article summaries.
 *
 * Uses Anthropic Claude to turn an article into a few short paragraphs of
 * plain prose. Only available when an API key is configured.
 */

import Anthropic from "@anthropic-ai/sdk";

import { logger } from "@/lib/logger";
import { summarizationConfig } from "@/server/config/env";

/**
 * Maximum content length sent to the model (in characters).
 */
export const MAX_CONTENT_LENGTH = 12_000;

/**
 * Maximum tokens for the summary response.
 */
const MAX_OUTPUT_TOKENS = 1024;

export const SUMMARIZATION_PROMPT = `You are a concise article summarizer. Given an article's text, produce a clear summary of 2-3 short paragraphs that captures the key points. Write in plain prose, no bullet points or headings. Keep it under 200 words.

The article is titled: {{title}}

<content>
{{content}}
</content>

Write your summary inside <summary> tags.`;

/**
 * Produces a summary of an article's text.
 */
export interface Summarizer {
  summarize(content: string, title: string): Promise<string>;
}

/**
 * Cuts content to the length the model is given.
 */
export function truncateForSummarization(content: string): string {
  return content.length > MAX_CONTENT_LENGTH ? content.slice(0, MAX_CONTENT_LENGTH) : content;
}

/**
 * Fills the prompt template. Title and content are inserted verbatim, in one
 * pass, so neither is scanned for placeholders or `$` patterns.
 */
export function buildSummarizationPrompt(content: string, title: string): string {
  const truncated = truncateForSummarization(content);
  return SUMMARIZATION_PROMPT.replace(/\{\{(title|content)\}\}/g, (_match, key: string) =>
    key === "title" ? title : truncated
  );
}

/**
 * Extracts the summary from the LLM response.
 * Looks for content within <summary> tags, falling back to the full text.
 */
export function extractSummaryFromResponse(responseText: string): string {
  const summaryMatch = responseText.match(/<summary>([\s\S]*?)<\/summary>/);
  if (summaryMatch) {
    return summaryMatch[1].trim();
  }
  return responseText.trim();
}

/**
 * The subset of the Anthropic client the summarizer calls.
 */
export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
  };
}

export interface AnthropicSummarizerOptions {
  apiKey?: string;
  model?: string;
  /** Client to call instead of one built from the API key */
  client?: MessagesClient;
}

export class AnthropicSummarizer implements Summarizer {
  private readonly client: MessagesClient;
  private readonly model: string;

  /**
   * @throws Error if neither a client nor an API key is available
   */
  constructor(options: AnthropicSummarizerOptions = {}) {
    this.model = options.model ?? summarizationConfig.model;

    if (options.client) {
      this.client = options.client;
      return;
    }

    const apiKey = options.apiKey ?? summarizationConfig.apiKey;
    if (!apiKey) {
      throw new Error("Anthropic API key not configured");
    }
    this.client = new Anthropic({ apiKey });
  }

  async summarize(content: string, title: string): Promise<string> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: MAX_OUTPUT_TOKENS,
        messages: [{ role: "user", content: buildSummarizationPrompt(content, title) }],
      });

      const textContent = response.content.find((block) => block.type === "text");
      const responseText = textContent?.type === "text" ? textContent.text : "";

      if (!responseText) {
        throw new Error("Empty response from Anthropic API");
      }

      return extractSummaryFromResponse(responseText);
    } catch (error) {
      logger.error("Anthropic API call failed", {
        model: this.model,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

/**
 * Checks if summarization is available.
 */
export function isSummarizationAvailable(apiKey = summarizationConfig.apiKey): boolean {
  return !!apiKey;
}

/**
 * Builds the configured summarizer, or null when no API key is set.
 */
export function createSummarizer(apiKey = summarizationConfig.apiKey): Summarizer | null {
  return apiKey ? new AnthropicSummarizer({ apiKey }) : null;
}
