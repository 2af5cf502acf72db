/**
 * Extraction error taxonomy.
 *
 * Every failure of `extractArticle` is one of these. None are retried.
 */

import { HttpFetchError } from "@/server/http/fetch";

export const ExtractionErrorCodes = {
  INVALID_URL: "INVALID_URL",
  NETWORK_ERROR: "NETWORK_ERROR",
  PARSING_ERROR: "PARSING_ERROR",
  NO_CONTENT_FOUND: "NO_CONTENT_FOUND",
} as const;

export type ExtractionErrorCode = (typeof ExtractionErrorCodes)[keyof typeof ExtractionErrorCodes];

/**
 * Base class for extraction failures.
 */
export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;
}

export class InvalidUrlError extends ExtractionError {
  readonly code = ExtractionErrorCodes.INVALID_URL;

  constructor(public readonly input: string) {
    super("Invalid URL. Please enter a valid web address.");
    this.name = "InvalidUrlError";
  }
}

export class NetworkError extends ExtractionError {
  readonly code = ExtractionErrorCodes.NETWORK_ERROR;

  /** HTTP status when the server answered with a non-2xx response */
  readonly status: number | undefined;

  constructor(cause: unknown, status?: number) {
    super(`Network error: ${describeCause(cause)}`, { cause });
    this.name = "NetworkError";
    this.status = status;
  }
}

export class ParsingError extends ExtractionError {
  readonly code = ExtractionErrorCodes.PARSING_ERROR;

  constructor(cause: unknown) {
    super(`Failed to parse content: ${describeCause(cause)}`, { cause });
    this.name = "ParsingError";
  }
}

export class NoContentFoundError extends ExtractionError {
  readonly code = ExtractionErrorCodes.NO_CONTENT_FOUND;

  constructor() {
    super("Could not find article content on this page.");
    this.name = "NoContentFoundError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Converts a failure from the fetch layer into a NetworkError,
 * keeping the HTTP status when there is one.
 */
export function toNetworkError(error: unknown): NetworkError {
  if (error instanceof NetworkError) {
    return error;
  }
  if (error instanceof HttpFetchError) {
    return new NetworkError(error, error.status);
  }
  return new NetworkError(error);
}
