/**
 * HTTP Fetch Utilities
 *
 * Shared utilities for fetching pages with status validation, timeouts,
 * size limits and browser-like headers.
 */

import { USER_AGENT } from "./user-agent";
import { fetcherConfig } from "../config/env";

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Error thrown when an HTTP request completes with a non-2xx status.
 * Includes the HTTP status code for better error handling.
 */
export class HttpFetchError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string
  ) {
    super(`HTTP ${status}${statusText ? `: ${statusText}` : ""}`);
    this.name = "HttpFetchError";
  }
}

/**
 * Error thrown when a response body exceeds the maximum allowed size.
 * Checked during streaming to avoid loading the full body into memory.
 */
export class ContentTooLargeError extends Error {
  constructor(
    public readonly url: string,
    public readonly maxBytes: number,
    public readonly receivedBytes: number
  ) {
    const maxMB = Math.round(maxBytes / (1024 * 1024));
    super(`Response body exceeds maximum size of ${maxMB}MB`);
    this.name = "ContentTooLargeError";
  }
}

/**
 * Error thrown when a request is aborted by its timeout rather than by the
 * caller.
 */
export class FetchTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
  }
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Accept-Encoding header for outgoing requests.
 *
 * Node.js's native fetch only advertises "gzip, deflate" by default,
 * but it can also decompress brotli.
 */
const ACCEPT_ENCODING = "gzip, deflate, br";

/**
 * Accept header for HTML page requests.
 */
const HTML_ACCEPT_HEADER = "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8";

/**
 * Accept header for JSON API requests (oEmbed).
 */
const JSON_ACCEPT_HEADER = "application/json";

// ============================================================================
// Types
// ============================================================================

export interface FetchPageOptions {
  /** Timeout in milliseconds. Defaults to fetcherConfig.pageTimeoutMs. */
  timeoutMs?: number;
  /** Maximum response size in bytes. Defaults to fetcherConfig.maxPageSizeBytes. */
  maxSizeBytes?: number;
  /** Caller's signal; aborting it abandons the request. */
  signal?: AbortSignal;
}

// ============================================================================
// Body Reading
// ============================================================================

/**
 * Reads a response body as a Buffer with a streaming size limit.
 * Aborts the request if the response exceeds maxBytes, preventing OOM.
 *
 * Checks Content-Length header first for an early rejection, then
 * enforces the limit while streaming chunks.
 *
 * @throws ContentTooLargeError if the response exceeds the limit
 */
async function readResponseBufferWithSizeLimit(
  response: Response,
  maxBytes: number,
  url: string
): Promise<Buffer> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ContentTooLargeError(url, maxBytes, declaredSize);
    }
  }

  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let receivedBytes = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    receivedBytes += value.byteLength;
    if (receivedBytes > maxBytes) {
      await reader.cancel();
      throw new ContentTooLargeError(url, maxBytes, receivedBytes);
    }

    chunks.push(value);
  }

  return Buffer.concat(chunks, receivedBytes);
}

// ============================================================================
// Charset Handling
// ============================================================================

/**
 * Decodes a page body as UTF-8, falling back to Latin-1.
 *
 * @returns The decoded text, or null if neither charset decodes the bytes
 */
export function decodeHtmlBody(body: Uint8Array): string | null {
  const utf8 = decodeUtf8(body);
  if (utf8 !== null) {
    return utf8;
  }

  try {
    return Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString("latin1");
  } catch {
    return null;
  }
}

function decodeUtf8(body: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(body);
  } catch {
    return null;
  }
}

// ============================================================================
// Fetch Utilities
// ============================================================================

/**
 * Issues a GET with a timeout, linking the caller's abort signal.
 *
 * @throws The caller's abort reason if its signal is already aborted
 */
async function getWithTimeout(
  url: string,
  headers: Record<string, string>,
  options: FetchPageOptions
): Promise<{ response: Response; maxSizeBytes: number; clear: () => void }> {
  const timeoutMs = options.timeoutMs ?? fetcherConfig.pageTimeoutMs;
  const maxSizeBytes = options.maxSizeBytes ?? fetcherConfig.maxPageSizeBytes;

  // An aborted signal never fires "abort" again
  options.signal?.throwIfAborted();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const abortFromCaller = () => controller.abort();
  options.signal?.addEventListener("abort", abortFromCaller, { once: true });

  const clear = () => {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", abortFromCaller);
  };

  try {
    const response = await fetch(url, {
      headers,
      signal: controller.signal,
      redirect: "follow",
    });
    return { response, maxSizeBytes, clear };
  } catch (error) {
    clear();
    if (error instanceof Error && error.name === "AbortError" && !options.signal?.aborted) {
      throw new FetchTimeoutError(url, timeoutMs);
    }
    throw error;
  }
}

/**
 * Rejects a non-2xx response, releasing its unread body first.
 */
async function ensureOk(response: Response, url: string): Promise<void> {
  if (response.status >= 200 && response.status <= 299) {
    return;
  }
  await response.body?.cancel();
  throw new HttpFetchError(response.status, response.statusText, url);
}

/**
 * Fetches an HTML page with browser-like headers.
 *
 * @param url - The URL to fetch
 * @returns The raw body, undecoded so the caller can choose a charset
 * @throws HttpFetchError for non-2xx responses
 * @throws ContentTooLargeError when the body exceeds the size limit
 * @throws FetchTimeoutError when the timeout elapses
 */
export async function fetchHtmlPage(url: string, options: FetchPageOptions = {}): Promise<Buffer> {
  const { response, maxSizeBytes, clear } = await getWithTimeout(
    url,
    {
      "User-Agent": USER_AGENT,
      Accept: HTML_ACCEPT_HEADER,
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": ACCEPT_ENCODING,
    },
    options
  );

  try {
    await ensureOk(response, url);
    return await readResponseBufferWithSizeLimit(response, maxSizeBytes, url);
  } finally {
    clear();
  }
}

/**
 * Fetches a JSON document (e.g. an oEmbed response).
 *
 * @returns The parsed JSON value, unvalidated
 * @throws HttpFetchError for non-2xx responses
 */
export async function fetchJson(url: string, options: FetchPageOptions = {}): Promise<unknown> {
  const { response, maxSizeBytes, clear } = await getWithTimeout(
    url,
    {
      "User-Agent": USER_AGENT,
      Accept: JSON_ACCEPT_HEADER,
      "Accept-Encoding": ACCEPT_ENCODING,
    },
    options
  );

  try {
    await ensureOk(response, url);
    const body = await readResponseBufferWithSizeLimit(response, maxSizeBytes, url);
    return JSON.parse(body.toString("utf-8"));
  } finally {
    clear();
  }
}
