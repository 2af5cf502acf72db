/**
 * Environment Configuration
 *
 * Centralized access to environment variables with type safety.
 */

/**
 * Parses a positive integer from an environment variable, falling back to a default.
 */
function parsePositiveInt(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : defaultValue;
}

/**
 * Splits a comma-separated environment variable into trimmed, non-empty entries.
 */
function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Page fetching configuration.
 */
export const fetcherConfig = {
  /** Timeout for page requests in milliseconds. Defaults to 30 seconds. */
  pageTimeoutMs: parsePositiveInt(process.env.FETCH_TIMEOUT_MS, 30_000),

  /** Maximum page size in bytes. Defaults to 10MB. */
  maxPageSizeBytes: parsePositiveInt(process.env.FETCH_MAX_PAGE_BYTES, 10 * 1024 * 1024),

  /**
   * Overrides the browser User-Agent sent with page requests.
   * Some sites reject anything that doesn't look like a browser, so the default mimics one.
   */
  userAgent: process.env.FETCH_USER_AGENT,
};

/**
 * Content extraction configuration.
 */
export const extractionConfig = {
  /** oEmbed endpoint used for social posts. */
  oembedEndpoint: process.env.OEMBED_ENDPOINT ?? "https://publish.twitter.com/oembed",

  /**
   * Extra class/id substrings whose elements are stripped before extraction,
   * on top of the built-in denylist.
   */
  extraBoilerplatePatterns: parseList(process.env.EXTRACTION_EXTRA_DENYLIST),
};

/**
 * Database configuration.
 * Only required when using the Postgres-backed store.
 */
export const databaseConfig = {
  /** Postgres connection string. */
  url: process.env.DATABASE_URL,

  /** Maximum clients in the pool. */
  poolMax: parsePositiveInt(process.env.PG_POOL_MAX, 10),
};

/**
 * Summarization configuration.
 */
export const summarizationConfig = {
  /** Anthropic API key. Summarization is unavailable without it. */
  apiKey: process.env.ANTHROPIC_API_KEY,

  /** Model used for summaries. */
  model: process.env.SUMMARIZATION_MODEL ?? "claude-3-5-haiku-latest",
};

/**
 * Error reporting configuration.
 */
export const sentryConfig = {
  /** Sentry DSN. Error reporting is off without it. */
  dsn: process.env.SENTRY_DSN,

  environment: process.env.NODE_ENV,
};
