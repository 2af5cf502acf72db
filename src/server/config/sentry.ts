/**
 * Sentry Configuration
 *
 * Call `initSentry()` once at process start, before anything reports. The
 * logger's breadcrumbs and the database pool's error capture go nowhere until
 * it has run.
 */

import * as Sentry from "@sentry/node";

import { ExtractionError } from "@/server/extraction/errors";
import { sentryConfig } from "./env";

/**
 * Messages of errors that are expected in normal operation.
 */
const EXPECTED_ERROR_MESSAGES = ["unauthorized", "not found", "bad request", "forbidden"];

/**
 * Whether an error is worth reporting.
 *
 * Extraction failures are the page's fault, not ours, and 4xx-style errors are
 * expected.
 */
export function shouldReportError(error: unknown): boolean {
  if (error instanceof ExtractionError) {
    return false;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return !EXPECTED_ERROR_MESSAGES.some((expected) => message.includes(expected));
  }
  return true;
}

/**
 * Initializes Sentry if a DSN is configured.
 *
 * @returns Whether Sentry was initialized
 */
export function initSentry(
  dsn: string | undefined = sentryConfig.dsn,
  environment: string | undefined = sentryConfig.environment
): boolean {
  if (!dsn) {
    return false;
  }

  Sentry.init({
    dsn,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    environment,

    // Only send errors from production
    enabled: environment === "production",

    beforeSend(event, hint) {
      return shouldReportError(hint.originalException) ? event : null;
    },

    ignoreErrors: [
      // Database restarts
      "ECONNREFUSED",
    ],
  });

  return true;
}
