/**
 * User-Agent header utilities.
 *
 * Article pages are fetched the way a desktop browser would fetch them: many
 * publishers serve stripped pages, challenges or 403s to non-browser agents.
 */

import { fetcherConfig } from "../config/env";

// ============================================================================
// Constants
// ============================================================================

/**
 * A current desktop Safari User-Agent.
 */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 " +
  "(KHTML, like Gecko) Version/17.5 Safari/605.1.15";

/**
 * The User-Agent sent with every request: FETCH_USER_AGENT when set,
 * otherwise the browser default.
 */
export const USER_AGENT = fetcherConfig.userAgent ?? BROWSER_USER_AGENT;
