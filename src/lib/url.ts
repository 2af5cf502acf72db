/**
 * URL manipulation utilities.
 */

/**
 * Matches an explicit scheme such as "https://".
 */
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Normalizes user input into an article URL.
 *
 * Input without a scheme gets "https://" prepended. The result must parse,
 * use http(s), and have a host.
 *
 * @example
 * normalizeArticleUrl("example.com/post")
 * // => URL { href: "https://example.com/post" }
 *
 * normalizeArticleUrl("not a url")
 * // => null
 *
 * @returns The parsed URL, or null if the input cannot be an article address
 */
export function normalizeArticleUrl(input: string): URL | null {
  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `https://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(withScheme);
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return null;
  }
  if (!parsed.hostname) {
    return null;
  }

  return parsed;
}

/**
 * Normalizes a URL by stripping the fragment (hash) portion.
 *
 * Fragments identify a location within a page (e.g., #section-2) but
 * don't affect which resource is fetched. Two URLs that differ only
 * by fragment point to the same article.
 *
 * @example
 * stripFragment("https://example.com/article#section-2")
 * // => "https://example.com/article"
 */
export function stripFragment(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = "";
    return parsed.href;
  } catch {
    // If URL is invalid, return as-is (validation will catch it later)
    return url;
  }
}
