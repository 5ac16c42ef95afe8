/**
 * URL helpers
 */

/**
 * Canonical form of an article URL used as the store key: fragment removed,
 * scheme and host lower-cased by the URL parser. Paths keep their case.
 * Throws TypeError for input that is not an absolute URL.
 */
export function normalizeArticleUrl(url: string): string {
  const parsed = new URL(url.trim());
  parsed.hash = '';
  return parsed.href;
}

/**
 * Resolve an href against a base URL and drop its fragment.
 * Returns null when the href cannot be resolved.
 */
export function resolveHref(href: string, baseUrl: string): string | null {
  try {
    const resolved = new URL(href.trim(), baseUrl);
    resolved.hash = '';
    return resolved.href;
  } catch {
    return null;
  }
}
