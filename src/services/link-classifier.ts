/**
 * Internal/external classification of outbound article links
 */

import { ClassificationError } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';

export type LinkKind = 'internal' | 'external';

export interface LinkClassification {
  internal: number;
  external: number;
  /** Hrefs that could not be resolved, counted in neither bucket */
  skipped: number;
}

/**
 * Network location (host with port) of a URL, or '' when it has none
 */
function networkLocation(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}

/**
 * Classify one href against the article's base domain.
 *
 * Hosts are compared exactly: `www.example.com` and `example.com` are
 * different domains. Hrefs without a host (`mailto:`, `javascript:`) are
 * internal.
 */
export function classifyHref(href: string, articleUrl: string, baseDomain: string): LinkKind {
  let resolved: URL;
  try {
    resolved = new URL(href.trim(), articleUrl);
  } catch (error) {
    throw new ClassificationError(href, { url: articleUrl, cause: error });
  }

  const dom = resolved.host;
  return dom === '' || dom === baseDomain ? 'internal' : 'external';
}

/**
 * Count internal and external links among a page's anchor hrefs
 */
export function classifyLinks(hrefs: readonly string[], articleUrl: string): LinkClassification {
  const baseDomain = networkLocation(articleUrl);
  const result: LinkClassification = { internal: 0, external: 0, skipped: 0 };

  for (const href of hrefs) {
    try {
      result[classifyHref(href, articleUrl, baseDomain)]++;
    } catch (error) {
      if (!(error instanceof ClassificationError)) {
        throw error;
      }
      logDebug(`Skipping malformed href "${error.href}" on ${articleUrl}`);
      result.skipped++;
    }
  }

  return result;
}
