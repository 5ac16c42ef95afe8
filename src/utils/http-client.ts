/**
 * HTTP client utilities
 */

import type { PageFetcher } from '../types/index.js';
import type { AppConfig } from './config.js';
import { FetchError, errorMessage } from './errors.js';
import { logDebug } from './logger.js';

export type RequestIdentity = Pick<AppConfig, 'userAgent' | 'acceptLanguage'>;

/**
 * Stable request headers sent with every request
 */
export function buildHeaders(identity: RequestIdentity, accept: string): Record<string, string> {
  return {
    'User-Agent': identity.userAgent,
    Accept: accept,
    'Accept-Language': identity.acceptLanguage,
  };
}

export const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const ASSET_ACCEPT = 'image/avif,image/webp,image/apng,image/svg+xml,image/*,*/*;q=0.8';

/**
 * Fetch a URL with a bounded timeout, throwing FetchError on any failure
 */
export async function fetchWithTimeout(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new FetchError(`Request timeout after ${timeoutMs}ms`, { url, cause: error });
    }
    throw new FetchError(`Request failed: ${errorMessage(error)}`, { url, cause: error });
  }

  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status} for URL: ${url}`, { url, status: response.status });
  }
  return response;
}

/**
 * Fetch HTML content
 */
export async function fetchHtml(
  url: string,
  identity: RequestIdentity,
  timeoutMs: number
): Promise<string> {
  const response = await fetchWithTimeout(url, buildHeaders(identity, HTML_ACCEPT), timeoutMs);
  try {
    const text = await response.text();
    logDebug(`fetch success: ${url} (${text.length} bytes)`);
    return text;
  } catch (error) {
    throw new FetchError(`Failed to read body: ${errorMessage(error)}`, { url, cause: error });
  }
}

/**
 * Fetch a binary asset such as an image
 */
export async function fetchBinary(
  url: string,
  identity: RequestIdentity,
  timeoutMs: number
): Promise<Buffer> {
  const response = await fetchWithTimeout(url, buildHeaders(identity, ASSET_ACCEPT), timeoutMs);
  try {
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    throw new FetchError(`Failed to read body: ${errorMessage(error)}`, { url, cause: error });
  }
}

/**
 * PageFetcher backed by the Node.js fetch API
 */
export class HttpPageFetcher implements PageFetcher {
  constructor(
    private readonly config: Pick<
      AppConfig,
      'userAgent' | 'acceptLanguage' | 'pageTimeoutMs' | 'assetTimeoutMs'
    >
  ) {}

  fetchHtml(url: string): Promise<string> {
    return fetchHtml(url, this.config, this.config.pageTimeoutMs);
  }

  fetchBinary(url: string): Promise<Buffer> {
    return fetchBinary(url, this.config, this.config.assetTimeoutMs);
  }
}
