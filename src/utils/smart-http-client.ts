/**
 * Crawlee-backed HTTP client
 *
 * Uses got-scraping (through crawlee) for sources that answer plain fetch
 * requests poorly. Header generation is disabled so the request identity stays
 * the same on every call; there are no retries.
 */

import { gotScraping } from 'crawlee';
import type { PageFetcher } from '../types/index.js';
import type { AppConfig } from './config.js';
import { FetchError, errorMessage } from './errors.js';
import { HTML_ACCEPT, HttpPageFetcher, buildHeaders, fetchBinary } from './http-client.js';
import { logDebug } from './logger.js';

export type FetchStrategy = 'crawlee' | 'fetch';

type FetcherConfig = Pick<
  AppConfig,
  'userAgent' | 'acceptLanguage' | 'pageTimeoutMs' | 'assetTimeoutMs'
>;

/**
 * Fetch HTML with crawlee (got-scraping)
 */
async function fetchWithCrawlee(url: string, config: FetcherConfig): Promise<string> {
  logDebug(`Fetching with crawlee: ${url}`);

  let response;
  try {
    response = await gotScraping({
      url,
      headers: buildHeaders(config, HTML_ACCEPT),
      useHeaderGenerator: false,
      timeout: {
        request: config.pageTimeoutMs,
      },
      retry: {
        limit: 0,
      },
      throwHttpErrors: false,
      followRedirect: true,
    });
  } catch (error) {
    throw new FetchError(`crawlee request failed: ${errorMessage(error)}`, { url, cause: error });
  }

  const { statusCode } = response;
  if (statusCode < 200 || statusCode >= 300) {
    throw new FetchError(`HTTP ${statusCode} for URL: ${url}`, { url, status: statusCode });
  }

  logDebug(`crawlee fetch success: ${url} (${response.body.length} bytes)`);
  return response.body;
}

/**
 * PageFetcher that loads documents through crawlee. Binary assets still go
 * through the fetch API.
 */
export class CrawleePageFetcher implements PageFetcher {
  constructor(private readonly config: FetcherConfig) {}

  fetchHtml(url: string): Promise<string> {
    return fetchWithCrawlee(url, this.config);
  }

  fetchBinary(url: string): Promise<Buffer> {
    return fetchBinary(url, this.config, this.config.assetTimeoutMs);
  }
}

/**
 * Create the fetcher for a source's fetch strategy
 */
export function createPageFetcher(config: FetcherConfig, strategy: FetchStrategy): PageFetcher {
  switch (strategy) {
    case 'crawlee':
      return new CrawleePageFetcher(config);
    case 'fetch':
      return new HttpPageFetcher(config);
  }
}
