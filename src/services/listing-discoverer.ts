/**
 * Listing page discovery: collects article URLs from section and index pages
 */

import * as cheerio from 'cheerio';
import { UNKNOWN_SECTION, type SourceProfile } from '../models/schemas.js';
import type { ListingPage, PageFetcher } from '../types/index.js';
import { logDebug, logInfo } from '../utils/logger.js';
import { sleep } from '../utils/pacing.js';
import { resolveHref } from '../utils/url.js';

/**
 * Extract article URLs from a listing document.
 * Relative hrefs resolve against the listing URL and fragments are stripped.
 * The result is deduplicated and sorted.
 */
export function extractArticleLinks(
  html: string,
  listingUrl: string,
  profile: Pick<SourceProfile, 'discovery'>
): string[] {
  const $ = cheerio.load(html);
  const pattern = new RegExp(profile.discovery.articlePattern);
  const links = new Set<string>();

  $(profile.discovery.anchorSelector).each((_, elem) => {
    const href = $(elem).attr('href');
    if (!href) return;

    const absolute = resolveHref(href, listingUrl);
    if (absolute && pattern.test(absolute)) {
      links.add(absolute);
    }
  });

  return Array.from(links).sort();
}

/**
 * Expand a profile's listings into the concrete pages to fetch.
 * Paged sources produce one entry per page number in the range.
 */
export function listingPages(
  profile: Pick<SourceProfile, 'listings' | 'pagination'>,
  pageRange?: { from: number; to: number }
): ListingPage[] {
  const pages: ListingPage[] = [];

  for (const [listingUrl, label] of Object.entries(profile.listings)) {
    const section = label ?? UNKNOWN_SECTION;
    const { pagination } = profile;

    if (pagination.kind === 'single') {
      pages.push({ url: listingUrl, label: section });
      continue;
    }

    const from = pageRange?.from ?? pagination.firstPage;
    const to = pageRange?.to ?? pagination.lastPage;
    for (let page = from; page <= to; page++) {
      const url =
        page === 1
          ? listingUrl
          : pagination.pageTemplate
              .replaceAll('{listing}', listingUrl)
              .replaceAll('{page}', String(page));
      pages.push({ url, label: section });
    }
  }

  return pages;
}

export interface ListingDiscovererOptions {
  /** Pause after every listing fetch, successful or not */
  delayMs: number;
}

export class ListingDiscoverer {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly profile: SourceProfile,
    private readonly options: ListingDiscovererOptions
  ) {}

  /**
   * Fetch one listing page and return the article URLs on it.
   * A fetch failure propagates so the caller can skip this listing.
   */
  async discover(listingUrl: string, label: string): Promise<string[]> {
    logInfo(`Scanning ${label} listing: ${listingUrl}`);

    let html: string;
    try {
      html = await this.fetcher.fetchHtml(listingUrl);
    } finally {
      await sleep(this.options.delayMs);
    }

    const links = extractArticleLinks(html, listingUrl, this.profile);
    logDebug(`Found ${links.length} article links on ${listingUrl}`);
    return links;
  }
}
