/**
 * Fresh ingest and backfill orchestration
 */

import type { SourceProfile } from '../models/schemas.js';
import type {
  ArticleStore,
  BackfillSummary,
  IngestOptions,
  IngestSummary,
  ItemFailure,
  ItemOutcome,
  ItemStage,
  ItemState,
  PageFetcher,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger, type PipelineLogger } from '../utils/logger.js';
import { sleep } from '../utils/pacing.js';
import { normalizeArticleUrl } from '../utils/url.js';
import type { ArticleExtractor } from './article-extractor.js';
import { listingPages, type ListingDiscoverer } from './listing-discoverer.js';

export interface IngestDriverDeps {
  store: ArticleStore;
  fetcher: PageFetcher;
  discoverer: ListingDiscoverer;
  extractor: ArticleExtractor;
  logger?: PipelineLogger;
}

export interface IngestDriverOptions {
  /** Pause after every processed article */
  itemDelayMs: number;
  /** Pause after every backfilled row */
  backfillDelayMs: number;
}

const FAILED_STAGE: Record<Exclude<ItemState, 'persisted' | 'failed'>, ItemStage> = {
  pending: 'fetch',
  fetched: 'extract',
  extracted: 'persist',
};

function toKnownKey(url: string): string {
  try {
    return normalizeArticleUrl(url);
  } catch {
    return url;
  }
}

export class IngestDriver {
  private readonly log: PipelineLogger;

  constructor(
    private readonly profile: SourceProfile,
    private readonly deps: IngestDriverDeps,
    private readonly options: IngestDriverOptions
  ) {
    this.log = deps.logger ?? createLogger({ component: 'ingest-driver', source: profile.id });
  }

  /**
   * Discover every listing page, then extract and insert each article not yet stored.
   * Only a failure to read the known URLs from the store aborts the run.
   */
  async runIngest(options: IngestOptions = {}): Promise<IngestSummary> {
    const summary: IngestSummary = {
      source: this.profile.id,
      listings: 0,
      failedListings: 0,
      discovered: 0,
      skippedKnown: 0,
      inserted: 0,
      duplicates: 0,
      failed: 0,
      failures: [],
    };

    const known = await this.seedKnownUrls();
    const listings = options.listings ?? this.profile.listings;
    const pages = listingPages({ listings, pagination: this.profile.pagination }, options.pageRange);

    for (const page of pages) {
      summary.listings++;

      let urls: string[];
      try {
        urls = await this.deps.discoverer.discover(page.url, page.label);
      } catch (error) {
        summary.failedListings++;
        this.log.warn({ err: error, url: page.url, stage: 'discover' }, `Failed listing ${page.url}`);
        summary.failures.push({ url: page.url, stage: 'discover', message: errorMessage(error) });
        continue;
      }

      if (options.limitPerListing !== undefined) {
        urls = urls.slice(0, options.limitPerListing);
      }
      summary.discovered += urls.length;

      for (const url of urls) {
        if (known.has(toKnownKey(url))) {
          this.log.debug({ url }, 'Already scraped');
          summary.skippedKnown++;
          continue;
        }

        const outcome = await this.processArticle(url, page.label, known);
        if (outcome.failure) {
          summary.failed++;
          summary.failures.push(outcome.failure);
        } else if (outcome.inserted) {
          summary.inserted++;
        } else {
          summary.duplicates++;
        }
      }
    }

    this.log.info(
      { ...summary, failures: summary.failures.length },
      `✨ Ingest finished for ${this.profile.name}. Inserted: ${summary.inserted}, Failed: ${summary.failed}`
    );
    return summary;
  }

  /**
   * Ingest a single article URL unless the store already holds it
   */
  async ingestOne(url: string, section: string): Promise<ItemOutcome> {
    const key = toKnownKey(url);
    if (await this.deps.store.exists(this.profile.collection, key)) {
      this.log.info({ url: key }, 'Already scraped');
      return { url: key, state: 'persisted', inserted: false };
    }
    return this.processArticle(url, section, new Set());
  }

  /**
   * Re-fetch every stored article and patch its link classification fields.
   * Only a failure to list the stored rows aborts the run.
   */
  async runBackfill(): Promise<BackfillSummary> {
    const { collection } = this.profile;
    const rows = await this.deps.store.list(collection);
    this.log.info(`Backfilling ${rows.length} rows of ${collection}`);

    const summary: BackfillSummary = {
      source: this.profile.id,
      total: rows.length,
      patched: 0,
      failed: 0,
      failures: [],
    };

    for (const row of rows) {
      let stage: ItemStage = 'fetch';
      try {
        const html = await this.deps.fetcher.fetchHtml(row.url);
        stage = 'extract';
        const fields = this.deps.extractor.deriveLinkFields(row.url, html);
        stage = 'persist';
        await this.deps.store.patchFields(collection, row.id, fields);
        summary.patched++;
      } catch (error) {
        this.log.warn({ err: error, url: row.url, id: row.id, stage }, `Failed URL ${row.url}`);
        summary.failed++;
        summary.failures.push({ url: row.url, stage, message: errorMessage(error) });
      } finally {
        await sleep(this.options.backfillDelayMs);
      }
    }

    this.log.info(
      { ...summary, failures: summary.failures.length },
      `✨ Done backfilling ${collection}. Patched: ${summary.patched}, Failed: ${summary.failed}`
    );
    return summary;
  }

  private async seedKnownUrls(): Promise<Set<string>> {
    const stored = await this.deps.store.listKnownUrls(this.profile.collection);
    const known = new Set(Array.from(stored, toKnownKey));
    this.log.info(`Loaded ${known.size} known URLs from ${this.profile.collection}`);
    return known;
  }

  /**
   * pending -> fetched -> extracted -> persisted, or failed from any step
   */
  private async processArticle(url: string, section: string, known: Set<string>): Promise<ItemOutcome> {
    let state: Exclude<ItemState, 'failed'> = 'pending';

    try {
      const html = await this.deps.fetcher.fetchHtml(url);
      state = 'fetched';

      const record = await this.deps.extractor.extractFromDocument(url, html, section);
      state = 'extracted';

      const inserted = await this.deps.store.upsertIfAbsent(this.profile.collection, record);
      state = 'persisted';

      known.add(record.url);
      this.log.debug({ url: record.url, inserted }, inserted ? 'Inserted' : 'Row already present');
      return { url: record.url, state, inserted };
    } catch (error) {
      const stage = state === 'persisted' ? 'persist' : FAILED_STAGE[state];
      const failure: ItemFailure = { url, stage, message: errorMessage(error) };
      this.log.warn({ err: error, url, stage }, `Failed ${url}`);
      return { url, state: 'failed', inserted: false, failure };
    } finally {
      await sleep(this.options.itemDelayMs);
    }
  }
}
