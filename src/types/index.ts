/**
 * Type definitions and interfaces
 */

import type { ArticleRecord, LinkFields, StoredArticleRef } from '../models/schemas.js';

/**
 * Transport used for every outbound request. Implementations throw
 * `FetchError` on timeout, transport failure or a non-2xx status.
 */
export interface PageFetcher {
  fetchHtml(url: string): Promise<string>;
  fetchBinary(url: string): Promise<Buffer>;
}

/**
 * Renders a page and estimates how many advertisement containers it holds.
 * `null` means no estimate is available. Any rendering resource is released
 * before the call settles.
 */
export interface AdCounter {
  countAds(url: string): Promise<number | null>;
}

/**
 * Relational store keyed by article URL. Writes auto-commit per call.
 */
export interface ArticleStore {
  exists(collection: string, url: string): Promise<boolean>;
  listKnownUrls(collection: string): Promise<Set<string>>;
  /** Returns false when a row with this URL already exists */
  upsertIfAbsent(collection: string, record: ArticleRecord): Promise<boolean>;
  list(collection: string): Promise<StoredArticleRef[]>;
  patchFields(collection: string, id: number, fields: LinkFields): Promise<void>;
}

export interface ListingPage {
  url: string;
  label: string;
}

export type ItemState = 'pending' | 'fetched' | 'extracted' | 'persisted' | 'failed';

export type ItemStage = 'discover' | 'fetch' | 'extract' | 'persist';

export interface ItemFailure {
  url: string;
  stage: ItemStage;
  message: string;
}

export interface ItemOutcome {
  url: string;
  state: ItemState;
  inserted: boolean;
  failure?: ItemFailure;
}

export interface IngestOptions {
  /** Listing URL -> section label; defaults to the profile's listings */
  listings?: Record<string, string | null>;
  /** Maximum number of discovered articles processed per listing page */
  limitPerListing?: number;
  /** Overrides the page range of a paged source */
  pageRange?: { from: number; to: number };
}

export interface IngestSummary {
  source: string;
  listings: number;
  failedListings: number;
  discovered: number;
  skippedKnown: number;
  inserted: number;
  duplicates: number;
  failed: number;
  failures: ItemFailure[];
}

export interface BackfillSummary {
  source: string;
  total: number;
  patched: number;
  failed: number;
  failures: ItemFailure[];
}

// Re-export model types for convenience
export type {
  ArticleRecord,
  ImageDescriptor,
  LinkFields,
  SourceProfile,
  StoredArticleRef,
} from '../models/schemas.js';
