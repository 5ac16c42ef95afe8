/**
 * Article repository for database operations
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  ArticleRecordSchema,
  LinkFieldsSchema,
  StoredArticleRefSchema,
  type ArticleRecord,
  type LinkFields,
  type StoredArticleRef,
} from '../models/schemas.js';
import type { ArticleStore } from '../types/index.js';
import { logError } from '../utils/logger.js';
import { BaseRepository } from './base-repository.js';

const UrlRowsSchema = z.array(z.object({ url: z.string() }));
const StoredRefsSchema = z.array(StoredArticleRefSchema);
const IdRowsSchema = z.array(z.object({ id: z.number() }));

/**
 * Article tables keyed by a unique `url` column. Each source writes to its own
 * table (collection); every call auto-commits.
 */
export class ArticleRepository extends BaseRepository implements ArticleStore {
  constructor(client: SupabaseClient, batchSize: number) {
    super(client, batchSize);
  }

  /**
   * Check if an article exists by URL
   */
  async exists(collection: string, url: string): Promise<boolean> {
    const { count, error } = await this.client
      .from(collection)
      .select('id', { count: 'exact', head: true })
      .eq('url', url);

    if (error) {
      const storeError = this.storeError(`Failed to check article existence by URL: ${url}`, error);
      logError(storeError.message, storeError);
      throw storeError;
    }
    return (count ?? 0) > 0;
  }

  /**
   * Every URL stored in a collection
   */
  async listKnownUrls(collection: string): Promise<Set<string>> {
    const rows = await this.readAllPages(
      `Failed to list URLs of ${collection}`,
      (from, to) =>
        this.client.from(collection).select('url').order('id', { ascending: true }).range(from, to),
      (data) => UrlRowsSchema.parse(data)
    );
    return new Set(rows.map((row) => row.url));
  }

  /**
   * Insert an article unless a row with the same URL exists.
   * Returns true when a row was inserted.
   */
  async upsertIfAbsent(collection: string, record: ArticleRecord): Promise<boolean> {
    const row = ArticleRecordSchema.parse(record);

    const { data, error } = await this.client
      .from(collection)
      .upsert(row, { onConflict: 'url', ignoreDuplicates: true })
      .select('id');

    if (error) {
      const storeError = this.storeError(`Failed to insert article ${row.url}`, error);
      logError(storeError.message, storeError);
      throw storeError;
    }
    return IdRowsSchema.parse(data ?? []).length > 0;
  }

  /**
   * (id, url) of every stored article, in id order
   */
  async list(collection: string): Promise<StoredArticleRef[]> {
    return this.readAllPages(
      `Failed to list articles of ${collection}`,
      (from, to) =>
        this.client.from(collection).select('id, url').order('id', { ascending: true }).range(from, to),
      (data) => StoredRefsSchema.parse(data)
    );
  }

  /**
   * Overwrite the link classification fields of one row
   */
  async patchFields(collection: string, id: number, fields: LinkFields): Promise<void> {
    const { data, error } = await this.client
      .from(collection)
      .update(LinkFieldsSchema.parse(fields))
      .eq('id', id)
      .select('id');

    if (error) {
      const storeError = this.storeError(`Failed to patch article ${id} in ${collection}`, error);
      logError(storeError.message, storeError);
      throw storeError;
    }
    if (IdRowsSchema.parse(data ?? []).length === 0) {
      throw this.storeError(`Failed to patch article ${id} in ${collection}`, {
        message: 'no row with this id',
      });
    }
  }
}
