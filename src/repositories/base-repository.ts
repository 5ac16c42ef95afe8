/**
 * Base repository class
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { StoreError } from '../utils/errors.js';

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

export abstract class BaseRepository {
  constructor(
    protected readonly client: SupabaseClient,
    protected readonly batchSize: number
  ) {}

  /**
   * Wrap a PostgREST error so callers always receive an Error instance
   */
  protected storeError(operation: string, error: PostgrestErrorLike): StoreError {
    return new StoreError(`${operation}: ${error.message}`, { code: error.code, cause: error });
  }

  /**
   * Read every row of a paged query, `batchSize` rows at a time
   */
  protected async readAllPages<T>(
    operation: string,
    fetchPage: (from: number, to: number) => PromiseLike<{ data: unknown; error: PostgrestErrorLike | null }>,
    parse: (data: unknown) => T[]
  ): Promise<T[]> {
    const rows: T[] = [];
    for (let from = 0; ; from += this.batchSize) {
      const { data, error } = await fetchPage(from, from + this.batchSize - 1);
      if (error) throw this.storeError(operation, error);

      const page = parse(data ?? []);
      rows.push(...page);
      if (page.length < this.batchSize) break;
    }
    return rows;
  }
}
