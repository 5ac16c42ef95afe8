/**
 * Repository exports
 */

export { BaseRepository } from './base-repository.js';
export { ArticleRepository } from './article-repository.js';
export { createSupabaseClient } from './supabase-client.js';
