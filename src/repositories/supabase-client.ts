/**
 * Supabase client factory
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

/**
 * Create a service-role Supabase client. One client per run, passed to the
 * repositories that need it.
 */
export function createSupabaseClient(
  config: Pick<AppConfig, 'supabaseUrl' | 'supabaseRoleKey'>
): SupabaseClient {
  logger.info('Initializing Supabase client');
  return createClient(config.supabaseUrl, config.supabaseRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
