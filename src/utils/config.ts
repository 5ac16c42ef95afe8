/**
 * Configuration management with validation
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SourceProfileListSchema, type SourceProfile } from '../models/schemas.js';
import { ConfigError } from './errors.js';
import { logError } from './logger.js';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

/**
 * Configuration schema with validation
 */
const ConfigSchema = z.object({
  // Supabase
  supabaseUrl: z.string().url('SUPABASE_URL must be a valid URL'),
  supabaseRoleKey: z.string().min(1, 'SUPABASE_ROLE_KEY is required'),

  // Source profiles
  sourcesFile: z.string().default('config/sources.json'),

  // Page size for store reads
  batchSize: z.coerce.number().int().positive().default(1000),

  // Request identity
  userAgent: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'
    ),
  acceptLanguage: z.string().default('en-US,en;q=0.9'),

  // Timeouts
  pageTimeoutMs: z.coerce.number().int().positive().default(20000),
  assetTimeoutMs: z.coerce.number().int().positive().default(15000),
  renderTimeoutMs: z.coerce.number().int().positive().default(30000),

  // Pacing
  listingDelayMs: intFromEnv(800),
  itemDelayMs: intFromEnv(600),
  backfillDelayMs: intFromEnv(500),
  imageDelayMs: intFromEnv(300),

  // Headless browser used for rendered ad counts
  browserExecutablePath: z.string().min(1).optional(),

  // Lazy loading attributes
  lazyAttrs: z.array(z.string()).default(['data-src', 'data-lazy-src', 'data-original']),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    supabaseUrl: env.SUPABASE_URL,
    supabaseRoleKey: env.SUPABASE_ROLE_KEY,
    sourcesFile: env.SOURCES_FILE || undefined,
    batchSize: env.BATCH_SIZE || undefined,
    userAgent: env.USER_AGENT || undefined,
    acceptLanguage: env.ACCEPT_LANGUAGE || undefined,
    pageTimeoutMs: env.PAGE_TIMEOUT_MS || undefined,
    assetTimeoutMs: env.ASSET_TIMEOUT_MS || undefined,
    renderTimeoutMs: env.RENDER_TIMEOUT_MS || undefined,
    listingDelayMs: env.LISTING_DELAY_MS || undefined,
    itemDelayMs: env.ITEM_DELAY_MS || undefined,
    backfillDelayMs: env.BACKFILL_DELAY_MS || undefined,
    imageDelayMs: env.IMAGE_DELAY_MS || undefined,
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH || undefined,
    lazyAttrs: undefined,
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    logError('Configuration validation failed:');
    result.error.errors.forEach((err) => {
      logError(`  - ${err.path.join('.')}: ${err.message}`);
    });
    throw new ConfigError('Invalid configuration. Please check your environment variables.', {
      cause: result.error,
    });
  }
  return Object.freeze(result.data);
}

/**
 * Load source profiles from a JSON file
 */
export function loadSourceProfiles(filePath: string): SourceProfile[] {
  const absolutePath = resolve(filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read source profiles from ${absolutePath}`, { cause: error });
  }

  const result = SourceProfileListSchema.safeParse(raw);
  if (!result.success) {
    result.error.errors.forEach((err) => {
      logError(`  - sources[${err.path.join('.')}]: ${err.message}`);
    });
    throw new ConfigError(`Invalid source profiles in ${absolutePath}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Find a source profile by id
 */
export function findSourceProfile(profiles: SourceProfile[], id: string): SourceProfile {
  const profile = profiles.find((p) => p.id === id);
  if (!profile) {
    const known = profiles.map((p) => p.id).join(', ');
    throw new ConfigError(`Unknown source "${id}". Known sources: ${known}`);
  }
  return profile;
}
