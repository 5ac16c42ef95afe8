#!/usr/bin/env node
/**
 * Command line entry point for ingest and backfill runs
 */

import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { UNKNOWN_SECTION, type SourceProfile } from './models/schemas.js';
import { ArticleRepository, createSupabaseClient } from './repositories/index.js';
import {
  ArticleExtractor,
  IngestDriver,
  ListingDiscoverer,
  createAdCounter,
} from './services/index.js';
import type { ArticleStore, IngestOptions } from './types/index.js';
import {
  findSourceProfile,
  loadConfig,
  loadSourceProfiles,
  type AppConfig,
} from './utils/config.js';
import { logger, logInfo, logSuccess } from './utils/logger.js';
import { createPageFetcher } from './utils/smart-http-client.js';

const USAGE = `Usage:
  news-ingest sources
  news-ingest ingest <source> [--limit N] [--from-page N] [--to-page N]
  news-ingest ingest-url <source> <url> [--section LABEL]
  news-ingest backfill <source>`;

export type CliCommand =
  | { kind: 'sources' }
  | { kind: 'ingest'; source: string; options: IngestOptions }
  | { kind: 'ingest-url'; source: string; url: string; section: string }
  | { kind: 'backfill'; source: string }
  | { kind: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(`${message}\n\n${USAGE}`);
    this.name = 'UsageError';
  }
}

function parseCount(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? Number.NaN : Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`${flag} expects a non-negative integer`);
  }
  return parsed;
}

/**
 * Parse command line arguments (without the node and script path)
 */
export function parseArgs(args: string[]): CliCommand {
  const positional: string[] = [];
  let limit: number | undefined;
  let fromPage: number | undefined;
  let toPage: number | undefined;
  let section: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else if (arg === '--limit') {
      limit = parseCount(arg, args[++i]);
    } else if (arg === '--from-page') {
      fromPage = parseCount(arg, args[++i]);
    } else if (arg === '--to-page') {
      toPage = parseCount(arg, args[++i]);
    } else if (arg === '--section') {
      section = args[++i];
      if (!section) throw new UsageError('--section expects a label');
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const command: string | undefined = positional[0];
  const source: string | undefined = positional[1];
  const url: string | undefined = positional[2];
  switch (command) {
    case undefined:
      return { kind: 'help' };
    case 'sources':
      return { kind: 'sources' };
    case 'ingest': {
      if (!source) throw new UsageError('ingest requires a source id');
      const options: IngestOptions = {};
      if (limit !== undefined) options.limitPerListing = limit;
      if (fromPage !== undefined || toPage !== undefined) {
        if (fromPage === undefined || toPage === undefined) {
          throw new UsageError('--from-page and --to-page must be given together');
        }
        options.pageRange = { from: fromPage, to: toPage };
      }
      return { kind: 'ingest', source, options };
    }
    case 'ingest-url':
      if (!source || !url) throw new UsageError('ingest-url requires a source id and a URL');
      return { kind: 'ingest-url', source, url, section: section ?? UNKNOWN_SECTION };
    case 'backfill':
      if (!source) throw new UsageError('backfill requires a source id');
      return { kind: 'backfill', source };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

/**
 * Wire the pipeline components for one source
 */
export function createDriver(profile: SourceProfile, appConfig: AppConfig, store: ArticleStore): IngestDriver {
  const fetcher = createPageFetcher(appConfig, profile.fetchStrategy);
  const adCounter = createAdCounter(profile, appConfig);
  const discoverer = new ListingDiscoverer(fetcher, profile, { delayMs: appConfig.listingDelayMs });
  const extractor = new ArticleExtractor(fetcher, profile, {
    adCounter,
    lazyAttrs: appConfig.lazyAttrs,
    imageDelayMs: appConfig.imageDelayMs,
  });

  return new IngestDriver(
    profile,
    { store, fetcher, discoverer, extractor },
    { itemDelayMs: appConfig.itemDelayMs, backfillDelayMs: appConfig.backfillDelayMs }
  );
}

/**
 * Main process
 */
export async function run(args: string[]): Promise<void> {
  const command = parseArgs(args);
  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const appConfig = loadConfig();
  const profiles = loadSourceProfiles(appConfig.sourcesFile);

  if (command.kind === 'sources') {
    for (const profile of profiles) {
      console.log(`${profile.id}\t${profile.collection}\t${profile.name}`);
    }
    return;
  }

  const profile = findSourceProfile(profiles, command.source);
  const store = new ArticleRepository(createSupabaseClient(appConfig), appConfig.batchSize);
  const driver = createDriver(profile, appConfig, store);

  logInfo(`🚀 Starting ${command.kind} for ${profile.name}...`);
  switch (command.kind) {
    case 'ingest': {
      const summary = await driver.runIngest(command.options);
      console.log(`New articles scraped: ${summary.inserted}`);
      break;
    }
    case 'ingest-url': {
      const outcome = await driver.ingestOne(command.url, command.section);
      console.log(`${outcome.url}: ${outcome.state}${outcome.inserted ? ' (inserted)' : ''}`);
      break;
    }
    case 'backfill': {
      const summary = await driver.runBackfill();
      console.log(`Rows patched: ${summary.patched}/${summary.total}`);
      break;
    }
  }
  logSuccess('Process finished.');
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  run(process.argv.slice(2)).catch((error) => {
    if (error instanceof UsageError) {
      console.error(error.message);
      process.exit(2);
    }
    logger.fatal({ err: error }, 'Unhandled error in main process');
    process.exit(1);
  });
}
