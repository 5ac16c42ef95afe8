import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { findSourceProfile, loadConfig, loadSourceProfiles } from '../src/utils/config.js';
import { ConfigError } from '../src/utils/errors.js';

const BASE_ENV = {
  SUPABASE_URL: 'https://db.example.test',
  SUPABASE_ROLE_KEY: 'test-secret',
};

function writeSources(content: unknown): string {
  const dir = mkdtempSync(join(tmpdir(), 'sources-'));
  const file = join(dir, 'sources.json');
  writeFileSync(file, JSON.stringify(content));
  return file;
}

const minimalProfile = {
  id: 'site-example',
  name: 'Site Example',
  collection: 'site_example',
  listings: { 'https://site.example/news/': 'news' },
  discovery: { articlePattern: '^https://site\\.example/' },
  content: { bodySelector: 'div.body-copy' },
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(BASE_ENV);

    expect(config).toMatchObject({
      supabaseUrl: 'https://db.example.test',
      supabaseRoleKey: 'test-secret',
      sourcesFile: 'config/sources.json',
      batchSize: 1000,
      acceptLanguage: 'en-US,en;q=0.9',
      pageTimeoutMs: 20000,
      assetTimeoutMs: 15000,
      renderTimeoutMs: 30000,
      listingDelayMs: 800,
      itemDelayMs: 600,
      backfillDelayMs: 500,
      imageDelayMs: 300,
      lazyAttrs: ['data-src', 'data-lazy-src', 'data-original'],
    });
    expect(config.browserExecutablePath).toBeUndefined();
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ ...BASE_ENV, BATCH_SIZE: '50', ITEM_DELAY_MS: '0', IMAGE_DELAY_MS: '150' });

    expect(config.batchSize).toBe(50);
    expect(config.itemDelayMs).toBe(0);
    expect(config.imageDelayMs).toBe(150);
  });

  it('rejects a missing store URL', () => {
    expect(() => loadConfig({ SUPABASE_ROLE_KEY: 'test-secret' })).toThrow(ConfigError);
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => loadConfig({ ...BASE_ENV, PAGE_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });
});

describe('loadSourceProfiles', () => {
  it('loads the bundled profiles', () => {
    const profiles = loadSourceProfiles('config/sources.json');

    expect(profiles.map((p) => p.id)).toEqual(['capital-gazette', 'hyattsville-wire', 'baltimore-sun']);
    expect(profiles[1]?.pagination).toEqual({
      kind: 'paged',
      pageTemplate: '{listing}page/{page}/',
      firstPage: 1,
      lastPage: 40,
    });
    expect(profiles[2]?.fetchStrategy).toBe('crawlee');
  });

  it('fills profile defaults', () => {
    const [profile] = loadSourceProfiles(writeSources([minimalProfile]));

    expect(profile?.fetchStrategy).toBe('fetch');
    expect(profile?.pagination).toEqual({ kind: 'single' });
    expect(profile?.discovery.anchorSelector).toBe('a[href]');
    expect(profile?.content.headlineSelector).toBe('h1.entry-title');
    expect(profile?.adEstimate).toEqual({ mode: 'none', selectors: [] });
  });

  it('rejects an article pattern that is not a regular expression', () => {
    const file = writeSources([{ ...minimalProfile, discovery: { articlePattern: '([' } }]);

    expect(() => loadSourceProfiles(file)).toThrow(ConfigError);
  });

  it('rejects duplicate source ids', () => {
    const file = writeSources([minimalProfile, { ...minimalProfile, collection: 'other' }]);

    expect(() => loadSourceProfiles(file)).toThrow(ConfigError);
  });

  it('rejects a missing file', () => {
    expect(() => loadSourceProfiles(join(tmpdir(), 'no-such-dir', 'sources.json'))).toThrow(
      /Cannot read source profiles/
    );
  });
});

describe('findSourceProfile', () => {
  it('finds a profile by id or names the known ones', () => {
    const profiles = loadSourceProfiles('config/sources.json');

    expect(findSourceProfile(profiles, 'baltimore-sun').collection).toBe('baltimore_sun');
    expect(() => findSourceProfile(profiles, 'nope')).toThrow(
      'Unknown source "nope". Known sources: capital-gazette, hyattsville-wire, baltimore-sun'
    );
  });
});
