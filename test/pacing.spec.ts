import { beforeEach, describe, expect, it, vi } from 'vitest';

const { sleepMock } = vi.hoisted(() => ({
  sleepMock: vi.fn(async (_ms: number) => undefined),
}));

vi.mock('../src/utils/pacing.js', () => ({ sleep: sleepMock }));

import { NoopAdCounter } from '../src/services/ad-counter.js';
import { ArticleExtractor } from '../src/services/article-extractor.js';
import { FakePageFetcher } from './helpers/fake-fetcher.js';
import {
  COLLECTION,
  NEWS,
  SPORTS,
  listingHtml,
  serveStories,
  setupDriver,
  storyUrl,
} from './helpers/driver.js';
import { articlePage, makeProfile, storedRecord } from './helpers/profiles.js';

const DELAYS = { listingDelayMs: 800, itemDelayMs: 600, backfillDelayMs: 500, imageDelayMs: 300 };

function pauses(): number[] {
  return sleepMock.mock.calls.map(([ms]) => ms);
}

describe('request pacing', () => {
  beforeEach(() => {
    sleepMock.mockClear();
  });

  it('pauses after the listing fetch and after every article, failed or not', async () => {
    const { fetcher, driver } = setupDriver(makeProfile(), DELAYS);
    fetcher.page(NEWS, listingHtml([1, 2, 3].map(storyUrl)));
    serveStories(fetcher, [1, 3]);

    const summary = await driver.runIngest();

    expect(summary.failed).toBe(1);
    expect(pauses()).toEqual([800, 600, 600, 600]);
  });

  it('does not pause for articles that are already stored', async () => {
    const { store, fetcher, driver } = setupDriver(makeProfile(), DELAYS);
    store.seed(COLLECTION, storedRecord(storyUrl(1)));
    fetcher.page(NEWS, listingHtml([storyUrl(1), storyUrl(2)]));
    serveStories(fetcher, [2]);

    await driver.runIngest();

    expect(pauses()).toEqual([800, 600]);
  });

  it('pauses after a listing fetch that failed', async () => {
    const { driver } = setupDriver(makeProfile({ listings: { [NEWS]: 'news', [SPORTS]: 'sports' } }), DELAYS);

    const summary = await driver.runIngest();

    expect(summary.failedListings).toBe(2);
    expect(pauses()).toEqual([800, 800]);
  });

  it('pauses after every backfilled row, failed or not', async () => {
    const { store, fetcher, driver } = setupDriver(makeProfile(), DELAYS);
    store.seed(COLLECTION, storedRecord(storyUrl(1)));
    store.seed(COLLECTION, storedRecord(storyUrl(2)));
    serveStories(fetcher, [2]);

    const summary = await driver.runBackfill();

    expect(summary.failed).toBe(1);
    expect(pauses()).toEqual([500, 500]);
  });

  it('pauses after every image fetch, failed or not', async () => {
    const url = 'https://site.example/2026/01/01/story-1/';
    const fetcher = new FakePageFetcher().binary('https://site.example/a.png', Buffer.from('not an image'));
    const extractor = new ArticleExtractor(fetcher, makeProfile(), {
      adCounter: new NoopAdCounter(),
      lazyAttrs: [],
      imageDelayMs: 300,
    });
    const html = articlePage({
      extraBody: '<img src="/a.png"><img src="/b.png"><img src="/c.png" width="4" height="3">',
    });

    const record = await extractor.extractFromDocument(url, html, 'news');

    expect(record.image_count).toBe(3);
    expect(fetcher.requested).toEqual(['https://site.example/a.png', 'https://site.example/b.png']);
    expect(pauses()).toEqual([300, 300]);
  });
});
