import * as cheerio from 'cheerio';
import { describe, expect, it } from 'vitest';
import { NoopAdCounter, createAdCounter } from '../src/services/ad-counter.js';
import { countAdMarkers, countAdMarkersInHtml } from '../src/services/ad-markers.js';
import { PlaywrightAdCounter } from '../src/services/playwright-service.js';

const RENDER_CONFIG = {
  renderTimeoutMs: 1000,
  browserExecutablePath: undefined,
  userAgent: 'test-agent',
};

describe('countAdMarkers', () => {
  it('counts ad-like class and id tokens', () => {
    const html = `
      <div class="ad"></div>
      <div class="sidebar ad-slot-top"></div>
      <div id="advertisement-1"></div>
      <div class="ads_wrapper"></div>
      <div class="header address shadow"></div>
      <div class="add-to-cart"></div>`;

    expect(countAdMarkersInHtml(html)).toBe(4);
  });

  it('counts ad-network iframes and advertisement labels', () => {
    const html = `
      <iframe src="https://securepubads.g.doubleclick.net/gampad/ads?x=1"></iframe>
      <iframe src="https://www.youtube.com/embed/abc"></iframe>
      <section aria-label="Advertisement"></section>
      <nav aria-label="Main navigation"></nav>`;

    expect(countAdMarkersInHtml(html)).toBe(2);
  });

  it('counts each element once even when several heuristics match', () => {
    const html = `<ins class="adsbygoogle" data-ad-slot="123" aria-label="Advertisement"></ins>`;

    expect(countAdMarkersInHtml(html)).toBe(1);
  });

  it('applies extra profile selectors and ignores invalid ones', () => {
    const $ = cheerio.load(`
      <div id="arcad-feature-1"></div>
      <div id="arcad-feature-2"></div>
      <div id="div-gpt-ad-123"></div>`);

    expect(countAdMarkers($, ["div[id^='arcad-feature']", 'div[[broken'])).toBe(3);
  });

  it('returns zero for a page without ads', () => {
    expect(countAdMarkersInHtml('<article class="story"><p>Text</p></article>')).toBe(0);
  });
});

describe('createAdCounter', () => {
  it('uses the no-op counter unless the profile renders', async () => {
    const none = createAdCounter({ adEstimate: { mode: 'none', selectors: [] } }, RENDER_CONFIG);
    const markup = createAdCounter({ adEstimate: { mode: 'markup', selectors: [] } }, RENDER_CONFIG);

    expect(none).toBeInstanceOf(NoopAdCounter);
    expect(markup).toBeInstanceOf(NoopAdCounter);
    await expect(none.countAds('https://site.example/')).resolves.toBeNull();
  });

  it('uses the rendering counter for render profiles', () => {
    const counter = createAdCounter({ adEstimate: { mode: 'render', selectors: [] } }, RENDER_CONFIG);

    expect(counter).toBeInstanceOf(PlaywrightAdCounter);
  });
});
