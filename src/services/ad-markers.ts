/**
 * Advertisement container heuristics
 */

import * as cheerio from 'cheerio';
import { logWarn } from '../utils/logger.js';

const AD_TOKEN_REGEX = /^(ad|ads|adsbygoogle|advert[\w-]*|ads?[-_][\w-]+|dfp[\w-]*|gpt[-_]ad[\w-]*)$/i;

const AD_NETWORK_HOSTS = [
  'doubleclick.net',
  'googlesyndication.com',
  'adservice.google.',
  'amazon-adsystem.com',
  'adnxs.com',
  'taboola.com',
  'outbrain.com',
  'criteo.com',
  'pubmatic.com',
  'rubiconproject.com',
];

const AD_MARKUP_SELECTORS = [
  'ins.adsbygoogle',
  "[id^='div-gpt-ad']",
  '[data-ad-slot]',
  '[data-ad-unit]',
  '[data-google-query-id]',
];

function hasAdToken(value: string | undefined): boolean {
  if (!value) return false;
  return value.split(/\s+/).some((token) => AD_TOKEN_REGEX.test(token));
}

/**
 * Count distinct elements that look like advertisement containers:
 * ad-like class or id tokens, iframes served by ad networks, advertisement
 * ARIA labels, ad-network markup and any extra profile selectors.
 */
export function countAdMarkers($: cheerio.CheerioAPI, extraSelectors: readonly string[] = []): number {
  // the same node may match several heuristics
  const matches = new Set<unknown>();
  const add = (elem: unknown): void => {
    matches.add(elem);
  };

  $('[class], [id]').each((_, elem) => {
    const $elem = $(elem);
    if (hasAdToken($elem.attr('class')) || hasAdToken($elem.attr('id'))) {
      add(elem);
    }
  });

  $('iframe[src]').each((_, elem) => {
    const src = ($(elem).attr('src') ?? '').toLowerCase();
    if (AD_NETWORK_HOSTS.some((host) => src.includes(host))) {
      add(elem);
    }
  });

  $('[aria-label]').each((_, elem) => {
    if (/advertis/i.test($(elem).attr('aria-label') ?? '')) {
      add(elem);
    }
  });

  for (const selector of [...AD_MARKUP_SELECTORS, ...extraSelectors]) {
    try {
      $(selector).each((_, elem) => add(elem));
    } catch {
      logWarn(`Invalid ad selector: ${selector}`);
    }
  }

  return matches.size;
}

/**
 * Count ad markers in a static HTML document
 */
export function countAdMarkersInHtml(html: string, extraSelectors: readonly string[] = []): number {
  return countAdMarkers(cheerio.load(html), extraSelectors);
}
