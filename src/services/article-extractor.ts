/**
 * Article extraction: turns one article page into an ArticleRecord
 */

import * as cheerio from 'cheerio';
import {
  PublishedTimeSchema,
  UNKNOWN_SECTION,
  type ArticleRecord,
  type ImageDescriptor,
  type LinkFields,
  type SourceProfile,
} from '../models/schemas.js';
import type { AdCounter, PageFetcher } from '../types/index.js';
import { ParseError, errorMessage } from '../utils/errors.js';
import { logWarn } from '../utils/logger.js';
import { countWords } from '../utils/text.js';
import { normalizeArticleUrl, resolveHref } from '../utils/url.js';
import { countAdMarkers } from './ad-markers.js';
import { parseDimension, resolveImageDimensions } from './image-dimensions.js';
import { classifyLinks } from './link-classifier.js';

type ContentProfile = Pick<SourceProfile, 'content'>;

/**
 * Parse a document, raising ParseError only for input that cannot be parsed at all
 */
export function loadDocument(html: string, url: string): cheerio.CheerioAPI {
  if (html.trim() === '') {
    throw new ParseError('Empty document', { url });
  }
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new ParseError(`Unparseable document: ${errorMessage(error)}`, { url, cause: error });
  }
}

/**
 * First matching headline, or '' when the page has none
 */
export function extractHeadline($: cheerio.CheerioAPI, profile: ContentProfile): string {
  return $(profile.content.headlineSelector).first().text().trim();
}

function bodyParagraphs($: cheerio.CheerioAPI, profile: ContentProfile) {
  return $(profile.content.bodySelector).find(profile.content.paragraphSelector);
}

/**
 * Trimmed text of every body paragraph in document order, joined by single spaces
 */
export function extractBodyText($: cheerio.CheerioAPI, profile: ContentProfile): string {
  return bodyParagraphs($, profile)
    .toArray()
    .map((p) => $(p).text().trim())
    .filter((text) => text !== '')
    .join(' ');
}

/**
 * Hrefs of every anchor nested in a body paragraph
 */
export function collectBodyLinks($: cheerio.CheerioAPI, profile: ContentProfile): string[] {
  return bodyParagraphs($, profile)
    .find('a[href]')
    .toArray()
    .map((a) => $(a).attr('href') ?? '');
}

/**
 * Link classification fields for an article document
 */
export function deriveLinkFields(
  $: cheerio.CheerioAPI,
  articleUrl: string,
  profile: ContentProfile
): LinkFields {
  const { internal, external } = classifyLinks(collectBodyLinks($, profile), articleUrl);
  return {
    link_count: internal + external,
    internal_link_count: internal,
    external_link_count: external,
  };
}

/**
 * Publish timestamp from a document metadata field; never guessed.
 * Only ISO-8601 values are accepted.
 */
export function extractPublishDate($: cheerio.CheerioAPI, field: string): string | null {
  const escaped = field.replace(/["\\]/g, '\\$&');
  const content =
    $(`meta[property="${escaped}"]`).first().attr('content') ??
    $(`meta[name="${escaped}"]`).first().attr('content');
  const parsed = PublishedTimeSchema.safeParse(content?.trim());
  if (!parsed.success) {
    return null;
  }

  const date = new Date(parsed.data);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export interface ArticleExtractorOptions {
  adCounter: AdCounter;
  /** Attributes holding the real source of lazily loaded images */
  lazyAttrs: readonly string[];
  /** Pause after every image fetch */
  imageDelayMs: number;
}

export class ArticleExtractor {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly profile: SourceProfile,
    private readonly options: ArticleExtractorOptions
  ) {}

  /**
   * Fetch and extract one article.
   * Throws FetchError when the page cannot be fetched and ParseError when it cannot be parsed.
   */
  async extract(articleUrl: string, section: string = UNKNOWN_SECTION): Promise<ArticleRecord> {
    const html = await this.fetcher.fetchHtml(articleUrl);
    return this.extractFromDocument(articleUrl, html, section);
  }

  /**
   * Extract an already fetched article document
   */
  async extractFromDocument(
    articleUrl: string,
    html: string,
    section: string = UNKNOWN_SECTION
  ): Promise<ArticleRecord> {
    const url = this.normalize(articleUrl);
    const $ = loadDocument(html, url);

    const headline = extractHeadline($, this.profile);
    const bodyText = extractBodyText($, this.profile);
    const links = deriveLinkFields($, url, this.profile);
    const images = await this.extractImages($, url);
    const publishDate = extractPublishDate($, this.profile.content.dateMetaField);
    const adCount = await this.estimateAds($, url);

    return {
      url,
      section: section || UNKNOWN_SECTION,
      headline,
      headline_word_count: countWords(headline),
      publish_date: publishDate,
      body_text: bodyText,
      word_count: countWords(bodyText),
      ...links,
      image_count: images.length,
      images,
      ad_count_estimate: adCount,
      date_scraped: new Date().toISOString(),
    };
  }

  /**
   * Re-derive only the link classification fields of an article document
   */
  deriveLinkFields(articleUrl: string, html: string): LinkFields {
    const url = this.normalize(articleUrl);
    return deriveLinkFields(loadDocument(html, url), url, this.profile);
  }

  private normalize(articleUrl: string): string {
    try {
      return normalizeArticleUrl(articleUrl);
    } catch (error) {
      throw new ParseError(`Invalid article URL: ${articleUrl}`, { url: articleUrl, cause: error });
    }
  }

  private imageSource(attr: (name: string) => string | undefined): string | null {
    const src = attr('src')?.trim();
    if (src) return src;

    for (const name of this.options.lazyAttrs) {
      const lazySrc = attr(name)?.trim();
      if (lazySrc) return lazySrc;
    }
    return null;
  }

  /**
   * Raster images (with markup or decoded dimensions) followed by inline SVGs
   */
  private async extractImages($: cheerio.CheerioAPI, articleUrl: string): Promise<ImageDescriptor[]> {
    const body = $(this.profile.content.bodySelector);
    const images: ImageDescriptor[] = [];

    for (const img of body.find('img').toArray()) {
      const $img = $(img);
      const src = this.imageSource((name) => $img.attr(name));
      if (!src) continue;

      const absoluteSrc = resolveHref(src, articleUrl);
      let width = parseDimension($img.attr('width'));
      let height = parseDimension($img.attr('height'));

      if (width === null || height === null) {
        if (absoluteSrc) {
          ({ width, height } = await resolveImageDimensions(absoluteSrc, this.fetcher, this.options.imageDelayMs));
        } else {
          width = null;
          height = null;
        }
      }

      images.push({
        source_url: absoluteSrc ?? src,
        width,
        height,
        kind: 'raster',
        raw_markup: null,
      });
    }

    body
      .find('svg')
      .filter((_, svg) => $(svg).parents('svg').length === 0)
      .each((_, svg) => {
        images.push({
          source_url: null,
          width: null,
          height: null,
          kind: 'vector',
          raw_markup: $.html(svg),
        });
      });

    return images;
  }

  private async estimateAds($: cheerio.CheerioAPI, articleUrl: string): Promise<number | null> {
    const { mode, selectors } = this.profile.adEstimate;
    if (mode === 'markup') {
      return countAdMarkers($, selectors);
    }

    try {
      return await this.options.adCounter.countAds(articleUrl);
    } catch (error) {
      logWarn(`Ad count unavailable for ${articleUrl}: ${errorMessage(error)}`);
      return null;
    }
  }
}
