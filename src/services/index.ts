/**
 * Service exports
 */

export { classifyHref, classifyLinks } from './link-classifier.js';
export { ListingDiscoverer, extractArticleLinks, listingPages } from './listing-discoverer.js';
export { ArticleExtractor } from './article-extractor.js';
export { IngestDriver } from './ingest-driver.js';
export { NoopAdCounter, createAdCounter } from './ad-counter.js';
export { countAdMarkers, countAdMarkersInHtml } from './ad-markers.js';
export { PlaywrightAdCounter } from './playwright-service.js';
export { resolveImageDimensions } from './image-dimensions.js';
