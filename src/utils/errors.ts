/**
 * Error taxonomy for the ingest pipeline
 */

interface ScrapeErrorOptions {
  url?: string;
  cause?: unknown;
}

/**
 * Base class for every error raised while scraping a page
 */
export class ScrapeError extends Error {
  readonly url?: string;

  constructor(message: string, options: ScrapeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ScrapeError';
    this.url = options.url;
  }
}

/**
 * Transport failure: timeout, DNS, connection reset or non-2xx status
 */
export class FetchError extends ScrapeError {
  readonly status?: number;

  constructor(message: string, options: ScrapeErrorOptions & { status?: number } = {}) {
    super(message, options);
    this.name = 'FetchError';
    this.status = options.status;
  }
}

/**
 * The document could not be parsed at all
 */
export class ParseError extends ScrapeError {
  constructor(message: string, options: ScrapeErrorOptions = {}) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/**
 * A single anchor href that cannot be resolved to a URL.
 * Never escapes the link classifier.
 */
export class ClassificationError extends ScrapeError {
  readonly href: string;

  constructor(href: string, options: ScrapeErrorOptions = {}) {
    super(`Cannot resolve href "${href}"`, options);
    this.name = 'ClassificationError';
    this.href = href;
  }
}

/**
 * Failed read or write against the article store
 */
export class StoreError extends Error {
  readonly code?: string;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StoreError';
    this.code = options.code;
  }
}

export class ConfigError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
