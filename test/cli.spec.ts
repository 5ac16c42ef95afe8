import { describe, expect, it } from 'vitest';
import { UsageError, parseArgs } from '../src/index.js';

describe('parseArgs', () => {
  it('shows help without a command', () => {
    expect(parseArgs([])).toEqual({ kind: 'help' });
    expect(parseArgs(['ingest', '--help'])).toEqual({ kind: 'help' });
  });

  it('parses an ingest run with options', () => {
    expect(parseArgs(['ingest', 'hyattsville-wire', '--limit', '5', '--from-page', '2', '--to-page', '4'])).toEqual({
      kind: 'ingest',
      source: 'hyattsville-wire',
      options: { limitPerListing: 5, pageRange: { from: 2, to: 4 } },
    });
  });

  it('parses a single URL ingest', () => {
    expect(parseArgs(['ingest-url', 'capital-gazette', 'https://site.example/a/'])).toEqual({
      kind: 'ingest-url',
      source: 'capital-gazette',
      url: 'https://site.example/a/',
      section: 'unknown',
    });
    expect(parseArgs(['ingest-url', 'capital-gazette', 'https://site.example/a/', '--section', 'sports'])).toMatchObject({
      section: 'sports',
    });
  });

  it('parses the other commands', () => {
    expect(parseArgs(['sources'])).toEqual({ kind: 'sources' });
    expect(parseArgs(['backfill', 'baltimore-sun'])).toEqual({ kind: 'backfill', source: 'baltimore-sun' });
  });

  it.each([
    [['crawl'], 'Unknown command: crawl'],
    [['ingest'], 'ingest requires a source id'],
    [['ingest', 'x', '--limit', 'many'], '--limit expects a non-negative integer'],
    [['ingest', 'x', '--from-page', '2'], '--from-page and --to-page must be given together'],
    [['ingest', 'x', '--verbose'], 'Unknown option: --verbose'],
    [['ingest-url', 'x'], 'ingest-url requires a source id and a URL'],
  ])('rejects %j', (args, message) => {
    expect(() => parseArgs(args)).toThrow(UsageError);
    expect(() => parseArgs(args)).toThrow(message);
  });
});
