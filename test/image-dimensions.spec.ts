import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import {
  decodeDimensions,
  parseDimension,
  resolveImageDimensions,
} from '../src/services/image-dimensions.js';
import { FakePageFetcher } from './helpers/fake-fetcher.js';

describe('parseDimension', () => {
  it('parses plain and pixel-suffixed values', () => {
    expect(parseDimension('640')).toBe(640);
    expect(parseDimension(' 480px ')).toBe(480);
  });

  it('returns null for missing or non-numeric values', () => {
    expect(parseDimension(undefined)).toBeNull();
    expect(parseDimension('auto')).toBeNull();
    expect(parseDimension('')).toBeNull();
  });
});

describe('resolveImageDimensions', () => {
  it('decodes the fetched asset', async () => {
    const jpeg = await sharp({
      create: { width: 12, height: 7, channels: 3, background: { r: 0, g: 0, b: 0 } },
    })
      .jpeg()
      .toBuffer();
    const fetcher = new FakePageFetcher().binary('https://cdn.example/photo.jpg', jpeg);

    await expect(resolveImageDimensions('https://cdn.example/photo.jpg', fetcher, 0)).resolves.toEqual({
      width: 12,
      height: 7,
    });
  });

  it('returns unknown dimensions when the fetch fails', async () => {
    await expect(
      resolveImageDimensions('https://cdn.example/missing.jpg', new FakePageFetcher(), 0)
    ).resolves.toEqual({ width: null, height: null });
  });

  it('returns unknown dimensions for bytes that are not an image', async () => {
    const fetcher = new FakePageFetcher().binary(
      'https://cdn.example/not-an-image',
      Buffer.from('plain text, not pixels')
    );

    await expect(resolveImageDimensions('https://cdn.example/not-an-image', fetcher, 0)).resolves.toEqual({
      width: null,
      height: null,
    });
  });
});

describe('decodeDimensions', () => {
  it('reads svg dimensions', async () => {
    const svg = Buffer.from('<svg xmlns="http://www.w3.org/2000/svg" width="30" height="20"></svg>');
    await expect(decodeDimensions(svg)).resolves.toEqual({ width: 30, height: 20 });
  });
});
