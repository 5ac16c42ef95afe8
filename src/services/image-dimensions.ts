/**
 * Best-effort image dimension resolution
 */

import sharp from 'sharp';
import type { PageFetcher } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';
import { sleep } from '../utils/pacing.js';

export interface ImageDimensions {
  width: number | null;
  height: number | null;
}

const UNKNOWN_DIMENSIONS: ImageDimensions = { width: null, height: null };

/**
 * Parse a width/height markup attribute such as "640" or "640px"
 */
export function parseDimension(value: string | undefined): number | null {
  if (value === undefined) return null;
  const parsed = Number.parseInt(value.trim(), 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

/**
 * Decode width and height from image bytes
 */
export async function decodeDimensions(buffer: Buffer): Promise<ImageDimensions> {
  const { width, height } = await sharp(buffer).metadata();
  if (width === undefined || height === undefined) {
    return UNKNOWN_DIMENSIONS;
  }
  return { width, height };
}

/**
 * Fetch an image and decode its dimensions, pausing `delayMs` after the fetch.
 * Any failure, transport or decoding, yields unknown dimensions.
 */
export async function resolveImageDimensions(
  src: string,
  fetcher: PageFetcher,
  delayMs: number
): Promise<ImageDimensions> {
  let buffer: Buffer;
  try {
    buffer = await fetcher.fetchBinary(src);
  } catch (error) {
    logDebug(`Could not fetch image ${src}: ${errorMessage(error)}`);
    return UNKNOWN_DIMENSIONS;
  } finally {
    await sleep(delayMs);
  }

  try {
    return await decodeDimensions(buffer);
  } catch (error) {
    logDebug(`Could not decode dimensions for ${src}: ${errorMessage(error)}`);
    return UNKNOWN_DIMENSIONS;
  }
}
