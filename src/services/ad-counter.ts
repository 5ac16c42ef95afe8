/**
 * Ad counters
 */

import type { SourceProfile } from '../models/schemas.js';
import type { AdCounter } from '../types/index.js';
import type { AppConfig } from '../utils/config.js';
import { PlaywrightAdCounter } from './playwright-service.js';

/**
 * Ad counter for sources without an ad estimate
 */
export class NoopAdCounter implements AdCounter {
  async countAds(): Promise<number | null> {
    return null;
  }
}

/**
 * Build the ad counter for a profile. Only `render` sources need a
 * collaborator; `markup` sources are counted from the fetched document.
 */
export function createAdCounter(
  profile: Pick<SourceProfile, 'adEstimate'>,
  config: Pick<AppConfig, 'renderTimeoutMs' | 'browserExecutablePath' | 'userAgent'>
): AdCounter {
  if (profile.adEstimate.mode === 'render') {
    return new PlaywrightAdCounter(config, profile.adEstimate.selectors);
  }
  return new NoopAdCounter();
}
