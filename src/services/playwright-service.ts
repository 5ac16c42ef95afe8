/**
 * Playwright service for rendered advertisement counts
 */

import { chromium, type Browser } from 'playwright-core';
import type { AdCounter } from '../types/index.js';
import type { AppConfig } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';
import { countAdMarkersInHtml } from './ad-markers.js';

type RenderConfig = Pick<AppConfig, 'renderTimeoutMs' | 'browserExecutablePath' | 'userAgent'>;

export class PlaywrightAdCounter implements AdCounter {
  constructor(
    private readonly config: RenderConfig,
    private readonly extraSelectors: readonly string[] = []
  ) {}

  /**
   * Start a browser for one article
   */
  private launch(): Promise<Browser> {
    return chromium.launch({
      headless: true,
      executablePath: this.config.browserExecutablePath,
    });
  }

  /**
   * Render the page in a fresh browser and count ad containers.
   * The browser is closed before returning or throwing.
   */
  async countAds(url: string): Promise<number | null> {
    const browser = await this.launch();

    try {
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        locale: 'en-US',
        viewport: { width: 1280, height: 2000 },
      });

      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.config.renderTimeoutMs });

      // ad slots are filled after load; a page that never settles is counted as is
      try {
        await page.waitForLoadState('networkidle', { timeout: this.config.renderTimeoutMs });
      } catch (error) {
        logDebug(`Network did not settle for ${url}: ${errorMessage(error)}`);
      }

      const html = await page.content();
      return countAdMarkersInHtml(html, this.extraSelectors);
    } finally {
      await browser.close();
    }
  }
}
