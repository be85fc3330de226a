/**
 * Browser Service
 *
 * Headless Chromium driven through playwright-core. One browser and one
 * page serve a whole capture batch.
 */

import { chromium } from 'playwright-core';
import { createLogger } from '../../../shared/logger';

const log = createLogger('browser');

const NAVIGATION_TIMEOUT_MS = 30_000;

export interface CaptureOptions {
  renderDelayMs: number;
  outputPath: string;
}

export interface PreviewBrowser {
  /** Load `url`, wait for it to render, and write a PNG screenshot. */
  capture(url: string, options: CaptureOptions): Promise<{ title: string }>;
  close(): Promise<void>;
}

export type BrowserFactory = () => Promise<PreviewBrowser>;

export interface ChromiumOptions {
  executablePath?: string;
  width: number;
  height: number;
}

export async function launchChromium(options: ChromiumOptions): Promise<PreviewBrowser> {
  const browser = await chromium.launch({
    headless: true,
    executablePath: options.executablePath,
    args: ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu', '--disable-extensions'],
  });
  const context = await browser.newContext({ viewport: { width: options.width, height: options.height } });
  const page = await context.newPage();
  log.info('browser started', { version: browser.version() });

  return {
    async capture(url, { renderDelayMs, outputPath }) {
      await page.goto(url, { waitUntil: 'load', timeout: NAVIGATION_TIMEOUT_MS });
      await page.waitForTimeout(renderDelayMs);
      const title = await page.title();
      await page.screenshot({ path: outputPath });
      return { title };
    },
    async close() {
      await context.close();
      await browser.close();
      log.info('browser closed');
    },
  };
}
