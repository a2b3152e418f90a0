/**
 * Browser collaborators
 *
 * - URL opening goes through xdg-open.
 * - Visual search drives a locally installed Chrome/Chromium through
 *   puppeteer-core to the Google Lens upload form, then leaves the window
 *   open for the user.
 */

import { access } from 'node:fs/promises';
import puppeteer from 'puppeteer-core';
import type {
  BrowserConfig,
  BrowserOpener,
  CommandRunner,
  VisualSearchService,
} from '../0_types.js';
import { errorMessage } from '../errors.js';
import { log } from '../pipeline/context.js';

const USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const CHROME_CANDIDATES = [
  '/usr/bin/google-chrome-stable',
  '/usr/bin/google-chrome',
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/brave-browser',
  '/snap/bin/chromium',
];

export async function findChrome(
  config: Pick<BrowserConfig, 'chromePath'>,
  candidates: readonly string[] = CHROME_CANDIDATES
): Promise<string | null> {
  const paths = config.chromePath ? [config.chromePath] : candidates;
  for (const candidate of paths) {
    const exists = await access(candidate).then(
      () => true,
      () => false
    );
    if (exists) return candidate;
  }
  return null;
}

export function createXdgBrowserOpener(runner: CommandRunner): BrowserOpener {
  return {
    open: async (url) => {
      const result = await runner.run('xdg-open', [url], { timeoutMs: 10000 });
      if (!result.ok) {
        log('warn', `Could not open browser (${result.reason}). URL: ${url}`);
      }
      return result.ok;
    },
  };
}

export function createLensVisualSearch(config: BrowserConfig): VisualSearchService {
  return {
    upload: async (imagePath) => {
      const executablePath = await findChrome(config);
      if (!executablePath) {
        log('error', 'No Chrome/Chromium found; set LASSO_CHROME_PATH');
        return false;
      }

      log('info', 'Uploading to Google Lens...');
      const browser = await puppeteer.launch({
        executablePath,
        headless: false,
        defaultViewport: null,
        args: ['--no-first-run', '--no-default-browser-check'],
      });

      try {
        const [page] = await browser.pages();
        const tab = page ?? (await browser.newPage());
        await tab.setUserAgent(USER_AGENT);
        await tab.goto(config.lensUrl, { waitUntil: 'domcontentloaded' });

        const input = await tab.waitForSelector('input[type="file"]', {
          timeout: config.uploadTimeoutMs,
        });
        if (!input) {
          log('error', 'Lens upload form not found');
          return false;
        }

        await Promise.all([
          tab.waitForNavigation({
            waitUntil: 'domcontentloaded',
            timeout: config.uploadTimeoutMs,
          }),
          input.uploadFile(imagePath),
        ]);

        log('info', 'Upload successful! The browser will stay open.');
        return true;
      } catch (error) {
        log('error', `Lens upload failed: ${errorMessage(error)}`);
        return false;
      } finally {
        await browser.disconnect();
      }
    },
  };
}
