import { chromium } from 'playwright';
import type { BrowserConfig } from '../types/index.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { BrowserSession, SessionFactory } from './browser-driver.js';
import { PlaywrightDriver } from './playwright-driver.js';

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
];

/** Launches a fresh headless Chromium per session; nothing is shared between sessions. */
export class PlaywrightSessionFactory implements SessionFactory {
  private logger: Logger;

  constructor(
    private config: BrowserConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('Browser');
  }

  async open(): Promise<BrowserSession> {
    this.logger.debug('launching browser');
    const browser = await chromium.launch({
      headless: this.config.headless,
      slowMo: this.config.slowMoMs,
      args: LAUNCH_ARGS,
    });

    try {
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: this.config.viewport,
        locale: this.config.locale,
        timezoneId: this.config.timezoneId,
      });
      context.setDefaultTimeout(this.config.timeoutMs);
      context.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);

      const page = await context.newPage();
      this.logger.info('browser launched');

      return {
        driver: new PlaywrightDriver(page, { logger: this.logger }),
        close: async () => {
          await browser.close();
          this.logger.debug('browser closed');
        },
      };
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        this.logger.warn({ err: closeError }, 'failed to close browser after setup error');
      });
      throw error;
    }
  }
}
