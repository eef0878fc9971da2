import type { Resolution, SelectorCandidates, WriteMode } from '../types/index.js';
import type { Logger } from '../logging/logger.js';
import { resolveSelector } from '../runner/selector-resolver.js';
import type { BrowserDriver, DriverElement } from './browser-driver.js';

export interface PlaywrightPage {
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit' }): Promise<unknown>;
  locator(selector: string): PlaywrightLocator;
  screenshot(options?: { fullPage?: boolean }): Promise<Buffer>;
  waitForTimeout(timeout: number): Promise<void>;
  keyboard: { press(key: string): Promise<void> };
}

export interface PlaywrightLocator {
  first(): PlaywrightLocator;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  click(options?: { clickCount?: number }): Promise<void>;
  fill(value: string): Promise<void>;
  pressSequentially(text: string, options?: { delay?: number }): Promise<void>;
  inputValue(): Promise<string>;
  textContent(): Promise<string | null>;
}

export interface PlaywrightDriverOptions {
  /** Per-character typing delay range, ms. */
  typingDelayMs?: [number, number];
  /** Range for `pause()` without an explicit duration, ms. */
  pauseRangeMs?: [number, number];
  pollIntervalMs?: number;
  random?: () => number;
  logger?: Logger;
}

function between(random: () => number, [min, max]: [number, number]): number {
  return Math.round(min + random() * (max - min));
}

class PlaywrightElement implements DriverElement {
  constructor(
    readonly selector: string,
    private locator: PlaywrightLocator,
    private driver: PlaywrightDriver,
  ) {}

  async click(): Promise<void> {
    await this.locator.click();
  }

  async readValue(): Promise<string> {
    return this.locator.inputValue();
  }

  async readText(): Promise<string> {
    return (await this.locator.textContent()) ?? '';
  }

  async type(text: string): Promise<void> {
    await this.locator.click();
    await this.driver.pause(500);
    await this.locator.pressSequentially(text, { delay: this.driver.typingDelay() });
    await this.driver.pause(300);
  }

  async replace(text: string, mode: WriteMode): Promise<void> {
    if (mode === 'fill') {
      await this.locator.fill('');
      await this.driver.pause(500);
      await this.locator.fill(text);
      return;
    }

    // Select-all then delete, for editors that ignore programmatic fill.
    await this.locator.click({ clickCount: 3 });
    await this.driver.pause(500);
    await this.driver.pressKey('Backspace');
    await this.driver.pause(500);
    await this.locator.pressSequentially(text, { delay: 50 });
  }
}

export class PlaywrightDriver implements BrowserDriver {
  private typingDelayMs: [number, number];
  private pauseRangeMs: [number, number];
  private pollIntervalMs: number;
  private random: () => number;

  constructor(
    private page: PlaywrightPage,
    private options: PlaywrightDriverOptions = {},
  ) {
    this.typingDelayMs = options.typingDelayMs ?? [50, 150];
    this.pauseRangeMs = options.pauseRangeMs ?? [1000, 3000];
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.random = options.random ?? Math.random;
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'load' });
  }

  async resolve(candidates: SelectorCandidates): Promise<Resolution<DriverElement>> {
    return resolveSelector<DriverElement>(
      candidates,
      async (selector) => {
        const locator = this.page.locator(selector).first();
        if ((await locator.count()) === 0) return null;
        if (!(await locator.isVisible())) return null;
        return new PlaywrightElement(selector, locator, this);
      },
      this.options.logger,
    );
  }

  async waitFor(candidates: SelectorCandidates, timeoutMs: number): Promise<Resolution<DriverElement>> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const resolution = await this.resolve(candidates);
      if (resolution.kind === 'Success' || Date.now() >= deadline) return resolution;
      await this.page.waitForTimeout(this.pollIntervalMs);
    }
  }

  async waitForGone(candidates: SelectorCandidates, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const resolution = await this.resolve(candidates);
      if (resolution.kind === 'NotFound') return true;
      if (Date.now() >= deadline) return false;
      await this.page.waitForTimeout(this.pollIntervalMs);
    }
  }

  async screenshot(): Promise<Buffer> {
    return this.page.screenshot({ fullPage: true });
  }

  async pause(ms?: number): Promise<void> {
    await this.page.waitForTimeout(ms ?? between(this.random, this.pauseRangeMs));
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  typingDelay(): number {
    return between(this.random, this.typingDelayMs);
  }
}
