import { vi, type Mock } from 'vitest';
import type { BrowserDriver, BrowserSession, DriverElement, SessionFactory } from '../../src/engines/browser-driver.js';
import type { Resolution, SelectorCandidates, SiteConfig, WriteMode } from '../../src/types/index.js';

export interface FakeElement extends DriverElement {
  click: Mock<() => Promise<void>>;
  type: Mock<(text: string) => Promise<void>>;
  replace: Mock<(text: string, mode: WriteMode) => Promise<void>>;
}

export function fakeElement(selector: string, value = '', text = ''): FakeElement {
  return {
    selector,
    click: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    readValue: vi.fn<() => Promise<string>>().mockResolvedValue(value),
    readText: vi.fn<() => Promise<string>>().mockResolvedValue(text),
    type: vi.fn<(text: string) => Promise<void>>().mockResolvedValue(undefined),
    replace: vi.fn<(text: string, mode: WriteMode) => Promise<void>>().mockResolvedValue(undefined),
  };
}

/**
 * In-memory page: a selector is "present" when it has an element in the
 * map. Elements can be added or removed while a workflow runs.
 */
export class FakeDriver implements BrowserDriver {
  readonly elements = new Map<string, FakeElement>();
  readonly visited: string[] = [];
  readonly navigate = vi.fn(async (url: string) => {
    this.visited.push(url);
  });
  readonly screenshot = vi.fn(async () => Buffer.from('png'));
  readonly pause = vi.fn(async (_ms?: number) => {});
  /** Selectors that stay present even after `waitForGone`. */
  readonly sticky = new Set<string>();

  add(selector: string, value = '', text = ''): FakeElement {
    const element = fakeElement(selector, value, text);
    this.elements.set(selector, element);
    return element;
  }

  async resolve(candidates: SelectorCandidates): Promise<Resolution<DriverElement>> {
    const tried: string[] = [];
    for (const selector of candidates) {
      tried.push(selector);
      const handle = this.elements.get(selector);
      if (handle) return { kind: 'Success', selector, handle };
    }
    return { kind: 'NotFound', tried };
  }

  async waitFor(candidates: SelectorCandidates, _timeoutMs: number): Promise<Resolution<DriverElement>> {
    return this.resolve(candidates);
  }

  async waitForGone(candidates: SelectorCandidates, _timeoutMs: number): Promise<boolean> {
    return !candidates.some((selector) => this.sticky.has(selector));
  }
}

export function fakeSessions(driver: BrowserDriver): SessionFactory & {
  open: Mock<() => Promise<BrowserSession>>;
  close: Mock<() => Promise<void>>;
} {
  const close = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const open = vi.fn<() => Promise<BrowserSession>>().mockResolvedValue({ driver, close });
  return { open, close };
}

export function makeSite(overrides: Partial<SiteConfig> = {}): SiteConfig {
  return {
    id: 'example',
    label: 'Example',
    enabled: true,
    loginUrl: 'https://example.test/login',
    profileUrl: 'https://example.test/profile',
    field: 'Summary',
    contextLabel: 'Example Summary',
    maxRetries: 2,
    writeMode: 'fill',
    selectors: {
      usernameInput: ['#user'],
      passwordInput: ['#pass'],
      submitButton: ['#submit'],
      loginSuccess: ['.feed'],
      loginError: ['.error'],
      challenge: ['#captcha'],
      profileReady: ['.profile'],
      editButton: ['#edit'],
      fieldInput: ['#summary-old', '#summary'],
      saveButton: ['#save'],
      editSurface: ['.dialog'],
    },
    ...overrides,
  };
}

/** A page on which every step of the happy path succeeds. */
export function happyPage(driver: FakeDriver, content: string): void {
  driver.add('#user');
  driver.add('#pass');
  driver.add('#submit');
  driver.add('.feed');
  driver.add('.profile');
  driver.add('#edit');
  driver.add('#summary', content);
  driver.add('#save');
}
