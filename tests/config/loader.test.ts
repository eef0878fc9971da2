import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig, parseConfig } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/exception/errors.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config/sites.json', import.meta.url));

function minimalSite(id: string) {
  return {
    id,
    label: 'Example',
    enabled: true,
    loginUrl: 'https://example.test/login',
    profileUrl: 'https://example.test/profile',
    field: 'Summary',
    contextLabel: 'Example Summary',
    maxRetries: 1,
    selectors: {
      usernameInput: ['#user'],
      passwordInput: ['#pass'],
      submitButton: ['#submit'],
      loginSuccess: ['.feed'],
      loginError: ['.error'],
      profileReady: ['.profile'],
      editButton: ['#edit'],
      fieldInput: ['#summary'],
      saveButton: ['#save'],
    },
  };
}

describe('loadConfig', () => {
  it('loads the shipped site configuration', async () => {
    const config = await loadConfig(SHIPPED_CONFIG);

    expect(config.sites.map((s) => [s.id, s.enabled])).toEqual([
      ['linkedin', true],
      ['naukri', true],
      ['indeed', false],
    ]);
    expect(config.sites.find((s) => s.id === 'naukri')?.writeMode).toBe('type');
    expect(config.sites.find((s) => s.id === 'indeed')?.selectors.continueButton).toEqual([
      'button:has-text("Continue")',
    ]);
    expect(config.execution).toMatchObject({ maxExecutionTimeMs: 270_000, delayBetweenSitesMs: 5000 });
  });

  describe('with a temporary file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'config-test-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('wraps unreadable files in ConfigurationError', async () => {
      await expect(loadConfig(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('wraps invalid JSON in ConfigurationError', async () => {
      const file = join(dir, 'broken.json');
      await writeFile(file, '{ "sites": [');
      await expect(loadConfig(file)).rejects.toThrow(/^Unable to read configuration/);
    });
  });
});

describe('parseConfig', () => {
  it('fills in defaults for the optional sections', () => {
    const config = parseConfig({ sites: [minimalSite('example')] });

    expect(config.sites[0]?.writeMode).toBe('fill');
    expect(config.sites[0]?.selectors.challenge).toEqual([]);
    expect(config.sites[0]?.selectors.editSurface).toEqual([]);
    expect(config.execution).toEqual({
      maxExecutionTimeMs: 270_000,
      delayBetweenSitesMs: 5000,
      loginSettleMs: 5000,
      indicatorTimeoutMs: 15_000,
      saveConfirmTimeoutMs: 5000,
    });
    expect(config.notifications).toEqual({
      sendOnSuccess: false,
      sendOnFailure: true,
      subjectPrefix: 'Profile Refresh',
    });
    expect(config.browser.headless).toBe(true);
    expect(config.oracle.maxTokens).toBe(500);
  });

  it('rejects duplicate site ids', () => {
    expect(() => parseConfig({ sites: [minimalSite('dup'), minimalSite('dup')] })).toThrow(
      'Invalid configuration: sites.1.id: duplicate site id: dup',
    );
  });

  it('rejects an empty candidate list', () => {
    const site = minimalSite('example');
    site.selectors.saveButton = [];

    try {
      parseConfig({ sites: [site] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.issues).toEqual([
        'sites.0.selectors.saveButton: Array must contain at least 1 element(s)',
      ]);
    }
  });

  it('rejects negative retry counts', () => {
    expect(() => parseConfig({ sites: [{ ...minimalSite('example'), maxRetries: -1 }] })).toThrow(ConfigurationError);
  });

  it('reports a missing sites list at its path', () => {
    expect(() => parseConfig({})).toThrow('Invalid configuration: sites: Required');
  });
});
