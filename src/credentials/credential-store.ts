import { readFile } from 'node:fs/promises';
import type { CredentialBundle, RawCredentials, SiteConfig } from '../types/index.js';
import { CredentialFileSchema } from '../schemas/credentials.schema.js';
import { ConfigurationError, errorMessage } from '../exception/errors.js';
import { createLogger, type Logger } from '../logging/logger.js';

export interface CredentialSupplier {
  get(): Promise<RawCredentials>;
}

/**
 * Check that every enabled site has a username and password and that a
 * notification address is present. Collects every gap before failing.
 */
export function validateCredentials(
  raw: RawCredentials,
  enabledSites: readonly Pick<SiteConfig, 'id'>[],
): CredentialBundle {
  const issues: string[] = [];
  const sites: CredentialBundle['sites'] = {};

  for (const site of enabledSites) {
    const entry = raw.sites[site.id];
    if (!entry) {
      issues.push(`Missing credentials for site: ${site.id}`);
      continue;
    }
    const { username, password } = entry;
    if (!username) issues.push(`Missing username for site: ${site.id}`);
    if (!password) issues.push(`Missing password for site: ${site.id}`);
    if (username && password) sites[site.id] = { username, password };
  }

  if (!raw.notificationAddress) {
    issues.push('Missing notificationAddress in credentials');
  }

  if (issues.length > 0 || !raw.notificationAddress) {
    throw new ConfigurationError(`Invalid credentials: ${issues.join('; ')}`, issues);
  }

  return { sites, notificationAddress: raw.notificationAddress };
}

export interface FileCredentialSupplierOptions {
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Reads credentials from a JSON secrets file and caches them for `ttlMs`
 * (default 5 minutes). Never writes them anywhere.
 */
export class FileCredentialSupplier implements CredentialSupplier {
  private cache: RawCredentials | null = null;
  private cachedAt = 0;
  private ttlMs: number;
  private now: () => number;
  private logger: Logger;

  constructor(
    private filePath: string,
    options: FileCredentialSupplierOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 300_000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('Credentials');
  }

  async get(): Promise<RawCredentials> {
    if (this.cache && this.now() - this.cachedAt < this.ttlMs) {
      this.logger.debug('using cached credentials');
      return this.cache;
    }

    let data: unknown;
    try {
      data = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read credentials file ${this.filePath}: ${errorMessage(error)}`,
      );
    }

    const parsed = CredentialFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigurationError(`Malformed credentials file: ${issues.join('; ')}`, issues);
    }

    this.cache = parsed.data;
    this.cachedAt = this.now();
    this.logger.info('credentials loaded');
    return parsed.data;
  }

  clearCache(): void {
    this.cache = null;
    this.cachedAt = 0;
  }
}
