import { readFile } from 'node:fs/promises';
import type { AppConfig } from '../types/index.js';
import { AppConfigSchema } from '../schemas/config.schema.js';
import { ConfigurationError, errorMessage } from '../exception/errors.js';

/** Validate an already-parsed config object. */
export function parseConfig(data: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function loadConfig(filePath: string): Promise<AppConfig> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Unable to read configuration ${filePath}: ${errorMessage(error)}`);
  }
  return parseConfig(data);
}
