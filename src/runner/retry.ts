import { createLogger, type Logger } from '../logging/logger.js';
import { errorMessage } from '../exception/errors.js';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  /** Unit for the `2^attempt` backoff. */
  baseDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `operation` up to `maxRetries + 1` times.
 *
 * After a failed attempt k (k <= maxRetries) waits `2^k * baseDelayMs` before
 * the next one. When the last attempt fails its error is rethrown as is.
 * `label` only tags the log lines.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  maxRetries: number,
  label: string,
  options: RetryOptions = {},
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? createLogger('Retry');
  const totalAttempts = maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    logger.info({ label, attempt, totalAttempts }, `${label}: attempt ${attempt}/${totalAttempts}`);
    try {
      return await operation();
    } catch (error) {
      const willRetry = attempt <= maxRetries;
      logger.warn(
        { label, attempt, willRetry, error: errorMessage(error) },
        `${label}: attempt ${attempt} failed`,
      );
      if (!willRetry) throw error;

      const backoffMs = 2 ** attempt * baseDelayMs;
      logger.info({ label, backoffMs }, `${label}: retrying in ${backoffMs}ms`);
      await sleep(backoffMs);
    }
  }
}
