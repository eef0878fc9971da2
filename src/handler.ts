import type { ExecutionSummary, NotificationConfig } from './types/index.js';
import type { CredentialSupplier } from './credentials/credential-store.js';
import type { Orchestrator } from './runner/orchestrator.js';
import { notifySafely, shouldNotify, type Notifier } from './notify/notifier.js';
import { errorMessage } from './exception/errors.js';
import { createLogger, type Logger } from './logging/logger.js';

export interface RunEnvelope {
  statusCode: 200 | 500;
  body: {
    message: string;
    summary?: ExecutionSummary;
    error?: string;
  };
}

/** Envelope for a run that could not complete, including failures before it started. */
export function failureEnvelope(error: unknown): RunEnvelope {
  return {
    statusCode: 500,
    body: {
      message: 'Profile refresh failed',
      error: errorMessage(error),
    },
  };
}

export interface RefreshDeps {
  credentials: CredentialSupplier;
  orchestrator: Pick<Orchestrator, 'run'>;
  notifier: Notifier;
  notifications: Pick<NotificationConfig, 'sendOnSuccess' | 'sendOnFailure'>;
  now?: () => number;
  logger?: Logger;
}

/**
 * One scheduled run: fetch credentials, update every enabled site, notify.
 * Site failures give a 200 with a failed summary; only fatal errors
 * (configuration, credentials) give a 500.
 */
export async function runRefresh(deps: RefreshDeps): Promise<RunEnvelope> {
  const logger = deps.logger ?? createLogger('Handler');
  const now = deps.now ?? Date.now;
  const startedAt = now();
  let notificationAddress: string | undefined;

  logger.info('profile refresh started');

  try {
    const credentials = await deps.credentials.get();
    notificationAddress = credentials.notificationAddress;

    const summary = await deps.orchestrator.run(credentials);

    if (notificationAddress && shouldNotify(summary, deps.notifications)) {
      await notifySafely(deps.notifier, summary, notificationAddress, logger);
    }

    return {
      statusCode: 200,
      body: {
        message: summary.success ? 'All sites updated successfully' : 'Some sites failed to update',
        summary,
      },
    };
  } catch (error) {
    logger.error({ err: error }, 'fatal error in profile refresh');

    if (notificationAddress && deps.notifications.sendOnFailure) {
      const endedAt = now();
      const summary: ExecutionSummary = Object.freeze({
        success: false,
        results: Object.freeze([
          Object.freeze({ site: 'System', success: false, durationMs: 0, error: errorMessage(error) }),
        ]),
        startedAt,
        endedAt,
        totalDurationMs: endedAt - startedAt,
      });
      await notifySafely(deps.notifier, summary, notificationAddress, logger);
    }

    return failureEnvelope(error);
  }
}
