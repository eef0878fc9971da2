import type { ExecutionSummary, NotificationConfig } from '../types/index.js';
import { NotificationError, errorMessage } from '../exception/errors.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { HttpClient } from './http-client.js';
import { buildReportText, buildSubject } from './report.js';

export interface Notifier {
  send(summary: ExecutionSummary, address: string): Promise<void>;
}

export interface NotificationPayload {
  to: string;
  subject: string;
  text: string;
  summary: ExecutionSummary;
}

/** Posts the report as JSON to a mail/chat relay. */
export class WebhookNotifier implements Notifier {
  constructor(
    private http: Pick<HttpClient, 'postJson'>,
    private url: string,
    private config: Pick<NotificationConfig, 'subjectPrefix'>,
  ) {}

  async send(summary: ExecutionSummary, address: string): Promise<void> {
    const payload: NotificationPayload = {
      to: address,
      subject: buildSubject(summary, this.config.subjectPrefix),
      text: buildReportText(summary),
      summary,
    };
    try {
      await this.http.postJson(this.url, payload);
    } catch (error) {
      throw new NotificationError(`Failed to deliver notification: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/** Used when no webhook is configured: the report goes to the log instead. */
export class LogNotifier implements Notifier {
  private logger: Logger;

  constructor(
    private config: Pick<NotificationConfig, 'subjectPrefix'>,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('Notifier');
  }

  async send(summary: ExecutionSummary, address: string): Promise<void> {
    this.logger.info(
      { to: address, subject: buildSubject(summary, this.config.subjectPrefix) },
      buildReportText(summary),
    );
  }
}

export function shouldNotify(
  summary: Pick<ExecutionSummary, 'success'>,
  config: Pick<NotificationConfig, 'sendOnSuccess' | 'sendOnFailure'>,
): boolean {
  return summary.success ? config.sendOnSuccess : config.sendOnFailure;
}

/** Sends and logs the outcome. Delivery failures never reach the caller. */
export async function notifySafely(
  notifier: Notifier,
  summary: ExecutionSummary,
  address: string,
  logger: Logger,
): Promise<boolean> {
  try {
    await notifier.send(summary, address);
    logger.info({ success: summary.success }, 'notification sent');
    return true;
  } catch (error) {
    logger.error({ err: error }, 'failed to send notification');
    return false;
  }
}
