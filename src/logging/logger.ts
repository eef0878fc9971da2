/**
 * Structured logging on pino.
 *
 * One base logger per process; components take a child tagged with
 * `component`. Credential fields are redacted wherever they appear one level
 * deep in a log object.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

const REDACT_PATHS = [
  'password',
  '*.password',
  'username',
  '*.username',
  'apiKey',
  '*.apiKey',
  'credentials',
  '*.credentials',
  'authorization',
  '*.authorization',
];

function createBaseLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: 'profile-refresh' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(options);
}

let baseLogger = createBaseLogger({ level: 'info', prettyPrint: false });

export function configureLogger(config: LoggerConfig): void {
  baseLogger = createBaseLogger(config);
}

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
