import type { StepKind, WorkflowState } from '../types/index.js';

/** Missing or malformed configuration/credentials. Aborts the whole run. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A failed step of one site's workflow. Contained by that site's retry envelope. */
export class WorkflowStepError extends Error {
  constructor(
    public readonly kind: StepKind,
    message: string,
    public readonly state?: WorkflowState,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WorkflowStepError';
  }
}

export class OracleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleError';
  }
}

export class NotificationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
