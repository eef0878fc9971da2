import type { StepKind } from '../types/index.js';
import { WorkflowStepError, errorMessage } from './errors.js';

/**
 * Map an arbitrary failure escaping a workflow attempt to a step kind.
 * Typed step errors keep their own kind; raw driver errors are matched on
 * their name and message.
 */
export function classifyError(error: unknown): StepKind {
  if (error instanceof WorkflowStepError) return error.kind;

  const text = `${error instanceof Error ? error.name : ''} ${errorMessage(error)}`.toLowerCase();

  if (isVerificationChallenge(text)) {
    return 'AmbiguousVerification';
  }

  if (isTimeout(text)) {
    return 'Timeout';
  }

  if (isTargetNotFound(text)) {
    return 'NotFound';
  }

  return 'Unexpected';
}

function isVerificationChallenge(text: string): boolean {
  const patterns = [
    'captcha',
    'recaptcha',
    'hcaptcha',
    'two-factor',
    '2fa',
    'verification code',
    'multi-factor',
  ];
  return patterns.some((p) => text.includes(p)) || /\botp\b/.test(text);
}

function isTimeout(text: string): boolean {
  return text.includes('timeouterror') || /timeout \d+ms exceeded/.test(text) || text.includes('timed out');
}

function isTargetNotFound(text: string): boolean {
  const patterns = [
    'waiting for selector',
    'waiting for locator',
    'no element found',
    'element not found',
    'could not find',
    'unable to find',
    'strict mode violation',
  ];
  return patterns.some((p) => text.includes(p));
}
