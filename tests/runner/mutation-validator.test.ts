import { describe, it, expect } from 'vitest';
import {
  MAX_LENGTH_DRIFT,
  describeMutationRejection,
  validateMutation,
} from '../../src/runner/mutation-validator.js';

describe('validateMutation', () => {
  const original = 'a'.repeat(100);

  it('accepts a changed text within the length tolerance', () => {
    expect(validateMutation(original, 'b'.repeat(110))).toBe(true);
    expect(validateMutation(original, 'b'.repeat(85))).toBe(true);
  });

  it('accepts exactly 15% drift', () => {
    expect(MAX_LENGTH_DRIFT).toBe(0.15);
    expect(validateMutation(original, 'b'.repeat(115))).toBe(true);
  });

  it('rejects more than 15% drift in either direction', () => {
    expect(describeMutationRejection(original, 'b'.repeat(116))).toBe('length_drift');
    expect(describeMutationRejection(original, 'b'.repeat(84))).toBe('length_drift');
  });

  it('rejects an identical text', () => {
    expect(describeMutationRejection('Same words here.', 'Same words here.')).toBe('identical');
    expect(validateMutation('Same words here.', 'Same words here.')).toBe(false);
  });

  it('accepts a same-length rewrite', () => {
    expect(describeMutationRejection('Builds APIs.', 'Builds apis.')).toBeNull();
  });
});
