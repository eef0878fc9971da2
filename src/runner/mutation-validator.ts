/** Largest accepted relative change in length between original and mutated text. */
export const MAX_LENGTH_DRIFT = 0.15;

export type MutationRejection = 'length_drift' | 'identical';

export function describeMutationRejection(original: string, mutated: string): MutationRejection | null {
  const drift = Math.abs(mutated.length - original.length) / original.length;
  if (drift > MAX_LENGTH_DRIFT) return 'length_drift';
  if (mutated === original) return 'identical';
  return null;
}

/** Accepts a mutation that changes the text and keeps its length within 15%. */
export function validateMutation(original: string, mutated: string): boolean {
  return describeMutationRejection(original, mutated) === null;
}
