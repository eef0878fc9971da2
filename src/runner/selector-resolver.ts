import type { Resolution, SelectorCandidates } from '../types/index.js';
import type { Logger } from '../logging/logger.js';

/** Looks up one candidate; `null`/`undefined` means "no match here". */
export type CandidateProbe<T> = (selector: string) => Promise<T | null | undefined>;

/**
 * Try each candidate strictly in order and return the first match.
 * A probe that throws or finds nothing just moves on to the next candidate;
 * candidates after the first match are never probed.
 */
export async function resolveSelector<T>(
  candidates: SelectorCandidates,
  probe: CandidateProbe<T>,
  logger?: Logger,
): Promise<Resolution<T>> {
  const tried: string[] = [];

  for (const selector of candidates) {
    tried.push(selector);
    try {
      const handle = await probe(selector);
      if (handle !== null && handle !== undefined) {
        return { kind: 'Success', selector, handle };
      }
    } catch (error) {
      logger?.debug({ selector, err: error }, 'selector candidate lookup failed');
      continue;
    }
  }

  return { kind: 'NotFound', tried };
}
