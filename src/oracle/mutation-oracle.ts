export interface MutationOracle {
  /** Rewrite `text` with minimal, meaning-preserving changes. May throw. */
  propose(text: string, contextLabel: string): Promise<string>;
}

export function buildMutationPrompt(content: string, contextLabel: string): string {
  const contextPrefix = contextLabel
    ? `Context: This is a ${contextLabel} section of a professional profile.\n\n`
    : '';

  return `${contextPrefix}Original text:
${content}

Task: Make MINIMAL changes to refresh this text while preserving its exact meaning and professional tone. Changes should be subtle and natural, such as:
- Rearranging sentence structure slightly
- Replacing a few words with synonyms
- Adjusting punctuation or formatting
- DO NOT add new information or change the core message
- DO NOT make it longer or shorter by more than 10%
- Keep the same professional level and tone

Provide ONLY the modified text, no explanations or preamble.`;
}

/**
 * Last-resort rewrite used when the oracle fails: toggles the trailing
 * punctuation so the text always differs from the original. Never empty.
 */
export function fallbackMutation(text: string): string {
  if (text === '.') return '!';
  if (text.endsWith('.')) return text.slice(0, -1);
  if (text.endsWith('!')) return `${text.slice(0, -1)}.`;
  return `${text}.`;
}
