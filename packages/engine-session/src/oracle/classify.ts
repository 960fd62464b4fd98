import type { Logger } from 'pino';
import type { Oracle } from './types.js';

/** Normalize a completion for label matching: trimmed, lower-cased, trailing period dropped. */
export function normalizeLabel(completion: string): string {
  return completion.trim().toLowerCase().replace(/\.$/, '');
}

/**
 * Ask the oracle and return its completion, or null when it rejects or
 * returns only whitespace.
 */
export async function ask(oracle: Oracle, prompt: string, logger: Logger): Promise<string | null> {
  try {
    const completion = await oracle(prompt);
    const text = completion.trim();
    return text.length > 0 ? text : null;
  } catch (err) {
    logger.warn({ err }, 'oracle call failed');
    return null;
  }
}

/**
 * Classification-style oracle call. The completion must match one of
 * `labels` exactly (after normalization); anything else is unclassified (null).
 */
export async function classify<L extends string>(
  oracle: Oracle,
  prompt: string,
  labels: readonly L[],
  logger: Logger,
): Promise<L | null> {
  const completion = await ask(oracle, `${prompt}\nAnswer with exactly one of: ${labels.join(', ')}.`, logger);
  if (completion === null) return null;
  const normalized = normalizeLabel(completion);
  const label = labels.find((l) => l === normalized);
  if (label === undefined) {
    logger.warn({ completion }, 'oracle output outside label set');
    return null;
  }
  return label;
}
