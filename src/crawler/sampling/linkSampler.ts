import { SamplingMode } from '../../types.js';

export interface SamplingOptions {
  mode?: SamplingMode;
  random?: () => number;
}

/**
 * Reduces one page's extracted links to roughly `percentage`% of them.
 *
 * `probabilistic` keeps each link independently with probability P/100.
 * `truncate` keeps the first floor(n * P / 100) links in document order.
 * Both admit nothing at 0 and everything at 100.
 */
export function sampleLinks<T>(
  candidates: readonly T[],
  percentage: number,
  options: SamplingOptions = {},
): T[] {
  const { mode = 'probabilistic', random = Math.random } = options;

  if (percentage <= 0 || candidates.length === 0) {
    return [];
  }

  if (percentage >= 100) {
    return [...candidates];
  }

  if (mode === 'truncate') {
    return candidates.slice(0, Math.floor((candidates.length * percentage) / 100));
  }

  return candidates.filter(() => random() * 100 < percentage);
}
