import type { BoundaryWindow } from '../types.js';

/** Highest priority first: paragraph, line, sentence, clause, word. */
export const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', '? ', '! ', '; ', ', ', ' '] as const;

/**
 * Cut offset just after the last `separator` that ends inside `[lo, hi]`,
 * or -1.
 */
export const lastSeparatorCut = (text: string, separator: string, lo: number, hi: number): number => {
  const from = hi - separator.length;
  if (from < 0) return -1;
  const idx = text.lastIndexOf(separator, from);
  if (idx < 0) return -1;
  const cut = idx + separator.length;
  return cut >= lo ? cut : -1;
};

/**
 * Lower bound that keeps chunks at least half the window long when a
 * boundary allows it.
 */
export const preferredLowerBound = (window: BoundaryWindow): number =>
  Math.max(window.minEnd, window.start + Math.ceil((window.maxEnd - window.start) / 2));

export const pickBySeparators = (
  text: string,
  window: BoundaryWindow,
  separators: readonly string[] = DEFAULT_SEPARATORS
): number => {
  for (const lo of [preferredLowerBound(window), window.minEnd]) {
    for (const separator of separators) {
      const cut = lastSeparatorCut(text, separator, lo, window.maxEnd);
      if (cut >= 0) return cut;
    }
  }
  return window.maxEnd;
};
