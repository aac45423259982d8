import type { BoundaryPicker, ChunkingStrategy } from '../types.js';
import { pickBySeparators, preferredLowerBound } from './separators.js';

const HEADING_PATTERNS: RegExp[] = [
  // Markdown headings
  /^#{1,6}\s+\S.*$/gm,
  // Underlined headings (text line followed by === or ---)
  /^\S.*\n[=-]{3,}[ \t]*$/gm,
  // ARTICLE IV, Section 3, CHAPTER 2, Part II
  /^(?:ARTICLE|Article|SECTION|Section|CHAPTER|Chapter|PART|Part)\s+[0-9IVXLC]+\b.*$/gm,
  // I. BACKGROUND
  /^[IVXLC]+\.\s+[A-Z].*$/gm,
  // All-caps caption lines such as "OPINION" or "FINDINGS OF FACT"
  /^[A-Z][A-Z0-9 ,.'&()-]{3,80}$/gm,
];

/**
 * Offsets of every line that opens a section, ascending, excluding 0.
 */
export const detectSectionBoundaries = (text: string): number[] => {
  const boundaries = new Set<number>();
  for (const pattern of HEADING_PATTERNS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      if (match.index > 0) boundaries.add(match.index);
      if (match[0].length === 0) pattern.lastIndex++;
    }
  }
  return [...boundaries].sort((a, b) => a - b);
};

/**
 * Ends chunks just before a section heading when one falls in the window;
 * otherwise behaves like the recursive strategy.
 */
export class StructureAwareStrategy implements ChunkingStrategy {
  readonly name = 'structure' as const;

  prepare(text: string): BoundaryPicker {
    const boundaries = detectSectionBoundaries(text);

    return (window) => {
      for (const lo of [preferredLowerBound(window), window.minEnd]) {
        for (let i = boundaries.length - 1; i >= 0; i--) {
          const boundary = boundaries[i];
          if (boundary > window.maxEnd) continue;
          if (boundary < lo) break;
          return boundary;
        }
      }
      return pickBySeparators(text, window);
    };
  }
}
