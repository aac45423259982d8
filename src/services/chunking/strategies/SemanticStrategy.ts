import type { BoundaryPicker, ChunkingStrategy } from '../types.js';
import { pickBySeparators, preferredLowerBound } from './separators.js';

interface ScoredBoundary {
  offset: number;
  similarity: number;
}

const SENTENCE_END = /[.!?]["')\]]*\s+|\n{2,}/g;
const WORD = /[a-z][a-z'-]{2,}/g;

type TermVector = Map<string, number>;

const termVector = (sentences: string[]): TermVector => {
  const vector: TermVector = new Map();
  for (const sentence of sentences) {
    for (const word of sentence.toLowerCase().match(WORD) ?? []) {
      vector.set(word, (vector.get(word) ?? 0) + 1);
    }
  }
  return vector;
};

export const cosineSimilarity = (a: TermVector, b: TermVector): number => {
  if (a.size === 0 || b.size === 0) return 0;
  let dot = 0;
  for (const [term, count] of a) {
    dot += count * (b.get(term) ?? 0);
  }
  const norm = (v: TermVector) => Math.sqrt([...v.values()].reduce((sum, c) => sum + c * c, 0));
  return dot / (norm(a) * norm(b));
};

/**
 * Prefers cutting at the sentence boundary where the vocabulary of the
 * surrounding sentences overlaps least. Lexical term vectors keep splitting
 * synchronous and free of network calls.
 */
export class SemanticStrategy implements ChunkingStrategy {
  readonly name = 'semantic' as const;

  constructor(private readonly windowSentences = 3) {}

  scoreBoundaries(text: string): ScoredBoundary[] {
    const offsets: number[] = [];
    SENTENCE_END.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = SENTENCE_END.exec(text)) !== null) {
      const offset = match.index + match[0].length;
      if (offset < text.length) offsets.push(offset);
    }

    const sentences: string[] = [];
    let previous = 0;
    for (const offset of offsets) {
      sentences.push(text.slice(previous, offset));
      previous = offset;
    }
    sentences.push(text.slice(previous));

    return offsets.map((offset, k) => {
      const before = sentences.slice(Math.max(0, k - this.windowSentences + 1), k + 1);
      const after = sentences.slice(k + 1, k + 1 + this.windowSentences);
      return { offset, similarity: cosineSimilarity(termVector(before), termVector(after)) };
    });
  }

  prepare(text: string): BoundaryPicker {
    const boundaries = this.scoreBoundaries(text);

    return (window) => {
      for (const lo of [preferredLowerBound(window), window.minEnd]) {
        let best: ScoredBoundary | undefined;
        for (const boundary of boundaries) {
          if (boundary.offset < lo || boundary.offset > window.maxEnd) continue;
          if (!best || boundary.similarity <= best.similarity) {
            best = boundary;
          }
        }
        if (best) return best.offset;
      }
      return pickBySeparators(text, window);
    };
  }
}
