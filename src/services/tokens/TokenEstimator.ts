import { get_encoding, type Tiktoken } from 'tiktoken';
import { logger } from '../../utils/logger.js';
import { ContextOverflowError } from '../../utils/errors.js';
import type { ChatMessage } from '../../types/extraction.types.js';

export interface TokenEstimatorOptions {
  charsPerToken: number;
  /** Count with the cl100k_base encoding instead of the character ratio. */
  accurate: boolean;
  minCompletionTokens: number;
}

export interface ChunkRecommendation {
  chunkSizeTokens: number;
  overlapTokens: number;
  numChunks: number;
}

export interface CompletionBudget {
  promptTokens: number;
  completionTokens: number;
  reduced: boolean;
}

/** Role markers and separators the chat template adds around each message. */
export const MESSAGE_OVERHEAD_TOKENS = 4;

export class TokenEstimator {
  private encoder: Tiktoken | null = null;

  constructor(private readonly options: TokenEstimatorOptions) {}

  estimate(text: string): number {
    if (!text) return 0;
    if (this.options.accurate) {
      return this.getEncoder().encode(text).length;
    }
    return Math.floor(text.length / this.options.charsPerToken);
  }

  estimateMessages(messages: ChatMessage[]): number {
    return messages.reduce(
      (total, message) => total + this.estimate(message.content) + MESSAGE_OVERHEAD_TOKENS,
      0
    );
  }

  /**
   * Fits the requested completion budget into `contextLimit`. Shrinks it when
   * at least `minCompletionTokens` remain, otherwise throws with a chunking
   * recommendation. The prompt itself is never cut.
   */
  fitCompletion(promptTokens: number, requestedCompletion: number, contextLimit: number): CompletionBudget {
    const total = promptTokens + requestedCompletion;
    if (total <= contextLimit) {
      return { promptTokens, completionTokens: requestedCompletion, reduced: false };
    }

    const available = Math.max(0, contextLimit - promptTokens);
    if (available < this.options.minCompletionTokens) {
      const recommendation = this.recommendChunking(promptTokens, contextLimit, requestedCompletion);
      throw new ContextOverflowError(
        `Context overflow: prompt of ${promptTokens} tokens leaves ${available} of ${contextLimit} for completion`,
        {
          estimatedTokens: total,
          maxTokens: contextLimit,
          excessTokens: total - contextLimit,
          recommendedChunkSizeTokens: recommendation.chunkSizeTokens,
          recommendedChunkCount: recommendation.numChunks,
        }
      );
    }

    logger.warn(
      { promptTokens, requestedCompletion, available },
      'Completion budget reduced to fit context window'
    );
    return { promptTokens, completionTokens: available, reduced: true };
  }

  recommendChunking(
    totalTokens: number,
    contextLimit: number,
    completionTokens: number,
    overlapFraction = 0.1
  ): ChunkRecommendation {
    const usable = Math.max(1, contextLimit - completionTokens);
    if (totalTokens <= usable) {
      return { chunkSizeTokens: totalTokens, overlapTokens: 0, numChunks: 1 };
    }
    const overlapTokens = Math.floor(usable * overlapFraction);
    const effective = Math.max(1, usable - overlapTokens);
    return {
      chunkSizeTokens: usable,
      overlapTokens,
      numChunks: Math.ceil(totalTokens / effective),
    };
  }

  dispose(): void {
    this.encoder?.free();
    this.encoder = null;
  }

  private getEncoder(): Tiktoken {
    if (!this.encoder) {
      this.encoder = get_encoding('cl100k_base');
    }
    return this.encoder;
  }
}
