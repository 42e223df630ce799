/**
 * Fuzzy matching policy
 * Picks a similarity variant per expected value and applies the threshold
 */

import { partial_ratio, token_set_ratio } from 'fuzzball';
import { Threshold } from './constants.js';
import type { MatchVariant, SimilarityScorer } from './types.js';

// ============================================
// Scorers
// ============================================

/**
 * Wrap a similarity primitive so that a failure on odd input scores 0
 */
function safely(compare: (a: string, b: string) => number): SimilarityScorer {
  return (a, b) => {
    try {
      return compare(a, b);
    } catch {
      return 0;
    }
  };
}

/** Best-window substring similarity; tolerant of surrounding noise */
export const partialRatio: SimilarityScorer = safely((a, b) => partial_ratio(a, b));

/** Token-set similarity; tolerant of reordering, no matches inside longer words */
export const tokenSetRatio: SimilarityScorer = safely((a, b) => token_set_ratio(a, b));

export type ScorerSet = Readonly<Record<MatchVariant, SimilarityScorer>>;

export const DEFAULT_SCORERS: ScorerSet = {
  partial: partialRatio,
  token_set: tokenSetRatio,
};

// ============================================
// Match Policy
// ============================================

export interface MatchPolicyOptions {
  readonly threshold?: number;
  readonly shortValueMaxLength?: number;
  readonly scorers?: ScorerSet;
}

export class MatchPolicy {
  readonly threshold: number;
  readonly shortValueMaxLength: number;
  private readonly scorers: ScorerSet;

  constructor(options: MatchPolicyOptions = {}) {
    this.threshold = options.threshold ?? Threshold.FUZZY_MATCH;
    this.shortValueMaxLength = options.shortValueMaxLength ?? Threshold.SHORT_VALUE_MAX_LENGTH;
    this.scorers = options.scorers ?? DEFAULT_SCORERS;
  }

  /**
   * Short values like "dos" would partially match "todos", so they are
   * compared token by token.
   */
  selectVariant(value: string): MatchVariant {
    return value.length <= this.shortValueMaxLength ? 'token_set' : 'partial';
  }

  /**
   * Similarity of `value` within `text`. Non-finite scores count as 0; errors
   * thrown by a scorer propagate.
   */
  score(variant: MatchVariant, value: string, text: string): number {
    const score = this.scorers[variant](value, text);
    return Number.isFinite(score) ? score : 0;
  }

  /** Keywords must score strictly above the threshold */
  keywordMatches(keyword: string, text: string): boolean {
    return this.score('partial', keyword, text) > this.threshold;
  }

  slotMatches(score: number): boolean {
    return score >= this.threshold;
  }
}
