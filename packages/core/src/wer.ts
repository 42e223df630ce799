/**
 * Word Error Rate (WER) scoring
 *
 * WER = (S + D + I) / N
 * Where:
 *   S = substitutions
 *   D = deletions
 *   I = insertions
 *   N = number of words in reference (H + S + D)
 */

import { parseScenarioId } from './scenario.js';
import type {
  AlignmentCounts,
  CorpusWer,
  ReferenceLookup,
  TranscriptRecord,
  WerResult,
} from './types.js';

export function tokenize(text: string): string[] {
  return text.trim().split(/\s+/).filter(word => word.length > 0);
}

// ============================================
// Alignment
// ============================================

/**
 * Minimum-edit word alignment. On ties the backtrace prefers a
 * match/substitution, then a deletion, then an insertion.
 */
export function alignWords(
  reference: readonly string[],
  hypothesis: readonly string[]
): AlignmentCounts {
  const n = reference.length;
  const m = hypothesis.length;

  const dp: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = 0; i <= n; i++) dp[i][0] = i;
  for (let j = 0; j <= m; j++) dp[0][j] = j;

  for (let i = 1; i <= n; i++) {
    for (let j = 1; j <= m; j++) {
      const cost = reference[i - 1] === hypothesis[j - 1] ? 0 : 1;
      dp[i][j] = Math.min(
        dp[i - 1][j - 1] + cost,
        dp[i - 1][j] + 1,
        dp[i][j - 1] + 1
      );
    }
  }

  let hits = 0;
  let substitutions = 0;
  let deletions = 0;
  let insertions = 0;

  let i = n;
  let j = m;
  while (i > 0 || j > 0) {
    if (i > 0 && j > 0) {
      const same = reference[i - 1] === hypothesis[j - 1];
      if (dp[i][j] === dp[i - 1][j - 1] + (same ? 0 : 1)) {
        if (same) hits++;
        else substitutions++;
        i--;
        j--;
        continue;
      }
    }
    if (i > 0 && dp[i][j] === dp[i - 1][j] + 1) {
      deletions++;
      i--;
    } else {
      insertions++;
      j--;
    }
  }

  return { hits, substitutions, deletions, insertions };
}

export function errorCount(counts: AlignmentCounts): number {
  return counts.substitutions + counts.deletions + counts.insertions;
}

// ============================================
// Scorer
// ============================================

const EXCLUDED_WER_RESULT: WerResult = {
  referenceText: '',
  rowWer: null,
  hits: 0,
  substitutions: 0,
  deletions: 0,
  insertions: 0,
  referenceWordCount: 0,
};

export class WerScorer {
  constructor(private readonly references: ReferenceLookup) {}

  /**
   * Score one record against its scenario's reference. Records without a
   * reference come back with `rowWer: null` and are left out of aggregation.
   */
  score(record: TranscriptRecord): WerResult {
    const scenarioId = parseScenarioId(record.scenarioId);
    const referenceText = scenarioId === null ? undefined : this.references.get(scenarioId);
    if (referenceText === undefined || referenceText.trim() === '') {
      return EXCLUDED_WER_RESULT;
    }

    return scoreTexts(referenceText, record.text ?? '');
  }
}

export function scoreTexts(referenceText: string, hypothesisText: string): WerResult {
  const counts = alignWords(tokenize(referenceText), tokenize(hypothesisText));
  const referenceWordCount = counts.hits + counts.substitutions + counts.deletions;

  return {
    referenceText,
    rowWer: referenceWordCount > 0 ? errorCount(counts) / referenceWordCount : null,
    ...counts,
    referenceWordCount,
  };
}

// ============================================
// Aggregation
// ============================================

/**
 * Corpus WER (micro-average): total errors over total reference words.
 * Results with `rowWer: null` are skipped; an empty corpus scores 0.
 */
export function aggregateWer(results: readonly WerResult[]): CorpusWer {
  let totalErrors = 0;
  let totalReferenceWords = 0;
  let recordCount = 0;

  for (const result of results) {
    if (result.rowWer === null) continue;
    totalErrors += errorCount(result);
    totalReferenceWords += result.referenceWordCount;
    recordCount++;
  }

  return {
    totalErrors,
    totalReferenceWords,
    globalWer: totalReferenceWords > 0 ? totalErrors / totalReferenceWords : 0,
    recordCount,
  };
}
