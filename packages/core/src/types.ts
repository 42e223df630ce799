/**
 * Core types for voice command evaluation
 */

// ============================================
// Scenario Rules
// ============================================

export interface SlotExpectation {
  readonly key: string;
  readonly expectedValue: string;
}

export interface ScenarioRule {
  readonly id: number;
  readonly intent: string;
  readonly keywords: readonly string[];  // all must match
  readonly slots: readonly SlotExpectation[];
}

export interface RuleTable {
  readonly version: string;
  readonly rules: readonly ScenarioRule[];  // ascending id
  readonly byId: ReadonlyMap<number, ScenarioRule>;
}

// ============================================
// Normalization
// ============================================

export type ReplacementEntry = readonly [source: string, target: string];

export type ReplacementTable = readonly ReplacementEntry[];

/** Integer to spoken words, e.g. 50 -> "cincuenta" */
export type NumberConverter = (value: number) => string;

// ============================================
// Fuzzy Matching
// ============================================

export type MatchVariant = 'partial' | 'token_set';

/** Similarity between two strings, 0-100 */
export type SimilarityScorer = (a: string, b: string) => number;

// ============================================
// Records
// ============================================

export type ScenarioIdInput = string | number | null | undefined;

export interface TranscriptRecord {
  readonly scenarioId: ScenarioIdInput;
  readonly text?: string | null;
}

// ============================================
// NLU Results
// ============================================

export type IntentStrategy = 'rule' | 'corpus';

export interface SlotOutcome {
  readonly key: string;
  readonly expectedValue: string;
  readonly score: number;
  readonly variant: MatchVariant;
  readonly hit: boolean;
}

export interface NluResult {
  readonly intentExpected: string;
  readonly intentPredicted: string;
  readonly intentSuccess: boolean;
  readonly slots: readonly SlotOutcome[];
  readonly slotsHitCount: number;
  readonly slotsTotalCount: number;
  readonly slotsSuccess: boolean;
  readonly overallSuccess: boolean;
}

// ============================================
// WER Results
// ============================================

export interface AlignmentCounts {
  readonly hits: number;
  readonly substitutions: number;
  readonly deletions: number;
  readonly insertions: number;
}

export interface WerResult extends AlignmentCounts {
  readonly referenceText: string;       // '' when the scenario has no reference
  readonly rowWer: number | null;       // null when excluded from aggregation
  readonly referenceWordCount: number;
}

export interface CorpusWer {
  readonly totalErrors: number;
  readonly totalReferenceWords: number;
  readonly globalWer: number;
  readonly recordCount: number;
}

export type ReferenceLookup = ReadonlyMap<number, string>;

// ============================================
// Pipeline
// ============================================

export interface EvaluatedRecord<T extends TranscriptRecord = TranscriptRecord> {
  readonly record: T;
  readonly normalizedText: string;
  readonly nlu: NluResult;
  readonly wer: WerResult;
}

export interface CorpusEvaluation<T extends TranscriptRecord = TranscriptRecord> {
  readonly records: readonly EvaluatedRecord<T>[];
  readonly corpusWer: CorpusWer;
}
