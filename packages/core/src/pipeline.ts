/**
 * Evaluation pipeline
 * raw transcript -> normalizer -> { NLU evaluator, WER scorer }
 */

import { TextNormalizer } from './normalizer.js';
import { NluEvaluator } from './nlu.js';
import { WerScorer, aggregateWer } from './wer.js';
import type {
  CorpusEvaluation,
  EvaluatedRecord,
  TranscriptRecord,
} from './types.js';

export interface EvaluationPipelineOptions {
  readonly normalizer?: TextNormalizer;
  readonly nlu: NluEvaluator;
  readonly wer: WerScorer;
}

export class EvaluationPipeline {
  private readonly normalizer: TextNormalizer;
  private readonly nlu: NluEvaluator;
  private readonly wer: WerScorer;

  constructor(options: EvaluationPipelineOptions) {
    this.normalizer = options.normalizer ?? new TextNormalizer();
    this.nlu = options.nlu;
    this.wer = options.wer;
  }

  /**
   * Normalize a record's raw text and score it. The input record is carried
   * through untouched.
   */
  evaluateRecord<T extends TranscriptRecord>(record: T): EvaluatedRecord<T> {
    const normalizedText = this.normalizer.normalize(record.text);
    const normalized: TranscriptRecord = { scenarioId: record.scenarioId, text: normalizedText };

    return {
      record,
      normalizedText,
      nlu: this.nlu.evaluate(normalized),
      wer: this.wer.score(normalized),
    };
  }

  evaluateCorpus<T extends TranscriptRecord>(records: Iterable<T>): CorpusEvaluation<T> {
    const evaluated = Array.from(records, record => this.evaluateRecord(record));
    return {
      records: evaluated,
      corpusWer: aggregateWer(evaluated.map(entry => entry.wer)),
    };
  }
}

// ============================================
// Result Rows
// ============================================

export interface ResultFields {
  readonly textNormalized: string;
  readonly intentExpected: string;
  readonly intentPredicted: string;
  readonly intentSuccess: boolean;
  readonly slotsHitCount: number;
  readonly slotsTotalCount: number;
  readonly slotsSuccess: boolean;
  readonly nluSuccess: boolean;
  readonly reference: string;
  readonly wer: number | null;
}

export type ResultRow<T extends TranscriptRecord> = T & ResultFields;

/**
 * Join a record with its results into one flat row. Result fields take
 * precedence over record fields of the same name.
 */
export function toResultRow<T extends TranscriptRecord>(evaluated: EvaluatedRecord<T>): ResultRow<T> {
  const { record, normalizedText, nlu, wer } = evaluated;
  return {
    ...record,
    textNormalized: normalizedText,
    intentExpected: nlu.intentExpected,
    intentPredicted: nlu.intentPredicted,
    intentSuccess: nlu.intentSuccess,
    slotsHitCount: nlu.slotsHitCount,
    slotsTotalCount: nlu.slotsTotalCount,
    slotsSuccess: nlu.slotsSuccess,
    nluSuccess: nlu.overallSuccess,
    reference: wer.referenceText,
    wer: wer.rowWer,
  };
}
