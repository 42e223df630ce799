/**
 * Evaluation system types
 */

import type { IntentStrategy, TranscriptRecord } from '../src/types.js';

// ============================================
// Dataset
// ============================================

export interface DatasetRecord extends TranscriptRecord {
  readonly audio: string | number | null;
}

export interface EvalDataset {
  version: string;
  records: DatasetRecord[];
}

// ============================================
// Metrics
// ============================================

export interface ScenarioMetrics {
  scenario: string;             // scenario id, or 'unknown'
  intent: string;
  total: number;
  intentPassed: number;
  slotsPassed: number;
  overallPassed: number;
  accuracy: number;
  wer: number | null;
}

export interface SlotMetrics {
  slot: string;
  total: number;
  hits: number;
  hitRate: number;
}

export interface IntentConfusion {
  expected: string;
  predicted: string;
  count: number;
}

export interface FailedRecord {
  scenario: string;
  input: string;
  normalized: string;
  intentExpected: string;
  intentPredicted: string;
  missedSlots: string[];
  wer: number | null;
}

export interface EvalReport {
  timestamp: string;
  datasetVersion: string;
  rulesVersion: string;
  strategy: IntentStrategy;

  summary: {
    totalRecords: number;
    intentPassed: number;
    slotsPassed: number;
    overallPassed: number;
    intentAccuracy: number;
    slotAccuracy: number;
    overallAccuracy: number;
    globalWer: number;
    werRecords: number;
    durationMs: number;
  };

  scenarioMetrics: ScenarioMetrics[];
  slotMetrics: SlotMetrics[];
  confusions: IntentConfusion[];
  failures: FailedRecord[];
}
