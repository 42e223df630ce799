/**
 * Evaluation metrics calculation
 */

import { Intent } from '../src/constants.js';
import { parseScenarioId } from '../src/scenario.js';
import { aggregateWer } from '../src/wer.js';
import type {
  CorpusEvaluation,
  EvaluatedRecord,
  IntentStrategy,
} from '../src/types.js';
import type {
  DatasetRecord,
  EvalReport,
  FailedRecord,
  IntentConfusion,
  ScenarioMetrics,
  SlotMetrics,
} from './types.js';

const UNKNOWN_SCENARIO = 'unknown';

function scenarioLabel(entry: EvaluatedRecord<DatasetRecord>): string {
  const id = parseScenarioId(entry.record.scenarioId);
  return entry.nlu.intentPredicted === Intent.ERROR || id === null ? UNKNOWN_SCENARIO : String(id);
}

function rate(passed: number, total: number): number {
  return total > 0 ? passed / total : 0;
}

// ============================================
// Calculate Metrics
// ============================================

/**
 * Per-scenario success counts and WER, in ascending scenario id with
 * unresolved records last.
 */
export function calculateScenarioMetrics(
  records: readonly EvaluatedRecord<DatasetRecord>[]
): ScenarioMetrics[] {
  const groups = new Map<string, EvaluatedRecord<DatasetRecord>[]>();

  for (const entry of records) {
    const label = scenarioLabel(entry);
    const group = groups.get(label) ?? [];
    group.push(entry);
    groups.set(label, group);
  }

  return Array.from(groups.entries())
    .map(([scenario, group]) => {
      const overallPassed = group.filter(e => e.nlu.overallSuccess).length;
      const scenarioWer = aggregateWer(group.map(e => e.wer));
      return {
        scenario,
        intent: group[0].nlu.intentExpected,
        total: group.length,
        intentPassed: group.filter(e => e.nlu.intentSuccess).length,
        slotsPassed: group.filter(e => e.nlu.slotsSuccess).length,
        overallPassed,
        accuracy: rate(overallPassed, group.length),
        wer: scenarioWer.recordCount > 0 ? scenarioWer.globalWer : null,
      };
    })
    .sort((a, b) => {
      if (a.scenario === UNKNOWN_SCENARIO) return 1;
      if (b.scenario === UNKNOWN_SCENARIO) return -1;
      return Number(a.scenario) - Number(b.scenario);
    });
}

export function calculateSlotMetrics(records: readonly EvaluatedRecord[]): SlotMetrics[] {
  const slotStats = new Map<string, { total: number; hits: number }>();

  for (const entry of records) {
    for (const slot of entry.nlu.slots) {
      const stats = slotStats.get(slot.key) ?? { total: 0, hits: 0 };
      stats.total++;
      if (slot.hit) stats.hits++;
      slotStats.set(slot.key, stats);
    }
  }

  return Array.from(slotStats.entries())
    .map(([slot, stats]) => ({
      slot,
      total: stats.total,
      hits: stats.hits,
      hitRate: rate(stats.hits, stats.total),
    }))
    .sort((a, b) => b.hitRate - a.hitRate);
}

/**
 * Records whose predicted intent belongs to another scenario. Only the corpus
 * strategy produces these.
 */
export function findIntentConfusions(records: readonly EvaluatedRecord[]): IntentConfusion[] {
  const counts = new Map<string, IntentConfusion>();

  for (const { nlu } of records) {
    const { intentExpected, intentPredicted } = nlu;
    if (intentPredicted === intentExpected) continue;
    if (intentPredicted === Intent.NO_MATCH || intentPredicted === Intent.ERROR) continue;

    const key = `${intentExpected}\u0000${intentPredicted}`;
    const confusion = counts.get(key) ?? { expected: intentExpected, predicted: intentPredicted, count: 0 };
    confusion.count++;
    counts.set(key, confusion);
  }

  return Array.from(counts.values()).sort((a, b) => b.count - a.count);
}

function toFailedRecord(entry: EvaluatedRecord<DatasetRecord>): FailedRecord {
  return {
    scenario: scenarioLabel(entry),
    input: entry.record.text ?? '',
    normalized: entry.normalizedText,
    intentExpected: entry.nlu.intentExpected,
    intentPredicted: entry.nlu.intentPredicted,
    missedSlots: entry.nlu.slots.filter(slot => !slot.hit).map(slot => slot.key),
    wer: entry.wer.rowWer,
  };
}

// ============================================
// Generate Report
// ============================================

export function generateReport(
  evaluation: CorpusEvaluation<DatasetRecord>,
  options: {
    datasetVersion: string;
    rulesVersion: string;
    strategy: IntentStrategy;
    startTime: number;
  }
): EvalReport {
  const { records, corpusWer } = evaluation;
  const intentPassed = records.filter(e => e.nlu.intentSuccess).length;
  const slotsPassed = records.filter(e => e.nlu.slotsSuccess).length;
  const overallPassed = records.filter(e => e.nlu.overallSuccess).length;

  return {
    timestamp: new Date().toISOString(),
    datasetVersion: options.datasetVersion,
    rulesVersion: options.rulesVersion,
    strategy: options.strategy,

    summary: {
      totalRecords: records.length,
      intentPassed,
      slotsPassed,
      overallPassed,
      intentAccuracy: rate(intentPassed, records.length),
      slotAccuracy: rate(slotsPassed, records.length),
      overallAccuracy: rate(overallPassed, records.length),
      globalWer: corpusWer.globalWer,
      werRecords: corpusWer.recordCount,
      durationMs: Date.now() - options.startTime,
    },

    scenarioMetrics: calculateScenarioMetrics(records),
    slotMetrics: calculateSlotMetrics(records),
    confusions: findIntentConfusions(records),
    failures: records.filter(e => !e.nlu.overallSuccess).map(toFailedRecord),
  };
}

// ============================================
// Format Report
// ============================================

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function accuracyStatus(value: number): string {
  return value >= 0.95 ? '✓' : value >= 0.8 ? '⚠' : '✗';
}

function werStatus(value: number): string {
  return value <= 0.1 ? '✓' : value <= 0.25 ? '⚠' : '✗';
}

export function formatReport(report: EvalReport): string {
  const lines: string[] = [];

  lines.push('='.repeat(50));
  lines.push('ASR Evaluation Report');
  lines.push('='.repeat(50));
  lines.push(`Timestamp: ${report.timestamp}`);
  lines.push(`Dataset: ${report.datasetVersion}  Rules: ${report.rulesVersion}  Strategy: ${report.strategy}`);
  lines.push(`Duration: ${(report.summary.durationMs / 1000).toFixed(1)}s`);
  lines.push('');

  // Summary
  const { summary } = report;
  lines.push(`NLU:    ${summary.overallPassed}/${summary.totalRecords} passed (${pct(summary.overallAccuracy)}) ${accuracyStatus(summary.overallAccuracy)}`);
  lines.push(`  intent: ${summary.intentPassed}/${summary.totalRecords} (${pct(summary.intentAccuracy)})`);
  lines.push(`  slots:  ${summary.slotsPassed}/${summary.totalRecords} (${pct(summary.slotAccuracy)})`);
  lines.push(`WER:    ${pct(summary.globalWer)} over ${summary.werRecords} records ${werStatus(summary.globalWer)}`);
  lines.push('');

  // Scenario breakdown
  if (report.scenarioMetrics.length > 0) {
    lines.push('BY SCENARIO:');
    for (const sm of report.scenarioMetrics) {
      const pad = ' '.repeat(Math.max(0, 24 - sm.scenario.length - sm.intent.length));
      const wer = sm.wer === null ? 'n/a' : pct(sm.wer);
      lines.push(`  [${sm.scenario}] ${sm.intent}:${pad}${sm.overallPassed}/${sm.total} (${pct(sm.accuracy)}) WER ${wer} ${accuracyStatus(sm.accuracy)}`);
    }
    lines.push('');
  }

  // Slot accuracy
  if (report.slotMetrics.length > 0) {
    lines.push('SLOT HIT RATE:');
    for (const slot of report.slotMetrics) {
      const pad = ' '.repeat(Math.max(0, 12 - slot.slot.length));
      lines.push(`  ${slot.slot}:${pad}${slot.hits}/${slot.total} (${pct(slot.hitRate)}) ${accuracyStatus(slot.hitRate)}`);
    }
    lines.push('');
  }

  // Confusions
  if (report.confusions.length > 0) {
    lines.push('INTENT CONFUSIONS:');
    for (const c of report.confusions) {
      lines.push(`  ${c.expected} -> ${c.predicted}: ${c.count}`);
    }
    lines.push('');
  }

  // Failures
  if (report.failures.length > 0) {
    lines.push('FAILURES:');
    for (const f of report.failures.slice(0, 10)) {
      lines.push(`  [${f.scenario}] "${f.input}"`);
      lines.push(`    normalized: "${f.normalized}"`);
      if (f.intentPredicted !== f.intentExpected) {
        lines.push(`    intent: expected ${f.intentExpected}, got ${f.intentPredicted}`);
      }
      if (f.missedSlots.length > 0) {
        lines.push(`    missed slots: ${f.missedSlots.join(', ')}`);
      }
    }
    if (report.failures.length > 10) {
      lines.push(`  ... and ${report.failures.length - 10} more failures`);
    }
  }

  return lines.join('\n');
}
