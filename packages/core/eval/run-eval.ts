#!/usr/bin/env npx tsx
/**
 * ASR transcript evaluation runner
 *
 * Usage:
 *   npm run eval                             # Run full evaluation
 *   npm run eval -- --scenario 7             # Filter by scenario id
 *   npm run eval -- --strategy corpus        # Predict intents across all rules
 *   npm run eval -- --dataset sample         # Specific dataset
 *   npm run eval -- --out results.json       # Also write per-record rows
 */

import { writeFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { loadReferences, loadReplacementTable, loadRuleTable } from '../src/config.js';
import { DEFAULT_REPLACEMENTS } from '../src/constants.js';
import { ConfigError } from '../src/errors.js';
import { NluEvaluator } from '../src/nlu.js';
import { TextNormalizer } from '../src/normalizer.js';
import { EvaluationPipeline, toResultRow } from '../src/pipeline.js';
import { parseScenarioId } from '../src/scenario.js';
import { WerScorer } from '../src/wer.js';
import type { IntentStrategy } from '../src/types.js';
import { loadDataset } from './dataset.js';
import { generateReport, formatReport } from './metrics.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const CONFIG_DIR = resolve(__dirname, '..', 'config');

// ============================================
// CLI Args
// ============================================

interface CliArgs {
  dataset: string;
  rules: string;
  groundTruth: string;
  replacements?: string;
  strategy: IntentStrategy;
  scenario?: number;
  out?: string;
}

function parseStrategy(value: string): IntentStrategy {
  if (value === 'rule' || value === 'corpus') {
    return value;
  }
  throw new Error(`Unknown strategy "${value}" (expected "rule" or "corpus")`);
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = {
    dataset: 'sample',
    rules: resolve(CONFIG_DIR, 'rules.json'),
    groundTruth: resolve(CONFIG_DIR, 'ground-truth.json'),
    strategy: 'rule',
  };

  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (next === undefined) break;

    if (args[i] === '--dataset') {
      result.dataset = next;
    } else if (args[i] === '--rules') {
      result.rules = resolve(next);
    } else if (args[i] === '--ground-truth') {
      result.groundTruth = resolve(next);
    } else if (args[i] === '--replacements') {
      result.replacements = resolve(next);
    } else if (args[i] === '--strategy') {
      result.strategy = parseStrategy(next);
    } else if (args[i] === '--scenario') {
      result.scenario = parseScenarioId(next) ?? undefined;
    } else if (args[i] === '--out') {
      result.out = resolve(next);
    } else {
      continue;
    }
    i++;
  }

  return result;
}

function datasetPath(name: string): string {
  return name.endsWith('.json') ? resolve(name) : resolve(__dirname, 'datasets', `${name}.json`);
}

// ============================================
// Main
// ============================================

function main(): void {
  const args = parseArgs();
  const startTime = Date.now();

  // Configuration is loaded once, before any record is scored
  const rules = loadRuleTable(args.rules);
  const references = loadReferences(args.groundTruth);
  const replacements = args.replacements ? loadReplacementTable(args.replacements) : DEFAULT_REPLACEMENTS;
  console.log(`Loaded ${rules.rules.length} scenarios (rules ${rules.version}), ${references.size} references`);

  console.log(`Loading dataset: ${args.dataset}`);
  const dataset = loadDataset(datasetPath(args.dataset));

  let records = dataset.records;
  if (args.scenario !== undefined) {
    const scenario = args.scenario;
    records = records.filter(r => parseScenarioId(r.scenarioId) === scenario);
    console.log(`Filtered to scenario ${scenario}: ${records.length} records`);
  }

  if (records.length === 0) {
    console.error('No records to evaluate');
    process.exitCode = 1;
    return;
  }

  const pipeline = new EvaluationPipeline({
    normalizer: new TextNormalizer({ replacements }),
    nlu: new NluEvaluator(rules, { strategy: args.strategy }),
    wer: new WerScorer(references),
  });

  console.log(`\nEvaluating ${records.length} records (${args.strategy} strategy)...\n`);
  const evaluation = pipeline.evaluateCorpus(records);

  evaluation.records.forEach((entry, i) => {
    const status = entry.nlu.overallSuccess ? '✓' : '✗';
    const wer = entry.wer.rowWer === null ? 'n/a' : entry.wer.rowWer.toFixed(2);
    console.log(`  [${i + 1}/${records.length}] ${String(entry.record.audio)}... ${status} (WER ${wer})`);
  });

  const report = generateReport(evaluation, {
    datasetVersion: dataset.version,
    rulesVersion: rules.version,
    strategy: args.strategy,
    startTime,
  });

  console.log('\n' + formatReport(report));

  if (args.out) {
    const rows = evaluation.records.map(toResultRow);
    writeFileSync(args.out, JSON.stringify({ report, rows }, null, 2));
    console.log(`\nWrote ${rows.length} rows to ${args.out}`);
  }
}

try {
  main();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Evaluation failed:', error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
}
