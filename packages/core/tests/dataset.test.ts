/**
 * Tests for dataset loading
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { loadReferences, loadRuleTable } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { NluEvaluator, UNRESOLVED_NLU_RESULT } from '../src/nlu.js';
import { EvaluationPipeline } from '../src/pipeline.js';
import { WerScorer } from '../src/wer.js';
import { loadDataset, parseDataset } from '../eval/dataset.js';

const packagePath = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url));

describe('parseDataset', () => {
  it('should accept a bare record list', () => {
    const dataset = parseDataset([
      { audio: 7, text: 'Verifica si la factura FA4095 está pagada' },
      { audio: '8' },
    ]);

    expect(dataset.version).toBe('unversioned');
    expect(dataset.records).toEqual([
      { audio: 7, scenarioId: 7, text: 'Verifica si la factura FA4095 está pagada' },
      { audio: '8', scenarioId: '8', text: null },
    ]);
  });

  it('should accept a versioned document', () => {
    const dataset = parseDataset({ version: 'v2', records: [{ audio: null, text: 'hola' }] });

    expect(dataset.version).toBe('v2');
    expect(dataset.records[0]).toEqual({ audio: null, scenarioId: null, text: 'hola' });
  });

  it('should keep unresolvable ids for scoring', () => {
    const dataset = parseDataset([{ audio: 'abc', text: null }]);
    expect(dataset.records[0].scenarioId).toBe('abc');
  });

  it('should reject malformed documents', () => {
    expect(() => parseDataset({ records: 'none' }, 'broken.json')).toThrow(ConfigError);
    expect(() => parseDataset([{ text: 'sin audio' }])).toThrow(ConfigError);
  });
});

describe('sample dataset', () => {
  const dataset = loadDataset(packagePath('eval/datasets/sample.json'));

  it('should load every record', () => {
    expect(dataset.version).toBe('sample-1');
    expect(dataset.records).toHaveLength(19);
  });

  it('should evaluate end to end with the bundled configuration', () => {
    const pipeline = new EvaluationPipeline({
      nlu: new NluEvaluator(loadRuleTable(packagePath('config/rules.json'))),
      wer: new WerScorer(loadReferences(packagePath('config/ground-truth.json'))),
    });

    const evaluation = pipeline.evaluateCorpus(dataset.records);
    const last = evaluation.records[evaluation.records.length - 1];

    expect(evaluation.records).toHaveLength(19);
    expect(evaluation.corpusWer.recordCount).toBe(17);
    expect(last.record.audio).toBe('abc');
    expect(last.nlu).toEqual(UNRESOLVED_NLU_RESULT);
    expect(last.wer.rowWer).toBeNull();
  });

  describe('bundled scenario outcomes', () => {
    const pipeline = new EvaluationPipeline({
      nlu: new NluEvaluator(loadRuleTable(packagePath('config/rules.json'))),
      wer: new WerScorer(loadReferences(packagePath('config/ground-truth.json'))),
    });
    const evaluation = pipeline.evaluateCorpus(dataset.records);

    it('should pass a clean invoice transcript', () => {
      const invoice = evaluation.records[5];

      expect(invoice.record.text).toBe('Genera la factura de la serie 85-20-25');
      expect(invoice.nlu.intentPredicted).toBe('generar_factura');
      expect(invoice.nlu.intentSuccess).toBe(true);
      expect(invoice.nlu.slotsSuccess).toBe(true);
      expect(invoice.nlu.overallSuccess).toBe(true);
      expect(invoice.wer.rowWer).toBe(0);
    });

    it('should pass every clean transcript of the first fifteen scenarios', () => {
      const clean = evaluation.records.slice(0, 15);

      expect(clean.filter(entry => entry.nlu.overallSuccess)).toHaveLength(15);
      expect(clean.every(entry => entry.wer.rowWer === 0)).toBe(true);
    });

    it('should score the noisy transcripts', () => {
      const [partialQuote, spacedCode] = evaluation.records.slice(15, 17);

      expect(partialQuote.nlu.intentSuccess).toBe(true);
      expect(partialQuote.nlu.overallSuccess).toBe(false);
      expect(partialQuote.wer.rowWer).toBe(6 / 11);

      expect(spacedCode.normalizedText).toBe('verifica si la factura efe a cuatro cero nueve cinco esta pagada');
      expect(spacedCode.nlu.overallSuccess).toBe(true);
      expect(spacedCode.wer.rowWer).toBe(1 / 12);
    });

    it('should compute the corpus WER over resolved records', () => {
      // 150 reference words across scenarios 1-15, plus 11 and 12 for the noisy repeats
      expect(evaluation.corpusWer).toEqual({
        totalErrors: 7,
        totalReferenceWords: 173,
        globalWer: 7 / 173,
        recordCount: 17,
      });
    });
  });
});
