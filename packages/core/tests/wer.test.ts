/**
 * Tests for WER scoring
 */

import { describe, it, expect } from 'vitest';
import { WerScorer, aggregateWer, alignWords, errorCount, scoreTexts, tokenize } from '../src/wer.js';

describe('tokenize', () => {
  it('should split on runs of whitespace', () => {
    expect(tokenize('  genera  la\tfactura ')).toEqual(['genera', 'la', 'factura']);
  });

  it('should return no words for blank text', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('   ')).toEqual([]);
  });
});

describe('alignWords', () => {
  it('should count hits for identical sequences', () => {
    expect(alignWords(['a', 'b', 'c'], ['a', 'b', 'c'])).toEqual({
      hits: 3,
      substitutions: 0,
      deletions: 0,
      insertions: 0,
    });
  });

  it('should count a dropped word as a deletion', () => {
    expect(alignWords(['genera', 'la', 'factura', 'ocho'], ['genera', 'factura', 'ocho'])).toEqual({
      hits: 3,
      substitutions: 0,
      deletions: 1,
      insertions: 0,
    });
  });

  it('should count a replaced word as a substitution', () => {
    expect(alignWords(['a', 'b', 'c'], ['a', 'x', 'c'])).toEqual({
      hits: 2,
      substitutions: 1,
      deletions: 0,
      insertions: 0,
    });
  });

  it('should count an extra word as an insertion', () => {
    expect(alignWords(['a', 'b'], ['a', 'x', 'b'])).toEqual({
      hits: 2,
      substitutions: 0,
      deletions: 0,
      insertions: 1,
    });
  });

  it('should handle empty sides', () => {
    expect(alignWords(['a', 'b'], [])).toMatchObject({ hits: 0, deletions: 2 });
    expect(alignWords([], ['a'])).toMatchObject({ hits: 0, insertions: 1 });
    expect(alignWords([], [])).toEqual({ hits: 0, substitutions: 0, deletions: 0, insertions: 0 });
  });

  it('should prefer a substitution over a deletion and insertion pair', () => {
    expect(alignWords(['a'], ['x', 'y', 'z'])).toEqual({
      hits: 0,
      substitutions: 1,
      deletions: 0,
      insertions: 2,
    });
  });
});

describe('scoreTexts', () => {
  it('should compute errors over reference words', () => {
    const result = scoreTexts('genera la factura ocho', 'genera factura ocho');

    expect(result.rowWer).toBe(0.25);
    expect(result.referenceWordCount).toBe(4);
    expect(errorCount(result)).toBe(1);
  });

  it('should exceed 1 when the hypothesis has many extra words', () => {
    expect(scoreTexts('a', 'x y z').rowWer).toBe(3);
  });

  it('should keep the reference text', () => {
    expect(scoreTexts('hola mundo', 'hola').referenceText).toBe('hola mundo');
  });
});

describe('WerScorer', () => {
  const scorer = new WerScorer(
    new Map([
      [6, 'genera la factura ocho'],
      [8, '   '],
    ])
  );

  it('should score against the scenario reference', () => {
    const result = scorer.score({ scenarioId: '6', text: 'genera la factura ocho' });
    expect(result.rowWer).toBe(0);
    expect(result.hits).toBe(4);
  });

  it('should score missing text as all deletions', () => {
    const result = scorer.score({ scenarioId: 6, text: null });
    expect(result.rowWer).toBe(1);
    expect(result.deletions).toBe(4);
  });

  it.each([
    ['unknown id', 99],
    ['non-numeric id', 'abc'],
    ['missing id', null],
    ['blank reference', 8],
  ])('should exclude records with %s', (_label, scenarioId) => {
    const result = scorer.score({ scenarioId, text: 'genera la factura ocho' });
    expect(result.rowWer).toBeNull();
    expect(result.referenceText).toBe('');
    expect(result.referenceWordCount).toBe(0);
  });
});

describe('aggregateWer', () => {
  it('should micro-average over reference words', () => {
    const corpus = aggregateWer([
      scoreTexts('genera la factura ocho', 'genera factura ocho'),
      scoreTexts('busca la factura del cliente velasco', 'busca la factura del cliente velasco'),
    ]);

    expect(corpus).toEqual({
      totalErrors: 1,
      totalReferenceWords: 10,
      globalWer: 0.1,
      recordCount: 2,
    });
  });

  it('should weight long references more than short ones', () => {
    const corpus = aggregateWer([
      scoreTexts('hola', 'adios'),
      scoreTexts('uno dos tres cuatro cinco seis siete ocho nueve', 'uno dos tres cuatro cinco seis siete ocho nueve'),
    ]);
    expect(corpus.globalWer).toBe(0.1);
  });

  it('should skip excluded records', () => {
    const scorer = new WerScorer(new Map([[1, 'hola mundo']]));
    const corpus = aggregateWer([
      scorer.score({ scenarioId: 1, text: 'hola' }),
      scorer.score({ scenarioId: 2, text: 'lo que sea' }),
    ]);

    expect(corpus.recordCount).toBe(1);
    expect(corpus.globalWer).toBe(0.5);
  });

  it('should score an empty corpus as 0', () => {
    expect(aggregateWer([])).toEqual({
      totalErrors: 0,
      totalReferenceWords: 0,
      globalWer: 0,
      recordCount: 0,
    });
  });
});
