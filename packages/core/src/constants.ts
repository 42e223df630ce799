/**
 * Core constants for voice command evaluation
 * Eliminates magic strings throughout the codebase
 */

import type { ReplacementTable } from './types.js';

// ============================================
// Intent Sentinels
// ============================================

export const Intent = {
  NO_MATCH: 'no_match',
  ERROR: 'error',
  UNKNOWN: 'unknown',
} as const;

// ============================================
// Match Thresholds
// ============================================

export const Threshold = {
  // keywords must score strictly above, slots at or above
  FUZZY_MATCH: 80,
  // values up to this length are matched by token set
  SHORT_VALUE_MAX_LENGTH: 6,
} as const;

// ============================================
// Normalization
// ============================================

export const NUMBER_LANGUAGE = 'es';

/**
 * Domain rewrites applied after letter/digit separation and before numeral
 * conversion. Order matters: at any position the first matching entry wins.
 */
export const DEFAULT_REPLACEMENTS: ReplacementTable = [
  // Storage
  ['1 tb', 'un terabyte'],
  ['2 tb', 'dos terabyte'],
  ['3 tb', 'tres terabyte'],
  ['4 tb', 'cuatro terabyte'],
  ['tb', 'terabyte'],

  // Processors
  ['i 7', 'i siete'],
  ['i 5', 'i cinco'],
  ['i 3', 'i tres'],

  // Paper formats
  ['a 4', 'a cuatro'],

  // Models
  ['xg', 'equis ge'],

  // Invoice codes
  ['f a', 'efe a'],
  ['fa', 'efe a'],

  // Brands
  ['compufacil', 'compu facil'],
  ['compufácil', 'compu facil'],
  ['andinacorp', 'andina corp'],
  ['duradisco', 'dura disco'],
];

/** Nouns that take "un" rather than "uno" */
export const MASCULINE_UNIT_NOUNS: readonly string[] = [
  'terabyte',
  'gigabyte',
  'megabyte',
];
