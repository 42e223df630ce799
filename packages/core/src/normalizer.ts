/**
 * Transcript normalization for Spanish ASR evaluation
 *
 * Each pass consumes the output of the previous one, so the order in
 * `TextNormalizer.normalize` is load-bearing:
 *   - letters and digits are split before the replacement table runs, so
 *     keys like "1 tb" or "i 7" can match engine output such as "1TB", "i7"
 *   - replacements run before digit unification and numeral conversion, so
 *     "1 tb" is rewritten before its digit becomes a word
 *   - fragmented codes ("85-20-25") are joined before numerals are classified
 */

import {
  DEFAULT_REPLACEMENTS,
  MASCULINE_UNIT_NOUNS,
} from './constants.js';
import { digitsToWords, spanishNumberConverter } from './numbers.js';
import type { NumberConverter, ReplacementTable } from './types.js';

// ============================================
// Patterns
// ============================================

// Word boundaries that treat accented letters as word characters
const WORD_START = '(?<![\\p{L}\\p{M}\\p{N}_])';
const WORD_END = '(?![\\p{L}\\p{M}\\p{N}_])';

const ABBREVIATION_MARKS = /[.,]/g;
const LETTER_THEN_DIGIT = /(?<=\p{L})(?=\d)/gu;
const DIGIT_THEN_LETTER = /(?<=\d)(?=\p{L})/gu;
const SEPARATOR_BETWEEN_DIGITS = /(?<=\d)[\s-]+(?=\d)/g;
const DIGIT_RUN = /(?<![\p{L}\p{M}\p{N}])\d+(?![\p{L}\p{M}\p{N}])/gu;
const SYMBOLS = /[^\p{L}\p{M}\p{N}\s]/gu;  // includes underscore
const WHITESPACE = /\s+/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ============================================
// Passes
// ============================================

export function splitAbbreviations(text: string): string {
  return text.replace(ABBREVIATION_MARKS, ' ');
}

/**
 * Undo letter/digit concatenation from ASR engines: "fa4095" -> "fa 4095"
 */
export function separateLettersAndDigits(text: string): string {
  return text.replace(LETTER_THEN_DIGIT, ' ').replace(DIGIT_THEN_LETTER, ' ');
}

/**
 * Join digit groups split by spaces or hyphens: "85-20 25" -> "852025"
 */
export function unifyDigitRuns(text: string): string {
  return text.replace(SEPARATOR_BETWEEN_DIGITS, '');
}

export function convertNumerals(text: string, convert: NumberConverter): string {
  return text.replace(DIGIT_RUN, digits => digitsToWords(digits, convert));
}

export function stripSymbols(text: string): string {
  return text.replace(SYMBOLS, ' ');
}

export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE, ' ').trim();
}

/**
 * Compiles a replacement table into a single-pass rewriter. Entries are tried
 * in table order at each position, and replaced text is never rescanned.
 */
export function compileReplacements(table: ReplacementTable): (text: string) => string {
  const targets = new Map<string, string>();
  const alternatives: string[] = [];

  for (const [source, target] of table) {
    const key = source.toLowerCase();
    if (key === '' || targets.has(key)) continue;
    targets.set(key, target.toLowerCase());
    alternatives.push(escapeRegExp(key));
  }

  if (alternatives.length === 0) {
    return text => text;
  }

  const pattern = new RegExp(`${WORD_START}(?:${alternatives.join('|')})${WORD_END}`, 'giu');
  return text => text.replace(pattern, match => targets.get(match.toLowerCase()) ?? match);
}

/**
 * "uno terabyte" -> "un terabyte". Numeral conversion only sees digits, so
 * agreement with the following noun is fixed here.
 */
export function compileArticleAgreement(nouns: readonly string[]): (text: string) => string {
  const alternatives = nouns
    .map(noun => noun.trim().toLowerCase())
    .filter(noun => noun !== '')
    .map(escapeRegExp);

  if (alternatives.length === 0) {
    return text => text;
  }

  const pattern = new RegExp(`${WORD_START}uno(\\s+)(${alternatives.join('|')})${WORD_END}`, 'gu');
  return text => text.replace(pattern, 'un$1$2');
}

// ============================================
// Normalizer
// ============================================

export interface NormalizerOptions {
  readonly replacements?: ReplacementTable;
  readonly numberConverter?: NumberConverter;
  readonly masculineNouns?: readonly string[];
}

export class TextNormalizer {
  private readonly applyReplacements: (text: string) => string;
  private readonly fixArticles: (text: string) => string;
  private readonly convertNumber: NumberConverter;

  constructor(options: NormalizerOptions = {}) {
    this.applyReplacements = compileReplacements(options.replacements ?? DEFAULT_REPLACEMENTS);
    this.fixArticles = compileArticleAgreement(options.masculineNouns ?? MASCULINE_UNIT_NOUNS);
    this.convertNumber = options.numberConverter ?? spanishNumberConverter;
  }

  /**
   * Canonical form of a raw transcript. Anything that is not a non-empty
   * string normalizes to ''.
   */
  normalize(raw: unknown): string {
    if (typeof raw !== 'string' || raw === '') {
      return '';
    }

    let text = raw.toLowerCase();
    text = splitAbbreviations(text);
    text = separateLettersAndDigits(text);
    text = this.applyReplacements(text);
    text = unifyDigitRuns(text);
    text = convertNumerals(text, this.convertNumber);
    text = stripSymbols(text);
    text = this.fixArticles(text);
    return collapseWhitespace(text);
  }
}

// ============================================
// Utility Functions
// ============================================

let defaultNormalizer: TextNormalizer | undefined;

export function normalizeText(raw: unknown): string {
  defaultNormalizer ??= new TextNormalizer();
  return defaultNormalizer.normalize(raw);
}
