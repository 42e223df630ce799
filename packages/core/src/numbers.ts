/**
 * Numeral to Spanish words
 */

import writtenNumber from 'written-number';
import { NUMBER_LANGUAGE } from './constants.js';
import type { NumberConverter } from './types.js';

export const spanishNumberConverter: NumberConverter = (value) =>
  writtenNumber(value, { lang: NUMBER_LANGUAGE });

/**
 * Identifiers (leading zero, or four digits and more) are read digit by digit;
 * everything else is a quantity read as one number.
 */
export function isDigitCode(digits: string): boolean {
  return (digits.startsWith('0') && digits.length > 1) || digits.length >= 4;
}

/**
 * Convert a run of ASCII digits to words. Returns the run unchanged if the
 * converter fails or yields nothing.
 */
export function digitsToWords(digits: string, convert: NumberConverter): string {
  try {
    const words = isDigitCode(digits)
      ? Array.from(digits, digit => convert(Number(digit)))
      : [convert(Number(digits))];

    if (words.some(word => word.trim() === '')) {
      return digits;
    }
    return words.join(' ');
  } catch {
    return digits;
  }
}
