/**
 * Tests for numeral classification and conversion
 */

import { describe, it, expect } from 'vitest';
import { digitsToWords, isDigitCode, spanishNumberConverter } from '../src/numbers.js';

describe('isDigitCode', () => {
  it('should treat leading-zero runs as codes', () => {
    expect(isDigitCode('05')).toBe(true);
    expect(isDigitCode('0922')).toBe(true);
  });

  it('should treat runs of four or more digits as codes', () => {
    expect(isDigitCode('1000')).toBe(true);
    expect(isDigitCode('852025')).toBe(true);
  });

  it('should treat short runs as quantities', () => {
    expect(isDigitCode('0')).toBe(false);
    expect(isDigitCode('42')).toBe(false);
    expect(isDigitCode('999')).toBe(false);
  });
});

describe('spanishNumberConverter', () => {
  it('should spell single digits', () => {
    expect(spanishNumberConverter(0)).toBe('cero');
    expect(spanishNumberConverter(5)).toBe('cinco');
    expect(spanishNumberConverter(9)).toBe('nueve');
  });

  it('should spell tens', () => {
    expect(spanishNumberConverter(10)).toBe('diez');
    expect(spanishNumberConverter(50)).toBe('cincuenta');
  });
});

describe('digitsToWords', () => {
  it('should spell codes digit by digit', () => {
    expect(digitsToWords('0922', spanishNumberConverter)).toBe('cero nueve dos dos');
  });

  it('should spell quantities as one number', () => {
    expect(digitsToWords('10', spanishNumberConverter)).toBe('diez');
  });

  it('should return the digits when the converter throws', () => {
    const converter = (): string => {
      throw new RangeError('too large');
    };
    expect(digitsToWords('12', converter)).toBe('12');
  });

  it('should return the digits when any word is blank', () => {
    const converter = (value: number): string => (value === 0 ? ' ' : String(value));
    expect(digitsToWords('1024', converter)).toBe('1024');
  });
});
