import { describe, it, expect } from 'vitest';
import { parseScenarioId } from '../src/scenario.js';

describe('parseScenarioId', () => {
  it('should accept integers and integer strings', () => {
    expect(parseScenarioId(7)).toBe(7);
    expect(parseScenarioId('7')).toBe(7);
    expect(parseScenarioId(' 07 ')).toBe(7);
    expect(parseScenarioId('-3')).toBe(-3);
  });

  it('should reject everything else', () => {
    expect(parseScenarioId('abc')).toBeNull();
    expect(parseScenarioId('7a')).toBeNull();
    expect(parseScenarioId('1.5')).toBeNull();
    expect(parseScenarioId('')).toBeNull();
    expect(parseScenarioId(1.5)).toBeNull();
    expect(parseScenarioId(Number.NaN)).toBeNull();
    expect(parseScenarioId(null)).toBeNull();
    expect(parseScenarioId(undefined)).toBeNull();
  });
});
