/**
 * Scenario id resolution shared by the NLU and WER scorers
 */

import type { ScenarioIdInput } from './types.js';

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

/**
 * Parse a record's scenario id. Accepts integers and strings of decimal
 * digits ("7", " 07 "); anything else yields null.
 */
export function parseScenarioId(value: ScenarioIdInput): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : null;
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}
