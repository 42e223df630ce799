/**
 * Configuration loading
 * Rule tables, ground-truth references and replacement tables, validated with
 * Zod. Every loader fails hard with a ConfigError; there is no fallback to an
 * empty table.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { parseScenarioId } from './scenario.js';
import type {
  ReferenceLookup,
  ReplacementEntry,
  ReplacementTable,
  RuleTable,
  ScenarioRule,
} from './types.js';

// ============================================
// Zod Schemas
// ============================================

const NonBlankString = z.string().refine(value => value.trim() !== '', 'must not be blank');

const RuleSchema = z.object({
  intent: NonBlankString,
  keywords: z.array(NonBlankString).min(1, 'at least one keyword is required'),
  slots: z
    .record(z.string(), NonBlankString)
    .refine(slots => Object.keys(slots).length > 0, 'at least one slot is required')
    .refine(slots => Object.keys(slots).every(key => key.trim() !== ''), 'slot keys must not be blank'),
});

const RuleFileSchema = z.object({
  version: NonBlankString,
  rules: z.record(z.string(), RuleSchema),
});

const ReferenceSchema = z.object({
  id: z.union([z.number().int(), z.string()]),
  text: z.string({ required_error: 'text is required' }).refine(text => text.trim() !== '', 'text must not be blank'),
});

const ReferenceFileSchema = z.array(ReferenceSchema);

const ReplacementFileSchema = z.union([
  z.record(z.string(), z.string()),
  z.array(z.object({ from: z.string(), to: z.string() })),
]);

// ============================================
// Helpers
// ============================================

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function validate<S extends z.ZodTypeAny>(schema: S, data: unknown, source: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(source, formatZodIssues(result.error));
  }
  return result.data;
}

export function readJsonFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(path, [`cannot read file: ${reason}`], { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(path, [`invalid JSON: ${reason}`], { cause: error });
  }
}

// ============================================
// Rule Table
// ============================================

/**
 * Build a rule table from a parsed rule document. Rule keys must be positive
 * integers and unique once parsed ("1" and "01" collide). Rules are ordered by
 * ascending id, which is the order the corpus-wide intent prediction scans.
 */
export function parseRuleTable(data: unknown, source = 'rule table'): RuleTable {
  const file = validate(RuleFileSchema, data, source);

  const issues: string[] = [];
  const byId = new Map<number, ScenarioRule>();

  for (const [key, rule] of Object.entries(file.rules)) {
    const id = /^\s*\d+\s*$/.test(key) ? parseScenarioId(key) : null;
    if (id === null || id < 1) {
      issues.push(`rules.${key}: scenario id must be a positive integer`);
      continue;
    }
    if (byId.has(id)) {
      issues.push(`rules.${key}: duplicate scenario id ${id}`);
      continue;
    }
    byId.set(id, {
      id,
      intent: rule.intent,
      keywords: rule.keywords,
      slots: Object.entries(rule.slots).map(([slotKey, expectedValue]) => ({ key: slotKey, expectedValue })),
    });
  }

  if (byId.size === 0 && issues.length === 0) {
    issues.push('rules: at least one rule is required');
  }
  if (issues.length > 0) {
    throw new ConfigError(source, issues);
  }

  const rules = Array.from(byId.values()).sort((a, b) => a.id - b.id);
  return { version: file.version, rules, byId };
}

export function loadRuleTable(path: string): RuleTable {
  return parseRuleTable(readJsonFile(path), path);
}

// ============================================
// Ground-Truth References
// ============================================

/**
 * Build the scenario id -> reference text lookup from `[{ id, text }]`.
 * Blank texts, unparseable ids and duplicates are rejected.
 */
export function parseReferences(data: unknown, source = 'ground truth'): ReferenceLookup {
  const entries = validate(ReferenceFileSchema, data, source);

  const issues: string[] = [];
  const references = new Map<number, string>();

  entries.forEach((entry, index) => {
    const id = parseScenarioId(entry.id);
    if (id === null) {
      issues.push(`${index}.id: "${entry.id}" is not an integer scenario id`);
    } else if (references.has(id)) {
      issues.push(`${index}.id: duplicate scenario id ${id}`);
    } else {
      references.set(id, entry.text.trim());
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(source, issues);
  }
  return references;
}

export function loadReferences(path: string): ReferenceLookup {
  return parseReferences(readJsonFile(path), path);
}

// ============================================
// Replacement Table
// ============================================

/**
 * Accepts `{ "source": "target" }` or `[{ "from": "source", "to": "target" }]`.
 * Use the list form when a source is an integer-like string, since object
 * keys of that shape do not keep their insertion order.
 */
export function parseReplacementTable(data: unknown, source = 'replacement table'): ReplacementTable {
  const parsed = validate(ReplacementFileSchema, data, source);
  const pairs: Array<[string, string]> = Array.isArray(parsed)
    ? parsed.map(({ from, to }): [string, string] => [from, to])
    : Object.entries(parsed);

  const issues: string[] = [];
  const entries: ReplacementEntry[] = [];

  pairs.forEach(([from, to], index) => {
    if (from.trim() === '') {
      issues.push(`${index}: source phrase must not be blank`);
    } else if (to.trim() === '') {
      issues.push(`${index} (${from}): target phrase must not be blank`);
    } else {
      entries.push([from.toLowerCase(), to.toLowerCase()]);
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(source, issues);
  }
  return entries;
}

export function loadReplacementTable(path: string): ReplacementTable {
  return parseReplacementTable(readJsonFile(path), path);
}
