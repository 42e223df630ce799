/**
 * Transcript dataset loading for the eval runner
 */

import { z } from 'zod';
import { ConfigError } from '../src/errors.js';
import { formatZodIssues, readJsonFile } from '../src/config.js';
import type { EvalDataset } from './types.js';

const DatasetRecordSchema = z.object({
  audio: z.union([z.string(), z.number()]).nullable(),
  text: z.string().nullable().optional(),
});

const DatasetSchema = z.union([
  z.array(DatasetRecordSchema),
  z.object({
    version: z.string().optional(),
    records: z.array(DatasetRecordSchema),
  }),
]);

/**
 * Accepts a bare `[{ audio, text }]` list or `{ version, records }`. The
 * `audio` field carries the scenario id; ids are not checked here, since an
 * unresolvable id is scored as a failed record rather than rejected.
 */
export function parseDataset(data: unknown, source = 'dataset'): EvalDataset {
  const result = DatasetSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(source, formatZodIssues(result.error));
  }

  const parsed = result.data;
  const entries = Array.isArray(parsed) ? parsed : parsed.records;
  const version = Array.isArray(parsed) ? 'unversioned' : parsed.version ?? 'unversioned';

  return {
    version,
    records: entries.map(entry => ({
      audio: entry.audio,
      scenarioId: entry.audio,
      text: entry.text ?? null,
    })),
  };
}

export function loadDataset(path: string): EvalDataset {
  return parseDataset(readJsonFile(path), path);
}
