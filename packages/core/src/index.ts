/**
 * @voice-eval/core
 * Normalization, NLU and WER scoring for Spanish voice-command transcripts
 */

// Types
export * from './types.js';

// Constants
export {
  Intent,
  Threshold,
  DEFAULT_REPLACEMENTS,
  MASCULINE_UNIT_NOUNS,
} from './constants.js';

// Errors
export { ConfigError } from './errors.js';

// Configuration
export {
  readJsonFile,
  parseRuleTable,
  loadRuleTable,
  parseReferences,
  loadReferences,
  parseReplacementTable,
  loadReplacementTable,
} from './config.js';

// Normalization
export {
  TextNormalizer,
  normalizeText,
  compileReplacements,
  type NormalizerOptions,
} from './normalizer.js';
export { spanishNumberConverter, isDigitCode, digitsToWords } from './numbers.js';

// Matching & NLU
export {
  MatchPolicy,
  partialRatio,
  tokenSetRatio,
  DEFAULT_SCORERS,
  type MatchPolicyOptions,
  type ScorerSet,
} from './fuzzy.js';
export { parseScenarioId } from './scenario.js';
export { NluEvaluator, UNRESOLVED_NLU_RESULT, type NluEvaluatorOptions } from './nlu.js';

// WER
export { WerScorer, alignWords, scoreTexts, aggregateWer, tokenize, errorCount } from './wer.js';

// Pipeline
export {
  EvaluationPipeline,
  toResultRow,
  type EvaluationPipelineOptions,
  type ResultFields,
  type ResultRow,
} from './pipeline.js';
