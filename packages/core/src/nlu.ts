/**
 * NLU evaluator
 * Scores a normalized transcript against its scenario's intent keywords and slots
 */

import { Intent } from './constants.js';
import { MatchPolicy } from './fuzzy.js';
import { parseScenarioId } from './scenario.js';
import type {
  IntentStrategy,
  NluResult,
  RuleTable,
  ScenarioRule,
  SlotOutcome,
  TranscriptRecord,
} from './types.js';

export const UNRESOLVED_NLU_RESULT: NluResult = {
  intentExpected: Intent.UNKNOWN,
  intentPredicted: Intent.ERROR,
  intentSuccess: false,
  slots: [],
  slotsHitCount: 0,
  slotsTotalCount: 0,
  slotsSuccess: false,
  overallSuccess: false,
};

export interface NluEvaluatorOptions {
  /**
   * 'rule' checks only the record's own scenario. 'corpus' predicts the first
   * rule in table order whose keywords all match, which surfaces transcripts
   * that would trigger another scenario's intent.
   */
  readonly strategy?: IntentStrategy;
  readonly policy?: MatchPolicy;
}

// ============================================
// Evaluator
// ============================================

export class NluEvaluator {
  private readonly rules: RuleTable;
  private readonly strategy: IntentStrategy;
  private readonly policy: MatchPolicy;

  constructor(rules: RuleTable, options: NluEvaluatorOptions = {}) {
    this.rules = rules;
    this.strategy = options.strategy ?? 'rule';
    this.policy = options.policy ?? new MatchPolicy();
  }

  /**
   * Evaluate one record. Unparseable or unknown scenario ids yield
   * `UNRESOLVED_NLU_RESULT`; this never throws.
   */
  evaluate(record: TranscriptRecord): NluResult {
    const scenarioId = parseScenarioId(record.scenarioId);
    const rule = scenarioId === null ? undefined : this.rules.byId.get(scenarioId);
    if (rule === undefined) {
      return UNRESOLVED_NLU_RESULT;
    }

    const text = (record.text ?? '').toLowerCase();

    const intentPredicted = this.predictIntent(rule, text);
    const intentSuccess = intentPredicted === rule.intent;

    const slots = this.matchSlots(rule, text);
    const slotsHitCount = slots.filter(slot => slot.hit).length;
    const slotsSuccess = slotsHitCount === slots.length;

    return {
      intentExpected: rule.intent,
      intentPredicted,
      intentSuccess,
      slots,
      slotsHitCount,
      slotsTotalCount: slots.length,
      slotsSuccess,
      overallSuccess: intentSuccess && slotsSuccess,
    };
  }

  predictIntent(rule: ScenarioRule, text: string): string {
    if (this.strategy === 'corpus') {
      const matched = this.rules.rules.find(candidate => this.keywordsMatch(candidate, text));
      return matched?.intent ?? Intent.NO_MATCH;
    }
    return this.keywordsMatch(rule, text) ? rule.intent : Intent.NO_MATCH;
  }

  keywordsMatch(rule: ScenarioRule, text: string): boolean {
    return rule.keywords.every(keyword => this.policy.keywordMatches(keyword, text));
  }

  matchSlots(rule: ScenarioRule, text: string): SlotOutcome[] {
    return rule.slots.map(({ key, expectedValue }) => {
      const variant = this.policy.selectVariant(expectedValue);
      const score = this.policy.score(variant, expectedValue, text);
      return {
        key,
        expectedValue,
        score,
        variant,
        hit: this.policy.slotMatches(score),
      };
    });
  }
}
