import type { WardenConfig } from '@commit-warden/contracts';
import { createBuiltInRules } from './builtin-rules';
import { createCustomRules } from './custom-rules';
import type { Rule, RuleSet, RuleShape } from './types';

export function createRuleSet(rules: readonly Rule[]): RuleSet {
  return Object.freeze({ rules: Object.freeze([...rules]) });
}

/**
 * Built-in rules followed by custom rules in configured order.
 * Built once per invocation and shared by every evaluation.
 */
export function buildRuleSet(config: WardenConfig): RuleSet {
  return createRuleSet([...createBuiltInRules(config), ...createCustomRules(config.rules.custom)]);
}

/**
 * Subset of a rule set with the given shape, order preserved
 */
export function restrictRuleSet(ruleSet: RuleSet, shape: RuleShape): RuleSet {
  return createRuleSet(ruleSet.rules.filter((rule) => rule.shape === shape));
}
