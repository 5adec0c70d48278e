/**
 * Rule engine module
 */

export { parseCommitMessage, cleanMessage, characterCount, isValidScope, type ParsedMessage, type Trailer } from './commit-message';
export { renderTemplate, type TemplateValues } from './template';
export { createBuiltInRules } from './builtin-rules';
export { createCustomRule, createCustomRules } from './custom-rules';
export { buildRuleSet, createRuleSet, restrictRuleSet } from './rule-set';
export { evaluate, createVerdict, ruleApplies, type EvaluateOptions } from './rule-engine';
export type { EvaluationInput, Rule, RuleContext, RuleHit, RuleSet, RuleShape } from './types';
