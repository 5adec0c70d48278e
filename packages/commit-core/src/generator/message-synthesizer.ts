/**
 * Message synthesizer
 *
 * Builds a draft `type(scope)!: summary` message that satisfies the
 * configured message rules, and validates existing messages against the
 * message-shape subset of a rule set.
 */

import {
  defaultWardenConfig,
  type ChangeSet,
  type Classification,
  type Logger,
  type Verdict,
  type WardenConfig,
} from '@commit-warden/contracts';
import { characterCount, isValidScope } from '../rules/commit-message';
import { evaluate } from '../rules/rule-engine';
import { restrictRuleSet } from '../rules/rule-set';
import type { RuleSet } from '../rules/types';

export const SUMMARY_PLACEHOLDER = '<summary>';
export const BODY_PLACEHOLDER = '<describe what changed and why>';

const TYPE_VERBS: Record<string, string> = {
  feat: 'add',
  fix: 'fix',
  refactor: 'refactor',
  perf: 'optimize',
  docs: 'document',
  test: 'test',
  style: 'format',
  revert: 'revert',
};

const DECLARATION = /\b(?:function|class|def|fn|func|interface|type|struct|enum|trait|impl|module|const|let|var)\s+([A-Za-z_$][\w$]*)/;
const CALL = /([A-Za-z_$][\w$]*)\s*\(/;
const HEADING = /^#+\s+(.+)$/;

// ============================================================================
// Constraints
// ============================================================================

/**
 * What a draft has to respect, folded from built-in and custom rules.
 * Custom rules count even when path or branch scoped, so the draft passes
 * wherever it ends up being evaluated.
 */
export interface SynthesisConstraints {
  maxLength: number;
  minLength: number;
  requireScope: boolean;
  requireBody: boolean;
  /** Types the draft may use, in configured order */
  types: string[];
  /** Empty means any scope */
  allowedScopes: string[];
  rootScope: string;
  smartConfidenceThreshold: number;
}

export function deriveConstraints(config: WardenConfig): SynthesisConstraints {
  const { rules } = config;
  let maxLength = rules.maxSubjectLength;
  let minLength = rules.minSubjectLength;
  let requireScope = rules.requireScope;
  let requireBody = rules.requireBody;
  let types = rules.allowedTypes.filter((type) => !rules.forbiddenTypes.includes(type));

  for (const rule of rules.custom) {
    switch (rule.kind) {
      case 'max-subject-length':
        maxLength = Math.min(maxLength, rule.max);
        break;
      case 'min-subject-length':
        minLength = Math.max(minLength, rule.min);
        break;
      case 'require-scope':
        requireScope = true;
        break;
      case 'require-body':
        requireBody = true;
        break;
      case 'forbid-types':
        types = types.filter((type) => !rule.types.includes(type));
        break;
      case 'require-types':
        types = types.filter((type) => rule.types.includes(type));
        break;
      case 'subject-pattern':
        break;
    }
  }

  return {
    maxLength,
    minLength,
    requireScope,
    requireBody,
    types,
    allowedScopes: [...rules.allowedScopes],
    rootScope: config.monorepo.rootScope,
    smartConfidenceThreshold: config.synthesis.smartConfidenceThreshold,
  };
}

// ============================================================================
// Summary helpers
// ============================================================================

/**
 * Name of the function, class or section a hunk context line points at
 */
export function extractIdentifier(context: string): string | undefined {
  const heading = HEADING.exec(context.trim());
  if (heading?.[1]) return heading[1].trim().toLowerCase();
  return DECLARATION.exec(context)?.[1] ?? CALL.exec(context)?.[1];
}

/**
 * Cut text to at most `max` characters, at a word boundary when possible
 */
export function truncateWords(text: string, max: number): string {
  const chars = [...text];
  if (chars.length <= max) return text;
  const cut = chars.slice(0, Math.max(0, max)).join('');
  const lastSpace = cut.lastIndexOf(' ');
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd();
}

/**
 * Lengthen a summary by at least `deficit` characters with a fill-in marker
 */
function padSummary(summary: string, deficit: number): string {
  if (summary.startsWith('<') && summary.endsWith('>')) {
    return `${summary.slice(0, -1)}${'_'.repeat(deficit)}>`;
  }
  return `${summary} <${'_'.repeat(Math.max(0, deficit - 3))}>`;
}

function pickScope(classification: Classification, constraints: SynthesisConstraints): string | undefined {
  // Package names may hold characters the header grammar rejects
  const allowed = (scope: string) =>
    isValidScope(scope) && (constraints.allowedScopes.length === 0 || constraints.allowedScopes.includes(scope));

  const scope = classification.scopes.find(allowed);
  if (scope !== undefined || !constraints.requireScope) return scope;

  return allowed(constraints.rootScope) ? constraints.rootScope : constraints.allowedScopes.find(allowed);
}

function pickType(classification: Classification, constraints: SynthesisConstraints): string {
  if (constraints.types.includes(classification.type)) return classification.type;
  if (constraints.types.includes('chore')) return 'chore';
  return constraints.types[0] ?? classification.type;
}

// ============================================================================
// Drafting
// ============================================================================

export interface DraftMessage {
  type: string;
  scope?: string;
  breaking: boolean;
  summary: string;
  /** Summary derived from the dominant hunk rather than a placeholder */
  smart: boolean;
  header: string;
  body?: string;
  text: string;
}

export function draftMessage(
  classification: Classification,
  config: WardenConfig = defaultWardenConfig
): DraftMessage {
  const constraints = deriveConstraints(config);
  const type = pickType(classification, constraints);
  let scope = pickScope(classification, constraints);
  const bang = classification.breaking ? '!' : '';

  const identifier =
    classification.confidence >= constraints.smartConfidenceThreshold && classification.dominantContext
      ? extractIdentifier(classification.dominantContext)
      : undefined;
  const smart = identifier !== undefined;
  let summary = smart ? `${TYPE_VERBS[type] ?? 'update'} ${identifier}` : SUMMARY_PLACEHOLDER;

  const prefixFor = (s: string | undefined) => `${type}${s !== undefined ? `(${s})` : ''}${bang}: `;
  let prefix = prefixFor(scope);
  if (characterCount(prefix) >= constraints.maxLength && scope !== undefined && !constraints.requireScope) {
    scope = undefined;
    prefix = prefixFor(scope);
  }

  summary = truncateWords(summary, Math.max(1, constraints.maxLength - characterCount(prefix)));
  summary = summary.replace(/\.+$/, '');
  if (summary.length === 0) summary = SUMMARY_PLACEHOLDER;

  const deficit = constraints.minLength - characterCount(prefix + summary);
  if (deficit > 0) {
    summary = padSummary(summary, deficit);
  }

  const header = prefix + summary;
  const body = constraints.requireBody ? BODY_PLACEHOLDER : undefined;

  return {
    type,
    scope,
    breaking: classification.breaking,
    summary,
    smart,
    header,
    body,
    text: body !== undefined ? `${header}\n\n${body}` : header,
  };
}

/**
 * Draft message text for a classification
 */
export function synthesize(classification: Classification, config: WardenConfig = defaultWardenConfig): string {
  return draftMessage(classification, config).text;
}

// ============================================================================
// Validation
// ============================================================================

export interface ValidateContext {
  /** The commit's own diff, used for path-scoped rules */
  changeSet?: ChangeSet;
  branch?: string;
  logger?: Logger;
}

const EMPTY_CLASSIFICATION: Classification = {
  type: 'chore',
  scopes: [],
  breaking: false,
  confidence: 0,
  reasons: [],
  diagnostics: [],
};

/**
 * Validate a message against the message-shape rules of a rule set
 */
export function validateMessage(message: string, ruleSet: RuleSet, context: ValidateContext = {}): Verdict {
  return evaluate(
    restrictRuleSet(ruleSet, 'message'),
    {
      classification: EMPTY_CLASSIFICATION,
      changeSet: context.changeSet ?? { files: [] },
      findings: [],
      message,
      branch: context.branch,
    },
    { logger: context.logger }
  );
}
