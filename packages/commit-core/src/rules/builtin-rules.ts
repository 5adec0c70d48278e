/**
 * Built-in rules
 *
 * Every rule is a total predicate: it returns zero or more hits and never
 * throws for any message, diff or finding list.
 */

import type { WardenConfig } from '@commit-warden/contracts';
import { isSecretFile } from '../analyzer/secrets-detector';
import { changedLines } from '../diff/stats';
import { characterCount } from './commit-message';
import type { Rule, RuleContext, RuleHit } from './types';

/**
 * Past tense and gerund forms that signal a non-imperative subject
 */
const NON_IMPERATIVE_WORDS = new Set([
  'added',
  'adding',
  'adds',
  'fixed',
  'fixing',
  'fixes',
  'updated',
  'updating',
  'updates',
  'removed',
  'removing',
  'removes',
  'changed',
  'changing',
  'changes',
  'implemented',
  'implementing',
  'implements',
  'created',
  'creating',
  'creates',
]);

function messageRule(
  id: string,
  severity: Rule['severity'],
  template: string,
  check: (context: RuleContext) => RuleHit[]
): Rule {
  return { id, severity, template, shape: 'message', paths: [], branches: [], check };
}

function changeRule(
  id: string,
  severity: Rule['severity'],
  template: string,
  check: (context: RuleContext) => RuleHit[]
): Rule {
  return { id, severity, template, shape: 'change', paths: [], branches: [], check };
}

const hit = (values: RuleHit['values'] = {}): RuleHit[] => [{ values }];

/**
 * Rules derived from the top-level configuration keys, in evaluation order
 */
export function createBuiltInRules(config: WardenConfig): Rule[] {
  const { rules, security } = config;
  const forbidden = new Set(rules.forbiddenTypes);

  return [
    // ------------------------------------------------------------------
    // Message shape
    // ------------------------------------------------------------------
    messageRule('header-format', 'error', 'Header must follow "type(scope): subject", got "{header}"', ({ parsed }) =>
      parsed.conventional ? [] : hit({ header: parsed.header })
    ),

    messageRule(
      'subject-too-long',
      'error',
      'Header is {length} characters long, the maximum is {max}',
      ({ parsed }) => {
        const length = characterCount(parsed.header);
        return length > rules.maxSubjectLength ? hit({ length, max: rules.maxSubjectLength }) : [];
      }
    ),

    messageRule(
      'subject-too-short',
      'error',
      'Header is {length} characters long, the minimum is {min}',
      ({ parsed }) => {
        const length = characterCount(parsed.header);
        return rules.minSubjectLength > 0 && length < rules.minSubjectLength
          ? hit({ length, min: rules.minSubjectLength })
          : [];
      }
    ),

    messageRule('type-not-allowed', 'error', 'Type "{type}" is not one of: {allowed}', ({ parsed }) =>
      parsed.type !== undefined && !forbidden.has(parsed.type) && !rules.allowedTypes.includes(parsed.type)
        ? hit({ type: parsed.type, allowed: rules.allowedTypes.join(', ') })
        : []
    ),

    messageRule('type-forbidden', 'error', 'Type "{type}" is forbidden', ({ parsed }) =>
      parsed.type !== undefined && forbidden.has(parsed.type) ? hit({ type: parsed.type }) : []
    ),

    messageRule('scope-required', 'error', 'A scope is required, e.g. "{type}(<scope>): ..."', ({ parsed }) =>
      rules.requireScope && parsed.scope === undefined ? hit({ type: parsed.type ?? '<type>' }) : []
    ),

    messageRule('scope-not-allowed', 'error', 'Scope "{scope}" is not one of: {allowed}', ({ parsed }) =>
      rules.allowedScopes.length > 0 && parsed.scope !== undefined && !rules.allowedScopes.includes(parsed.scope)
        ? hit({ scope: parsed.scope, allowed: rules.allowedScopes.join(', ') })
        : []
    ),

    messageRule('body-required', 'error', 'A message body is required', ({ parsed }) =>
      rules.requireBody && parsed.body === undefined ? hit() : []
    ),

    messageRule('subject-case', 'warning', 'Subject should start with a lowercase letter', ({ parsed }) =>
      parsed.subject !== undefined && /^\p{Lu}/u.test(parsed.subject) ? hit() : []
    ),

    messageRule('subject-trailing-period', 'warning', 'Subject should not end with a period', ({ parsed }) =>
      parsed.subject?.endsWith('.') ? hit() : []
    ),

    messageRule(
      'subject-imperative',
      'warning',
      'Use the imperative mood in the subject ("{word}" reads as past tense or gerund)',
      ({ parsed }) => {
        const word = parsed.subject?.split(/\s+/)[0]?.toLowerCase();
        return word !== undefined && NON_IMPERATIVE_WORDS.has(word) ? hit({ word }) : [];
      }
    ),

    // ------------------------------------------------------------------
    // Change aware
    // ------------------------------------------------------------------
    changeRule(
      'breaking-not-declared',
      'warning',
      'The change looks breaking but the message has no "!" or BREAKING CHANGE footer',
      ({ classification, parsed }) => (classification.breaking && !parsed.breaking ? hit() : [])
    ),

    changeRule(
      'secret-detected',
      security.blockOnSecret ? 'error' : 'warning',
      'Possible secret ({patternId}) at {path}:{line}: {excerpt}',
      ({ findings }) =>
        findings.map((finding) => ({
          values: { patternId: finding.patternId, path: finding.path, line: finding.line, excerpt: finding.excerpt },
          path: finding.path,
          line: finding.line,
        }))
    ),

    changeRule('secret-scan-skipped', 'warning', 'Secret scan skipped {path}: {reason}', ({ skipped = [] }) =>
      skipped.map((file) => ({ values: { path: file.path, reason: file.reason }, path: file.path }))
    ),

    changeRule(
      'scope-ambiguous',
      'warning',
      '{path} matches several packages ({candidates}); attributed to the repository root',
      ({ classification }) =>
        classification.diagnostics.map((diagnostic) => ({
          values: { path: diagnostic.path, candidates: diagnostic.candidates.join(', ') },
          path: diagnostic.path,
        }))
    ),

    changeRule(
      'oversized-commit',
      'warning',
      'Commit changes {lines} lines (more than {max}); consider splitting it',
      ({ changeSet }) => {
        const lines = changeSet.files.reduce((sum, file) => sum + changedLines(file), 0);
        return lines > rules.maxChangedLines ? hit({ lines, max: rules.maxChangedLines }) : [];
      }
    ),

    changeRule('risky-file', 'warning', '{path} looks like a credentials file', ({ changeSet }) =>
      changeSet.files
        .filter((file) => file.kind !== 'deleted' && isSecretFile(file.path))
        .map((file) => ({ values: { path: file.path }, path: file.path }))
    ),

    changeRule('binary-file', 'warning', 'Binary file {path} is part of the commit', ({ changeSet }) =>
      changeSet.files
        .filter((file) => file.kind === 'binary')
        .map((file) => ({ values: { path: file.path }, path: file.path }))
    ),
  ];
}
