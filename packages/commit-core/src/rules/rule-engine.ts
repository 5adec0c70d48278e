/**
 * Rule engine
 *
 * Evaluates every rule of a rule set (no short-circuit), then appends plugin
 * violations. The verdict fails iff at least one violation is an error.
 */

import { minimatch } from 'minimatch';
import { noopLogger, type ChangeSet, type Logger, type Verdict, type Violation } from '@commit-warden/contracts';
import { runRuleHooks, type WardenPlugin } from '../plugins/hooks';
import { parseCommitMessage } from './commit-message';
import { renderTemplate } from './template';
import type { EvaluationInput, Rule, RuleContext, RuleSet } from './types';

export interface EvaluateOptions {
  plugins?: readonly WardenPlugin[];
  logger?: Logger;
}

export function createVerdict(violations: readonly Violation[]): Verdict {
  const frozen = Object.freeze([...violations]);
  return Object.freeze({
    violations: frozen,
    outcome: frozen.some((v) => v.severity === 'error') ? 'fail' : 'pass',
  });
}

function changedPaths(changeSet: ChangeSet): string[] {
  return changeSet.files.flatMap((file) => (file.oldPath !== undefined ? [file.path, file.oldPath] : [file.path]));
}

/**
 * Whether a rule's path and branch scoping lets it apply to this input
 */
export function ruleApplies(rule: Rule, paths: readonly string[], branch: string | undefined): boolean {
  if (rule.paths.length > 0) {
    const matched = paths.some((path) => rule.paths.some((glob) => minimatch(path, glob, { dot: true })));
    if (!matched) return false;
  }
  if (rule.branches.length > 0) {
    if (branch === undefined) return false;
    if (!rule.branches.some((glob) => minimatch(branch, glob))) return false;
  }
  return true;
}

/**
 * Evaluate a rule set against one classification, change set, finding list
 * and message. Pure: the same input always yields the same verdict.
 */
export function evaluate(ruleSet: RuleSet, input: EvaluationInput, options: EvaluateOptions = {}): Verdict {
  const logger = options.logger ?? noopLogger;
  const context: RuleContext = { ...input, parsed: parseCommitMessage(input.message) };
  const paths = changedPaths(input.changeSet);
  const violations: Violation[] = [];

  for (const rule of ruleSet.rules) {
    if (!ruleApplies(rule, paths, input.branch)) continue;

    for (const hit of rule.check(context)) {
      const violation: Violation = {
        ruleId: rule.id,
        severity: rule.severity,
        message: renderTemplate(rule.template, hit.values ?? {}),
      };
      if (hit.path !== undefined) violation.path = hit.path;
      if (hit.line !== undefined) violation.line = hit.line;
      violations.push(violation);
    }
  }

  if (options.plugins && options.plugins.length > 0) {
    violations.push(
      ...runRuleHooks(options.plugins, input.classification, input.changeSet, input.findings, input.message, logger)
    );
  }

  return createVerdict(violations);
}
