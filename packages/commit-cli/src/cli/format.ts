/**
 * Terminal rendering of verdicts, classifications and check results
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Classification, ScanFinding, Verdict, Violation } from '@commit-warden/contracts';
import type { CommitCheckResult, DraftMessage } from '@commit-warden/core';

function location(violation: Violation): string {
  if (violation.path === undefined) return '';
  return violation.line !== undefined ? ` (${violation.path}:${violation.line})` : ` (${violation.path})`;
}

export function formatViolation(violation: Violation, colors: ChalkInstance = chalk): string {
  const label = violation.severity === 'error' ? colors.red('error  ') : colors.yellow('warning');
  return `  ${label} ${colors.bold(violation.ruleId)}: ${violation.message}${location(violation)}`;
}

export function countBySeverity(verdict: Verdict): { errors: number; warnings: number } {
  const errors = verdict.violations.filter((v) => v.severity === 'error').length;
  return { errors, warnings: verdict.violations.length - errors };
}

/**
 * Violations followed by a one-line summary
 */
export function formatVerdict(verdict: Verdict, colors: ChalkInstance = chalk): string {
  const { errors, warnings } = countBySeverity(verdict);
  const status = verdict.outcome === 'pass' ? colors.green('PASS') : colors.red('FAIL');
  return [
    ...verdict.violations.map((violation) => formatViolation(violation, colors)),
    `${status} ${errors} error(s), ${warnings} warning(s)`,
  ].join('\n');
}

export function formatClassification(classification: Classification, colors: ChalkInstance = chalk): string {
  const scope = classification.scopes.length > 0 ? classification.scopes.join(', ') : '-';
  const lines = [
    `${colors.bold('type')}       ${classification.type}${classification.breaking ? colors.red(' (breaking)') : ''}`,
    `${colors.bold('scopes')}     ${scope}`,
    `${colors.bold('confidence')} ${classification.confidence.toFixed(2)}`,
  ];
  for (const reason of classification.reasons) {
    lines.push(colors.gray(`  - ${reason}`));
  }
  return lines.join('\n');
}

export function formatDraft(draft: DraftMessage, colors: ChalkInstance = chalk): string {
  return draft.smart ? draft.text : `${draft.text}\n${colors.gray('(fill in the placeholders)')}`;
}

export function formatFindings(findings: readonly ScanFinding[], colors: ChalkInstance = chalk): string {
  return findings
    .map((f) => `  ${colors.red(f.patternId)} ${f.path}:${f.line} ${f.excerpt} (${f.confidence.toFixed(2)})`)
    .join('\n');
}

export function formatCheckResults(results: readonly CommitCheckResult[], colors: ChalkInstance = chalk): string {
  const lines: string[] = [];
  for (const result of results) {
    const mark = result.verdict.outcome === 'pass' ? colors.green('✔') : colors.red('✖');
    lines.push(`${mark} ${result.sha.slice(0, 7)} ${result.header}`);
    for (const violation of result.verdict.violations) {
      lines.push(`  ${formatViolation(violation, colors)}`);
    }
  }
  const failed = results.filter((r) => r.verdict.outcome === 'fail').length;
  lines.push(`${failed === 0 ? colors.green('PASS') : colors.red('FAIL')} ${failed} of ${results.length} commit(s) failed`);
  return lines.join('\n');
}
