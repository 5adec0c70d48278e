import type { ChangeSet, Classification, ScanFinding, Severity } from '@commit-warden/contracts';
import type { SkippedFile } from '../analyzer/secrets-detector';
import type { ParsedMessage } from './commit-message';
import type { TemplateValues } from './template';

/**
 * What a rule looks at.
 * `message` rules only read the commit message (plus path and branch scoping),
 * `change` rules read the classification, the diff or the scan findings.
 */
export type RuleShape = 'message' | 'change';

/**
 * Everything a single evaluation sees
 */
export interface EvaluationInput {
  classification: Classification;
  changeSet: ChangeSet;
  findings: readonly ScanFinding[];
  /** Commit message text, draft or final */
  message: string;
  /** Branch name, when known; branch-scoped rules never apply without one */
  branch?: string;
  /** Files the secret scanner had to skip */
  skipped?: readonly SkippedFile[];
}

export interface RuleContext extends EvaluationInput {
  parsed: ParsedMessage;
}

/**
 * One reason a rule fired; rendered into a Violation
 */
export interface RuleHit {
  values?: TemplateValues;
  path?: string;
  line?: number;
}

export interface Rule {
  id: string;
  severity: Severity;
  /** Message template with `{placeholder}` values taken from the hit */
  template: string;
  shape: RuleShape;
  /** Path globs, empty means unscoped */
  paths: readonly string[];
  /** Branch globs, empty means unscoped */
  branches: readonly string[];
  check(context: RuleContext): RuleHit[];
}

/**
 * Ordered, immutable collection of rules
 */
export interface RuleSet {
  readonly rules: readonly Rule[];
}
