/**
 * Error types shared by every commit-warden package.
 *
 * Rule violations are never errors: they travel inside a Verdict.
 * Ambiguous scope resolution is a diagnostic, not an error.
 */

import type { Outcome } from './schema';

export type WardenErrorCode =
  | 'MALFORMED_DIFF'
  | 'ENCODING_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'HOOK_FAILURE';

export class WardenError extends Error {
  readonly code: WardenErrorCode;

  constructor(code: WardenErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Hunk header or hunk body does not match the unified diff grammar
 */
export class MalformedDiffError extends WardenError {
  /** 1-based line of the diff input where parsing stopped */
  readonly line: number;

  constructor(message: string, line: number) {
    super('MALFORMED_DIFF', `${message} (diff line ${line})`);
    this.line = line;
  }
}

export class EncodingError extends WardenError {
  readonly path?: string;

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('ENCODING_ERROR', path ? `${path}: ${message}` : message, options);
    this.path = path;
  }
}

export interface ConfigIssue {
  /** Dotted key path inside the configuration document or env variable name */
  path: string;
  message: string;
}

export class ConfigurationError extends WardenError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    const detail = issues.map((issue) => `  - ${issue.path || '<root>'}: ${issue.message}`).join('\n');
    super('CONFIGURATION_ERROR', detail ? `${message}\n${detail}` : message);
    this.issues = issues;
  }
}

export type HookKind = 'classify' | 'rules';

/**
 * A plugin hook threw or returned something that is not a valid result.
 * The pipeline logs it and carries on as if the hook returned nothing.
 */
export class HookFailure extends WardenError {
  readonly plugin: string;
  readonly hook: HookKind;

  constructor(plugin: string, hook: HookKind, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('HOOK_FAILURE', `Plugin "${plugin}" ${hook} hook failed: ${reason}`, { cause });
    this.plugin = plugin;
    this.hook = hook;
  }
}

// ============================================================================
// Exit codes
// ============================================================================

export const EXIT_CODES = {
  pass: 0,
  fail: 1,
  setup: 2,
  internal: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForOutcome(outcome: Outcome): ExitCode {
  return outcome === 'pass' ? EXIT_CODES.pass : EXIT_CODES.fail;
}

/**
 * Malformed input (diff, encoding, configuration) gets its own exit code
 * so CI can tell a broken setup from a rejected commit.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (
    error instanceof MalformedDiffError ||
    error instanceof EncodingError ||
    error instanceof ConfigurationError
  ) {
    return EXIT_CODES.setup;
  }
  return EXIT_CODES.internal;
}
