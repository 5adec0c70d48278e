/**
 * Shared command flags definitions
 *
 * Flags are defined once and used both to register options on the CLI and
 * to validate what the CLI parser hands back.
 */

import { z } from 'zod';

export interface FlagDefinition {
  type: 'string' | 'boolean' | 'number';
  description: string;
  alias?: string;
  default?: string | boolean | number;
  examples?: readonly string[];
}

export type FlagDefinitions = Record<string, FlagDefinition>;

// ============================================================================
// Common flags
// ============================================================================

/**
 * Flags accepted by every command
 */
export const commonFlags = {
  config: {
    type: 'string',
    description: 'Path to a configuration file (default: .commit-warden.json in the repository root)',
    alias: 'c',
  },
  cwd: {
    type: 'string',
    description: 'Repository directory',
  },
  json: {
    type: 'boolean',
    description: 'Output JSON instead of formatted text',
    default: false,
  },
  verbose: {
    type: 'boolean',
    description: 'Print debug logging to stderr',
    default: false,
  },
} as const satisfies FlagDefinitions;

const CommonOptionsSchema = z.object({
  config: z.string().min(1).optional(),
  cwd: z.string().min(1).optional(),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

// ============================================================================
// lint
// ============================================================================

/**
 * Flags for the lint command
 *
 * @example
 * ```bash
 * warden lint --message-file .git/COMMIT_EDITMSG --branch main
 * ```
 */
export const lintFlags = {
  message: {
    type: 'string',
    description: 'Commit message to validate (default: the synthesized draft)',
    alias: 'm',
  },
  'message-file': {
    type: 'string',
    description: 'Read the commit message from a file',
    examples: ['.git/COMMIT_EDITMSG'],
  },
  'diff-file': {
    type: 'string',
    description: 'Read the diff from a file instead of the staged changes',
  },
  branch: {
    type: 'string',
    description: 'Branch name used for branch-scoped rules (default: current branch)',
  },
} as const satisfies FlagDefinitions;

export const LintOptionsSchema = CommonOptionsSchema.extend({
  message: z.string().optional(),
  messageFile: z.string().min(1).optional(),
  diffFile: z.string().min(1).optional(),
  branch: z.string().min(1).optional(),
});

export type LintOptions = z.infer<typeof LintOptionsSchema>;

// ============================================================================
// suggest
// ============================================================================

/**
 * Flags for the suggest command
 */
export const suggestFlags = {
  'diff-file': {
    type: 'string',
    description: 'Read the diff from a file instead of the staged changes',
  },
} as const satisfies FlagDefinitions;

export const SuggestOptionsSchema = CommonOptionsSchema.extend({
  diffFile: z.string().min(1).optional(),
});

export type SuggestOptions = z.infer<typeof SuggestOptionsSchema>;

// ============================================================================
// check
// ============================================================================

/**
 * Flags for the check command
 *
 * @example
 * ```bash
 * warden check origin/main..HEAD --concurrency 8
 * ```
 */
export const checkFlags = {
  concurrency: {
    type: 'number',
    description: 'Commits validated in parallel',
    default: 4,
  },
} as const satisfies FlagDefinitions;

export const CheckOptionsSchema = CommonOptionsSchema.extend({
  concurrency: z.coerce.number().int().positive().default(4),
});

export type CheckOptions = z.infer<typeof CheckOptionsSchema>;
