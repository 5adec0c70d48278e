import { z } from 'zod';

// ============================================================================
// Diff Model
// ============================================================================

/**
 * How a file was touched by a change set
 */
export const ChangeKindSchema = z.enum(['added', 'modified', 'deleted', 'renamed', 'binary']);

export type ChangeKind = z.infer<typeof ChangeKindSchema>;

export const LineEditKindSchema = z.enum(['context', 'added', 'removed']);

export type LineEditKind = z.infer<typeof LineEditKindSchema>;

/**
 * A single line inside a hunk.
 * `oldLine` is set for context and removed lines, `newLine` for context and added lines.
 */
export const LineEditSchema = z.object({
  kind: LineEditKindSchema,
  text: z.string(),
  oldLine: z.number().int().positive().optional(),
  newLine: z.number().int().positive().optional(),
});

export type LineEdit = z.infer<typeof LineEditSchema>;

export const HunkSchema = z.object({
  oldStart: z.number().int().min(0),
  oldLines: z.number().int().min(0),
  newStart: z.number().int().min(0),
  newLines: z.number().int().min(0),
  /** Function context git prints after the closing `@@` (may be empty) */
  header: z.string(),
  edits: z.array(LineEditSchema),
});

export type Hunk = z.infer<typeof HunkSchema>;

export const FileChangeSchema = z.object({
  /** Repository-relative, POSIX separated */
  path: z.string().min(1),
  kind: ChangeKindSchema,
  oldPath: z.string().min(1).optional(),
  hunks: z.array(HunkSchema),
});

export type FileChange = z.infer<typeof FileChangeSchema>;

export const ChangeSetSchema = z.object({
  files: z.array(FileChangeSchema),
});

export type ChangeSet = z.infer<typeof ChangeSetSchema>;

// ============================================================================
// Packages
// ============================================================================

/**
 * A monorepo package or workspace.
 * The synthetic root package collects files outside every declared root.
 */
export const PackageSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  /** Repository-relative root, '' for the repository root */
  root: z.string(),
  /** Path prefixes owned by the package, sorted */
  members: z.array(z.string()),
  synthetic: z.boolean(),
});

export type Package = z.infer<typeof PackageSchema>;

export const ScopeDiagnosticSchema = z.object({
  kind: z.literal('scope-ambiguous'),
  path: z.string(),
  /** Roots of the packages that matched with equal prefix length */
  candidates: z.array(z.string()).min(2),
});

export type ScopeDiagnostic = z.infer<typeof ScopeDiagnosticSchema>;

export const PackageAssignmentSchema = z.object({
  path: z.string(),
  packages: z.array(PackageSchema).min(1),
});

export type PackageAssignment = z.infer<typeof PackageAssignmentSchema>;

/**
 * Result of package resolution: one assignment per changed path (sorted),
 * plus ambiguity diagnostics.
 */
export const PackageMapSchema = z.object({
  assignments: z.array(PackageAssignmentSchema),
  diagnostics: z.array(ScopeDiagnosticSchema),
});

export type PackageMap = z.infer<typeof PackageMapSchema>;

// ============================================================================
// Classification
// ============================================================================

export const CommitTypeSchema = z.string().regex(/^[a-z][a-z0-9-]*$/, 'commit type must be lowercase');

/**
 * What may stand between the parentheses of `type(scope): subject`
 */
export const SCOPE_PATTERN = /^[^()\s][^()\r\n]*$/;

export const ScopeSchema = z.string().regex(SCOPE_PATTERN, 'scope must not be empty or contain parentheses or line breaks');

export const ClassificationSchema = z.object({
  type: CommitTypeSchema,
  /** Primary scope first; `['multi']` when too many packages were touched */
  scopes: z.array(z.string()),
  breaking: z.boolean(),
  confidence: z.number().min(0).max(1),
  reasons: z.array(z.string()),
  diagnostics: z.array(ScopeDiagnosticSchema),
  /** Function context of the single dominant hunk, when there is one */
  dominantContext: z.string().optional(),
});

export type Classification = z.infer<typeof ClassificationSchema>;

/**
 * Partial classification returned by a plugin classify hook.
 * Fields left out keep the built-in value.
 */
export const ClassificationOverrideSchema = z.object({
  type: CommitTypeSchema.optional(),
  scopes: z.array(z.string().min(1)).optional(),
  breaking: z.boolean().optional(),
  confidence: z.number().min(0).max(1),
});

export type ClassificationOverride = z.infer<typeof ClassificationOverrideSchema>;

// ============================================================================
// Secret Scanning
// ============================================================================

export const ScanFindingSchema = z.object({
  path: z.string(),
  line: z.number().int().positive(),
  /** Pattern identifier, or 'entropy' */
  patternId: z.string(),
  excerpt: z.string(),
  confidence: z.number().min(0).max(1),
});

export type ScanFinding = z.infer<typeof ScanFindingSchema>;

// ============================================================================
// Verdict
// ============================================================================

export const SeveritySchema = z.enum(['error', 'warning']);

export type Severity = z.infer<typeof SeveritySchema>;

export const ViolationSchema = z.object({
  ruleId: z.string(),
  severity: SeveritySchema,
  message: z.string(),
  path: z.string().optional(),
  line: z.number().int().positive().optional(),
});

export type Violation = z.infer<typeof ViolationSchema>;

export const OutcomeSchema = z.enum(['pass', 'fail']);

export type Outcome = z.infer<typeof OutcomeSchema>;

export const VerdictSchema = z.object({
  /** Frozen: a verdict is never edited after it is created */
  violations: z.array(ViolationSchema).readonly(),
  outcome: OutcomeSchema,
});

export type Verdict = z.infer<typeof VerdictSchema>;

/**
 * Violations returned by a plugin rule hook
 */
export const HookViolationsSchema = z.array(ViolationSchema);
