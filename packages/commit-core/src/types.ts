/**
 * Core types
 *
 * Zod schemas and inferred types live in @commit-warden/contracts.
 * Re-exported here for convenience.
 */

export type {
  ChangeKind,
  ChangeSet,
  FileChange,
  Hunk,
  LineEdit,
  Package,
  PackageMap,
  ScopeDiagnostic,
  Classification,
  ClassificationOverride,
  ScanFinding,
  Severity,
  Violation,
  Verdict,
  WardenConfig,
} from '@commit-warden/contracts';
