/**
 * commit-warden core
 *
 * Diff parsing, package resolution, classification, secret scanning,
 * rule evaluation and message synthesis.
 *
 * @module @commit-warden/core
 */

// Types
export type * from './types';

// Diff model
export * from './diff';

// Analyzer
export * from './analyzer';

// Generator
export * from './generator';

// Rules
export * from './rules';

// Plugins
export {
  applyClassifyHooks,
  runRuleHooks,
  mergeClassification,
  type WardenPlugin,
  type ClassifyHook,
  type RuleHook,
} from './plugins/hooks';

// Pipeline
export {
  createPipelineContext,
  runPipeline,
  checkCommits,
  type PipelineContext,
  type PipelineContextOptions,
  type PipelineInput,
  type PipelineResult,
  type CommitInput,
  type CommitCheckResult,
  type CheckCommitsOptions,
} from './pipeline/run-pipeline';
