/**
 * Commit analysis pipeline
 *
 * diff -> change set -> {packages, secrets} -> classification -> draft -> verdict
 *
 * The context (config, compiled rules, scanner, manifests, plugins) is built
 * once per process and passed into every run; runs share nothing else.
 */

import pLimit from 'p-limit';
import {
  defaultWardenConfig,
  noopLogger,
  type ChangeSet,
  type Classification,
  type Logger,
  type PackageMap,
  type ScanFinding,
  type Verdict,
  type WardenConfig,
} from '@commit-warden/contracts';
import { resolvePackages, type ManifestInput } from '../analyzer/package-resolver';
import { createSecretScanner, type SecretScanner, type SkippedFile } from '../analyzer/secrets-detector';
import { parseDiff } from '../diff/parse-diff';
import { classifyChangeSet } from '../generator/heuristics';
import { draftMessage, validateMessage, type DraftMessage } from '../generator/message-synthesizer';
import { applyClassifyHooks, type WardenPlugin } from '../plugins/hooks';
import { evaluate } from '../rules/rule-engine';
import { buildRuleSet } from '../rules/rule-set';
import type { RuleSet } from '../rules/types';

export interface PipelineContext {
  readonly config: WardenConfig;
  readonly ruleSet: RuleSet;
  readonly scanner: SecretScanner;
  readonly manifests: readonly ManifestInput[];
  readonly plugins: readonly WardenPlugin[];
  readonly logger: Logger;
}

export interface PipelineContextOptions {
  manifests?: readonly ManifestInput[];
  plugins?: readonly WardenPlugin[];
  logger?: Logger;
}

export function createPipelineContext(
  config: WardenConfig = defaultWardenConfig,
  options: PipelineContextOptions = {}
): PipelineContext {
  const logger = options.logger ?? noopLogger;
  return Object.freeze({
    config,
    ruleSet: buildRuleSet(config),
    scanner: createSecretScanner(config.security, logger),
    manifests: Object.freeze([...(options.manifests ?? [])]),
    plugins: Object.freeze([...(options.plugins ?? [])]),
    logger,
  });
}

export interface PipelineInput {
  /** Unified diff text or bytes */
  diff: string | Uint8Array;
  /** Message to validate; the synthesized draft when omitted */
  message?: string;
  branch?: string;
}

export interface PipelineResult {
  changeSet: ChangeSet;
  packageMap: PackageMap;
  findings: ScanFinding[];
  skipped: SkippedFile[];
  classification: Classification;
  draft: DraftMessage;
  /** The message that was evaluated */
  message: string;
  verdict: Verdict;
}

/**
 * Run every stage over one diff
 *
 * @throws MalformedDiffError, EncodingError from the diff stage
 */
export function runPipeline(context: PipelineContext, input: PipelineInput): PipelineResult {
  const { config, logger } = context;
  const startTime = Date.now();

  const changeSet = parseDiff(input.diff);
  const packageMap = resolvePackages(changeSet, context.manifests, {
    rootScope: config.monorepo.rootScope,
    logger,
  });
  const { findings, skipped } = context.scanner.scan(changeSet);

  const builtIn = classifyChangeSet(changeSet, packageMap, config);
  const classification = applyClassifyHooks(builtIn, context.plugins, changeSet, packageMap, logger);

  const draft = draftMessage(classification, config);
  const message = input.message ?? draft.text;

  const verdict = evaluate(
    context.ruleSet,
    { classification, changeSet, findings, message, branch: input.branch, skipped },
    { plugins: context.plugins, logger }
  );

  logger.debug('Pipeline finished', {
    files: changeSet.files.length,
    findings: findings.length,
    type: classification.type,
    outcome: verdict.outcome,
    durationMs: Date.now() - startTime,
  });

  return { changeSet, packageMap, findings, skipped, classification, draft, message, verdict };
}

// ============================================================================
// Existing commits
// ============================================================================

export interface CommitInput {
  sha: string;
  message: string;
  diff: string | Uint8Array;
}

export interface CommitCheckResult {
  sha: string;
  header: string;
  verdict: Verdict;
}

export interface CheckCommitsOptions {
  /** Commits validated in parallel (default: 4) */
  concurrency?: number;
}

/**
 * Validate stored commits against the message-shape rules, each with its
 * own diff for path scoping. Results come back in input order.
 */
export async function checkCommits(
  context: PipelineContext,
  commits: readonly CommitInput[],
  options: CheckCommitsOptions = {}
): Promise<CommitCheckResult[]> {
  const limit = pLimit(options.concurrency ?? 4);

  return Promise.all(
    commits.map((commit) =>
      limit(async () => {
        const changeSet = parseDiff(commit.diff);
        const verdict = validateMessage(commit.message, context.ruleSet, {
          changeSet,
          logger: context.logger,
        });
        return {
          sha: commit.sha,
          header: commit.message.split('\n')[0] ?? '',
          verdict,
        };
      })
    )
  );
}
