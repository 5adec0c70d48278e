/**
 * Per-invocation setup shared by the commands: repository root, resolved
 * configuration, discovered packages and the pipeline context built on them.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { readWardenEnv, type WardenConfig } from '@commit-warden/contracts';
import {
  createPipelineContext,
  discoverManifestLocations,
  findRepoRoot,
  getCurrentBranch,
  getStagedDiff,
  type PipelineContext,
} from '@commit-warden/core';
import type { CommandContext } from './define-command';
import { loadWardenConfig } from './load-config';

export interface Workspace {
  root: string;
  config: WardenConfig;
  pipeline: PipelineContext;
}

export interface WorkspaceOptions {
  cwd?: string;
  config?: string;
}

export async function openWorkspace(ctx: CommandContext, options: WorkspaceOptions): Promise<Workspace> {
  const root = options.cwd ? resolve(ctx.cwd, options.cwd) : await findRepoRoot(ctx.cwd);
  const config = await loadWardenConfig(root, options.config, readWardenEnv(ctx.env));
  const manifests = await discoverManifestLocations(root, {
    markers: config.monorepo.packageMarkers,
    packages: config.monorepo.packages,
    logger: ctx.logger,
  });

  ctx.logger.debug('Workspace opened', { root, packages: manifests.length });
  return {
    root,
    config,
    pipeline: createPipelineContext(config, { manifests, logger: ctx.logger }),
  };
}

/**
 * Diff bytes from `--diff-file` (relative to the invocation directory),
 * otherwise the staged changes
 */
export async function readDiff(ctx: CommandContext, root: string, diffFile?: string): Promise<string | Uint8Array> {
  if (diffFile) {
    return readFile(resolve(ctx.cwd, diffFile));
  }
  return getStagedDiff(root);
}

export async function readMessage(
  ctx: CommandContext,
  options: { message?: string; messageFile?: string }
): Promise<string | undefined> {
  if (options.message !== undefined) return options.message;
  if (options.messageFile) return readFile(resolve(ctx.cwd, options.messageFile), 'utf-8');
  return undefined;
}

/**
 * Branch for branch-scoped rules. Without `--branch` the current branch is
 * asked from git; a failure leaves branch-scoped rules inactive.
 */
export async function resolveBranch(ctx: CommandContext, root: string, branch?: string): Promise<string | undefined> {
  if (branch) return branch;
  try {
    return await getCurrentBranch(root);
  } catch (error) {
    ctx.logger.warn('Could not determine the current branch', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
