/**
 * lint command (default flow)
 * Staged diff → classification → verdict for the given (or drafted) message
 */

import {
  commonFlags,
  exitCodeForOutcome,
  lintFlags,
  LintOptionsSchema,
  type LintOptions,
} from '@commit-warden/contracts';
import { runPipeline } from '@commit-warden/core';
import { defineCommand } from '../define-command';
import { formatClassification, formatFindings, formatVerdict } from '../format';
import { openWorkspace, readDiff, readMessage, resolveBranch } from '../workspace';

export const lintCommand = defineCommand<LintOptions>({
  id: 'lint',
  description: 'Validate a commit message against the staged changes',
  flags: { ...commonFlags, ...lintFlags },
  schema: LintOptionsSchema,

  handler: {
    async execute(ctx, { options }) {
      const startTime = Date.now();
      const { root, pipeline } = await openWorkspace(ctx, options);

      const [diff, message, branch] = await Promise.all([
        readDiff(ctx, root, options.diffFile),
        readMessage(ctx, options),
        resolveBranch(ctx, root, options.branch),
      ]);

      const result = runPipeline(pipeline, { diff, message, branch });
      const exitCode = exitCodeForOutcome(result.verdict.outcome);

      if (options.json) {
        ctx.stdout(
          JSON.stringify(
            {
              message: result.message,
              classification: result.classification,
              findings: result.findings,
              verdict: result.verdict,
            },
            null,
            2
          )
        );
        return { exitCode, result };
      }

      if (message === undefined) {
        ctx.stdout(`${ctx.colors.bold('message')}    ${result.message}`);
      }
      if (options.verbose) {
        ctx.stdout(formatClassification(result.classification, ctx.colors));
      }
      if (result.findings.length > 0) {
        ctx.stdout(formatFindings(result.findings, ctx.colors));
      }
      ctx.stdout(formatVerdict(result.verdict, ctx.colors));

      ctx.logger.debug('lint finished', { timing: Date.now() - startTime });
      return { exitCode, result };
    },
  },
});
