/**
 * suggest command
 * Prints a commit message drafted from the staged changes
 */

import { commonFlags, suggestFlags, SuggestOptionsSchema, type SuggestOptions } from '@commit-warden/contracts';
import { runPipeline } from '@commit-warden/core';
import { defineCommand } from '../define-command';
import { formatClassification, formatDraft } from '../format';
import { openWorkspace, readDiff } from '../workspace';

export const suggestCommand = defineCommand<SuggestOptions>({
  id: 'suggest',
  description: 'Draft a commit message for the staged changes',
  flags: { ...commonFlags, ...suggestFlags },
  schema: SuggestOptionsSchema,

  handler: {
    async execute(ctx, { options }) {
      const { root, pipeline } = await openWorkspace(ctx, options);
      const diff = await readDiff(ctx, root, options.diffFile);
      const { classification, draft, findings } = runPipeline(pipeline, { diff });

      if (options.json) {
        ctx.stdout(JSON.stringify({ draft, classification, findings }, null, 2));
        return { exitCode: 0, result: draft };
      }

      if (options.verbose) {
        ctx.stdout(formatClassification(classification, ctx.colors));
      }
      if (findings.length > 0) {
        ctx.logger.warn(`${findings.length} possible secret(s) in the staged changes; run "warden lint" for details`);
      }
      ctx.stdout(formatDraft(draft, ctx.colors));
      return { exitCode: 0, result: draft };
    },
  },
});
