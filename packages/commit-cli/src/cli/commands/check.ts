/**
 * check command
 * Validates the messages of existing commits, e.g. in CI over a pull request range
 */

import {
  checkFlags,
  CheckOptionsSchema,
  commonFlags,
  ConfigurationError,
  EXIT_CODES,
  type CheckOptions,
} from '@commit-warden/contracts';
import { checkCommits, getCommitsInRange } from '@commit-warden/core';
import { defineCommand } from '../define-command';
import { formatCheckResults } from '../format';
import { openWorkspace } from '../workspace';

export const checkCommand = defineCommand<CheckOptions>({
  id: 'check',
  description: 'Validate the messages of every commit in a revision range',
  flags: { ...commonFlags, ...checkFlags },
  argument: { name: 'range', description: 'Revision range, e.g. origin/main..HEAD' },
  schema: CheckOptionsSchema,

  handler: {
    async execute(ctx, { options, args }) {
      const range = args[0];
      if (!range) {
        throw new ConfigurationError('A revision range is required, e.g. origin/main..HEAD');
      }
      const { root, pipeline } = await openWorkspace(ctx, options);

      const commits = await getCommitsInRange(root, range, { concurrency: options.concurrency });
      ctx.logger.debug('Commits fetched', { range, commits: commits.length });

      const results = await checkCommits(pipeline, commits, { concurrency: options.concurrency });
      const exitCode = results.some((r) => r.verdict.outcome === 'fail') ? EXIT_CODES.fail : EXIT_CODES.pass;

      if (options.json) {
        ctx.stdout(JSON.stringify({ range, results }, null, 2));
      } else {
        ctx.stdout(formatCheckResults(results, ctx.colors));
      }
      return { exitCode, result: results };
    },
  },
});
