/**
 * Shape measurements over a change set, used by the classifier and the
 * message synthesizer
 */

import type { FileChange, Hunk } from '@commit-warden/contracts';
import { countHunkChanges } from '../diff/stats';

/**
 * Share of added lines among all changed lines (1 when nothing changed)
 */
export function calculateAdditionRatio(files: readonly FileChange[]): number {
  let additions = 0;
  let deletions = 0;
  for (const file of files) {
    for (const hunk of file.hunks) {
      const counts = countHunkChanges(hunk);
      additions += counts.additions;
      deletions += counts.deletions;
    }
  }
  const total = additions + deletions;
  return total === 0 ? 1 : additions / total;
}

/**
 * The hunk with strictly more changed lines than every other hunk.
 * `undefined` when the change set has no hunks or the largest ones tie.
 */
export function findDominantHunk(files: readonly FileChange[]): Hunk | undefined {
  let best: Hunk | undefined;
  let bestSize = -1;
  let tied = false;

  for (const file of files) {
    for (const hunk of file.hunks) {
      const { additions, deletions } = countHunkChanges(hunk);
      const size = additions + deletions;
      if (size > bestSize) {
        best = hunk;
        bestSize = size;
        tied = false;
      } else if (size === bestSize) {
        tied = true;
      }
    }
  }

  return tied ? undefined : best;
}
