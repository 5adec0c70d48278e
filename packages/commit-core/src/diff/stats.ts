import type { ChangeSet, FileChange, Hunk } from '@commit-warden/contracts';

export interface FileStats {
  path: string;
  additions: number;
  deletions: number;
  binary: boolean;
}

export interface ChangeSetStats {
  filesChanged: number;
  additions: number;
  deletions: number;
  binaryFiles: number;
  files: FileStats[];
}

export function countHunkChanges(hunk: Hunk): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const edit of hunk.edits) {
    if (edit.kind === 'added') additions += 1;
    if (edit.kind === 'removed') deletions += 1;
  }
  return { additions, deletions };
}

export function computeFileStats(file: FileChange): FileStats {
  let additions = 0;
  let deletions = 0;
  for (const hunk of file.hunks) {
    const counts = countHunkChanges(hunk);
    additions += counts.additions;
    deletions += counts.deletions;
  }
  return { path: file.path, additions, deletions, binary: file.kind === 'binary' };
}

/**
 * Added plus removed lines of one file
 */
export function changedLines(file: FileChange): number {
  const stats = computeFileStats(file);
  return stats.additions + stats.deletions;
}

export function summarizeChangeSet(changeSet: ChangeSet): ChangeSetStats {
  const files = changeSet.files.map(computeFileStats);
  return {
    filesChanged: files.length,
    additions: files.reduce((sum, f) => sum + f.additions, 0),
    deletions: files.reduce((sum, f) => sum + f.deletions, 0),
    binaryFiles: files.filter((f) => f.binary).length,
    files,
  };
}
