/**
 * Git access: staged diff, branch, and commits of a range
 *
 * The pipeline itself never touches git; these helpers fetch the raw input it
 * consumes. Diffs stay bytes so the parser sees invalid UTF-8 as it is.
 */

import pLimit from 'p-limit';
import { simpleGit, type SimpleGit } from 'simple-git';

const DIFF_ARGS = ['--no-color', '--no-ext-diff', '-M'];

export interface CommitRecord {
  sha: string;
  /** Full commit message (subject, body and trailers) */
  message: string;
  /** Diff against the first parent, undecoded */
  diff: Uint8Array;
}

/**
 * Repository top-level directory for `cwd`
 */
export async function findRepoRoot(cwd: string): Promise<string> {
  const git: SimpleGit = simpleGit(cwd);
  return (await git.revparse(['--show-toplevel'])).trim();
}

/**
 * Run a git command and collect its stdout as bytes rather than the text
 * simple-git resolves with
 */
async function rawBuffer(cwd: string, args: string[]): Promise<Buffer> {
  const chunks: Buffer[] = [];
  const git: SimpleGit = simpleGit(cwd).outputHandler((_command, stdout) => {
    stdout.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });
  });
  await git.raw(args);
  return Buffer.concat(chunks);
}

/**
 * Diff of the index against HEAD
 */
export async function getStagedDiff(cwd: string): Promise<Buffer> {
  return rawBuffer(cwd, ['diff', '--cached', ...DIFF_ARGS]);
}

/**
 * Current branch name, `undefined` on a detached HEAD
 */
export async function getCurrentBranch(cwd: string): Promise<string | undefined> {
  const git: SimpleGit = simpleGit(cwd);
  const branch = (await git.revparse(['--abbrev-ref', 'HEAD'])).trim();
  return branch === '' || branch === 'HEAD' ? undefined : branch;
}

/**
 * Message and first-parent diff of a single commit
 */
export async function getCommit(cwd: string, sha: string): Promise<CommitRecord> {
  const git: SimpleGit = simpleGit(cwd);
  const [message, diff] = await Promise.all([
    git.show(['-s', '--format=%B', sha]),
    git.showBuffer(['--format=', ...DIFF_ARGS, '-m', '--first-parent', sha]),
  ]);
  return { sha, message: message.replace(/\n+$/, ''), diff };
}

export interface RangeOptions {
  /** Commits fetched in parallel (default: 4) */
  concurrency?: number;
}

/**
 * Commits of a revision range (e.g. `main..HEAD`), oldest first
 */
export async function getCommitsInRange(
  cwd: string,
  range: string,
  options: RangeOptions = {}
): Promise<CommitRecord[]> {
  const git: SimpleGit = simpleGit(cwd);
  const shas = (await git.raw(['rev-list', '--reverse', range]))
    .split('\n')
    .map((sha) => sha.trim())
    .filter((sha) => sha.length > 0);

  const limit = pLimit(options.concurrency ?? 4);
  return Promise.all(shas.map((sha) => limit(() => getCommit(cwd, sha))));
}
