/**
 * Unified diff parser
 *
 * Turns `git diff` / `git show` / plain `diff -u` output into a ChangeSet.
 * Hunk bodies are consumed by the counts declared in their headers, so a
 * removed line that happens to start with `--` is never mistaken for a file
 * header.
 */

import {
  EncodingError,
  MalformedDiffError,
  type ChangeKind,
  type ChangeSet,
  type FileChange,
  type Hunk,
  type LineEdit,
} from '@commit-warden/contracts';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@ ?(.*)$/;
const DEV_NULL = '/dev/null';

interface FileDraft {
  /** 1-based line where the entry started */
  startLine: number;
  headerOld?: string;
  headerNew?: string;
  oldPath?: string;
  newPath?: string;
  /** `---` line seen */
  sawOld: boolean;
  oldIsNull: boolean;
  newIsNull: boolean;
  renameFrom?: string;
  renameTo?: string;
  created: boolean;
  deleted: boolean;
  binary: boolean;
  /** Inside a `GIT binary patch` block */
  binaryPatch: boolean;
  hunks: Hunk[];
}

function createDraft(startLine: number): FileDraft {
  return {
    startLine,
    sawOld: false,
    oldIsNull: false,
    newIsNull: false,
    created: false,
    deleted: false,
    binary: false,
    binaryPatch: false,
    hunks: [],
  };
}

// ============================================================================
// Path helpers
// ============================================================================

/**
 * Undo git's C-style quoting of paths with unusual characters
 */
export function unquotePath(raw: string): string {
  if (!raw.startsWith('"') || !raw.endsWith('"') || raw.length < 2) {
    return raw;
  }

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  const encoder = new TextEncoder();
  const escapes: Record<string, number> = { n: 10, t: 9, r: 13, '"': 34, '\\': 92, a: 7, b: 8, f: 12, v: 11 };

  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch !== '\\') {
      bytes.push(...encoder.encode(ch));
      continue;
    }
    const next = body.charAt(i + 1);
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else if (next in escapes) {
      bytes.push(escapes[next] ?? 0);
      i += 1;
    } else {
      bytes.push(92);
    }
  }

  return new TextDecoder().decode(new Uint8Array(bytes));
}

function stripPrefix(path: string, prefix: 'a/' | 'b/'): string {
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

/**
 * Path from a `---` / `+++` line: drops the timestamp `diff -u` appends after
 * a tab and the a/ or b/ prefix git adds.
 */
function parseHeaderPath(rest: string, prefix: 'a/' | 'b/'): string | null {
  const withoutStamp = rest.startsWith('"') ? rest : rest.split('\t')[0] ?? rest;
  const path = unquotePath(withoutStamp.trim());
  if (path === DEV_NULL) return null;
  return stripPrefix(path, prefix);
}

/**
 * Old and new path from `diff --git a/<old> b/<new>`
 */
function parseGitHeader(rest: string): { oldPath?: string; newPath?: string } {
  if (rest.startsWith('"')) {
    const close = findClosingQuote(rest);
    const oldRaw = rest.slice(0, close + 1);
    const newRaw = rest.slice(close + 2);
    return {
      oldPath: stripPrefix(unquotePath(oldRaw), 'a/'),
      newPath: stripPrefix(unquotePath(newRaw), 'b/'),
    };
  }

  // Same path on both sides is the common case, and the only one where
  // spaces in the path leave the split unambiguous.
  if ((rest.length - 5) % 2 === 0) {
    const half = (rest.length - 5) / 2;
    const oldPart = rest.slice(2, 2 + half);
    const newPart = rest.slice(5 + half);
    if (rest.startsWith('a/') && rest.slice(2 + half, 5 + half) === ' b/' && oldPart === newPart) {
      return { oldPath: oldPart, newPath: newPart };
    }
  }

  const split = rest.indexOf(' b/');
  if (split === -1) return {};
  const newRaw = rest.slice(split + 1);
  return {
    oldPath: stripPrefix(rest.slice(0, split), 'a/'),
    newPath: stripPrefix(newRaw.startsWith('"') ? unquotePath(newRaw) : newRaw, 'b/'),
  };
}

function findClosingQuote(text: string): number {
  for (let i = 1; i < text.length; i++) {
    if (text.charAt(i) === '\\') {
      i++;
      continue;
    }
    if (text.charAt(i) === '"') return i;
  }
  return text.length - 1;
}

// ============================================================================
// Input decoding
// ============================================================================

function decodeInput(input: string | Uint8Array): string {
  if (typeof input === 'string') {
    return input;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (error) {
    throw new EncodingError('diff input is not valid UTF-8', undefined, { cause: error });
  }
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse unified diff text into a ChangeSet
 *
 * @throws MalformedDiffError when a hunk header does not parse, a hunk body
 *   disagrees with its declared counts, hunks overlap, or a path repeats
 * @throws EncodingError when the input is not UTF-8, or a file that is not
 *   marked binary carries NUL characters
 */
export function parseDiff(input: string | Uint8Array): ChangeSet {
  const text = decodeInput(input).replace(/^\uFEFF/, '');
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const files: FileChange[] = [];
  const seenPaths = new Set<string>();
  let current: FileDraft | null = null;

  const flush = () => {
    if (current) {
      const file = finalizeDraft(current);
      for (const path of [file.path, file.oldPath]) {
        if (path === undefined) continue;
        if (seenPaths.has(path)) {
          throw new MalformedDiffError(`duplicate entry for path "${path}"`, current.startLine);
        }
        seenPaths.add(path);
      }
      files.push(file);
      current = null;
    }
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    const lineNo = i + 1;

    if (line.startsWith('diff --git ')) {
      flush();
      const draft = createDraft(lineNo);
      const paths = parseGitHeader(line.slice('diff --git '.length));
      draft.headerOld = paths.oldPath;
      draft.headerNew = paths.newPath;
      current = draft;
      continue;
    }

    if (current?.binaryPatch) {
      continue;
    }

    if (line.startsWith('--- ')) {
      if (!current || current.sawOld || current.hunks.length > 0) {
        flush();
        current = createDraft(lineNo);
      }
      const path = parseHeaderPath(line.slice(4), 'a/');
      current.sawOld = true;
      current.oldIsNull = path === null;
      current.oldPath = path ?? undefined;
      continue;
    }

    if (!current) {
      // Preamble such as the commit header printed by `git show`
      continue;
    }

    if (line.startsWith('+++ ')) {
      const path = parseHeaderPath(line.slice(4), 'b/');
      current.newIsNull = path === null;
      current.newPath = path ?? undefined;
      continue;
    }

    if (line.startsWith('@@')) {
      const hunk = readHunk(lines, i, current);
      current.hunks.push(hunk.value);
      i = hunk.lastIndex;
      continue;
    }

    if (line.startsWith('new file mode')) {
      current.created = true;
    } else if (line.startsWith('deleted file mode')) {
      current.deleted = true;
    } else if (line.startsWith('rename from ')) {
      current.renameFrom = unquotePath(line.slice('rename from '.length));
    } else if (line.startsWith('rename to ')) {
      current.renameTo = unquotePath(line.slice('rename to '.length));
    } else if (line.startsWith('copy to ')) {
      current.created = true;
      current.newPath = unquotePath(line.slice('copy to '.length));
    } else if (/^Binary files .* differ$/.test(line)) {
      current.binary = true;
    } else if (line === 'GIT binary patch') {
      current.binary = true;
      current.binaryPatch = true;
    } else if (current.hunks.length > 0 && (line.startsWith('+') || line.startsWith('-'))) {
      throw new MalformedDiffError('hunk body is longer than its header declares', lineNo);
    }
  }

  flush();
  return { files };
}

/**
 * Read one hunk starting at the `@@` line at `index`.
 * Returns the hunk and the index of its last body line.
 */
function readHunk(lines: string[], index: number, draft: FileDraft): { value: Hunk; lastIndex: number } {
  const headerLine = lines[index] ?? '';
  const match = HUNK_HEADER.exec(headerLine);
  if (!match) {
    throw new MalformedDiffError(`unparsable hunk header "${headerLine}"`, index + 1);
  }

  const oldStart = Number(match[1]);
  const oldLines = match[2] === undefined ? 1 : Number(match[2]);
  const newStart = Number(match[3]);
  const newLines = match[4] === undefined ? 1 : Number(match[4]);

  if ((oldLines > 0 && oldStart === 0) || (newLines > 0 && newStart === 0)) {
    throw new MalformedDiffError(`hunk range starts at line 0 but is not empty "${headerLine}"`, index + 1);
  }

  const previous = draft.hunks[draft.hunks.length - 1];
  if (previous) {
    if (oldStart < previous.oldStart + previous.oldLines || newStart < previous.newStart + previous.newLines) {
      throw new MalformedDiffError('hunks overlap or are out of order', index + 1);
    }
  }

  const edits: LineEdit[] = [];
  let oldRemaining = oldLines;
  let newRemaining = newLines;
  let oldLine = oldStart;
  let newLine = newStart;
  let i = index;

  while (oldRemaining > 0 || newRemaining > 0) {
    i++;
    if (i >= lines.length) {
      throw new MalformedDiffError(
        `hunk ended early, missing ${oldRemaining} old and ${newRemaining} new line(s)`,
        i
      );
    }

    const line = lines[i] ?? '';
    if (line.startsWith('\\')) {
      continue;
    }

    const marker = line.charAt(0);
    const text = line.slice(1);

    if (marker === ' ' || line === '') {
      if (oldRemaining === 0 || newRemaining === 0) {
        throw new MalformedDiffError('context line exceeds hunk range', i + 1);
      }
      edits.push({ kind: 'context', text, oldLine: oldLine++, newLine: newLine++ });
      oldRemaining--;
      newRemaining--;
    } else if (marker === '+') {
      if (newRemaining === 0) {
        throw new MalformedDiffError('added line exceeds hunk range', i + 1);
      }
      edits.push({ kind: 'added', text, newLine: newLine++ });
      newRemaining--;
    } else if (marker === '-') {
      if (oldRemaining === 0) {
        throw new MalformedDiffError('removed line exceeds hunk range', i + 1);
      }
      edits.push({ kind: 'removed', text, oldLine: oldLine++ });
      oldRemaining--;
    } else {
      throw new MalformedDiffError(`unexpected line in hunk body "${line}"`, i + 1);
    }
  }

  // "\ No newline at end of file" after the last body line
  if ((lines[i + 1] ?? '').startsWith('\\')) {
    i++;
  }

  return {
    value: { oldStart, oldLines, newStart, newLines, header: match[5] ?? '', edits },
    lastIndex: i,
  };
}

function finalizeDraft(draft: FileDraft): FileChange {
  const oldPath = draft.renameFrom ?? draft.oldPath ?? draft.headerOld;
  const newPath = draft.renameTo ?? draft.newPath ?? draft.headerNew;
  const renamedFrom =
    draft.renameFrom !== undefined && draft.renameTo !== undefined
      ? draft.renameFrom
      : draft.headerOld !== undefined && draft.headerNew !== undefined && draft.headerOld !== draft.headerNew
        ? draft.headerOld
        : undefined;

  const removed = draft.deleted || draft.newIsNull;
  const created = draft.created || draft.oldIsNull;

  let kind: ChangeKind;
  if (draft.binary) {
    kind = 'binary';
  } else if (created) {
    kind = 'added';
  } else if (removed) {
    kind = 'deleted';
  } else if (renamedFrom !== undefined) {
    kind = 'renamed';
  } else {
    kind = 'modified';
  }

  const path = removed ? oldPath ?? newPath : newPath ?? oldPath;
  if (!path) {
    throw new MalformedDiffError('file entry has no path', draft.startLine);
  }

  if (kind !== 'binary') {
    for (const hunk of draft.hunks) {
      const edit = hunk.edits.find((e) => e.text.includes('\u0000'));
      if (edit) {
        throw new EncodingError(
          `line ${edit.newLine ?? edit.oldLine ?? hunk.newStart} contains NUL characters but the file is not marked binary`,
          path
        );
      }
    }
  }

  const file: FileChange = {
    path,
    kind,
    hunks: kind === 'binary' ? [] : draft.hunks,
  };
  if (renamedFrom !== undefined && !created && !removed && renamedFrom !== path) {
    file.oldPath = renamedFrom;
  }
  return file;
}
