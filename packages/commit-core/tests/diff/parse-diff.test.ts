/**
 * Tests for parse-diff.ts - unified diff to ChangeSet
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { EncodingError, MalformedDiffError } from '@commit-warden/contracts';
import { parseDiff, unquotePath } from '../../src/diff/parse-diff';
import { summarizeChangeSet } from '../../src/diff/stats';

const testDir = dirname(fileURLToPath(import.meta.url));
const fixture = (name: string) => readFile(resolve(testDir, '../fixtures', name), 'utf-8');

describe('parseDiff', () => {
  it('should parse every file kind of a git show output', async () => {
    const changeSet = parseDiff(await fixture('git-multi.diff'));

    expect(changeSet.files.map((f) => [f.path, f.kind])).toEqual([
      ['packages/core/src/parse.ts', 'modified'],
      ['packages/core/README.md', 'added'],
      ['legacy/old.js', 'deleted'],
      ['docs/handbook.md', 'renamed'],
      ['assets/logo.png', 'binary'],
    ]);
    expect(changeSet.files[3]?.oldPath).toBe('docs/guide.md');
    expect(changeSet.files[0]?.oldPath).toBeUndefined();
    expect(changeSet.files[4]?.hunks).toEqual([]);
  });

  it('should number added, removed and context lines', async () => {
    const changeSet = parseDiff(await fixture('git-multi.diff'));
    const hunk = changeSet.files[0]?.hunks[0];

    expect(hunk).toMatchObject({
      oldStart: 1,
      oldLines: 4,
      newStart: 1,
      newLines: 5,
      header: 'export function parse(input: string) {',
    });
    expect(hunk?.edits).toEqual([
      { kind: 'context', text: 'const a = 1;', oldLine: 1, newLine: 1 },
      { kind: 'removed', text: 'const b = 2;', oldLine: 2 },
      { kind: 'added', text: 'const b = 3;', newLine: 2 },
      { kind: 'added', text: 'const c = 4;', newLine: 3 },
      { kind: 'context', text: 'const d = 5;', oldLine: 3, newLine: 4 },
      { kind: 'context', text: 'const e = 6;', oldLine: 4, newLine: 5 },
    ]);
  });

  it('should summarize additions, deletions and binary files', async () => {
    const stats = summarizeChangeSet(parseDiff(await fixture('git-multi.diff')));

    expect(stats).toMatchObject({ filesChanged: 5, additions: 5, deletions: 4, binaryFiles: 1 });
  });

  it('should parse a headerless diff -u output with timestamps', async () => {
    const changeSet = parseDiff(await fixture('headerless.diff'));

    expect(changeSet.files).toHaveLength(1);
    expect(changeSet.files[0]?.path).toBe('hello.txt');
    expect(changeSet.files[0]?.kind).toBe('modified');
    expect(changeSet.files[0]?.hunks[0]?.edits.map((e) => e.kind)).toEqual(['removed', 'added', 'context']);
  });

  it('should accept bytes and CRLF line endings', () => {
    const text = '--- a/x.txt\r\n+++ b/x.txt\r\n@@ -1 +1 @@\r\n-old\r\n+new\r\n';
    const changeSet = parseDiff(new TextEncoder().encode(text));

    expect(changeSet.files[0]?.hunks[0]?.edits).toEqual([
      { kind: 'removed', text: 'old', oldLine: 1 },
      { kind: 'added', text: 'new', newLine: 1 },
    ]);
  });

  it('should treat a removed line starting with -- as hunk body', () => {
    const diff = ['--- a/sql/schema.sql', '+++ b/sql/schema.sql', '@@ -1,2 +1,2 @@', '--- old comment', '+-- new comment', ' SELECT 1;'].join('\n');
    const edits = parseDiff(diff).files[0]?.hunks[0]?.edits;

    expect(edits?.[0]).toEqual({ kind: 'removed', text: '-- old comment', oldLine: 1 });
    expect(edits?.[1]).toEqual({ kind: 'added', text: '-- new comment', newLine: 1 });
  });

  it('should decode quoted paths', () => {
    const diff = [
      'diff --git "a/caf\\303\\251.txt" "b/caf\\303\\251.txt"',
      'new file mode 100644',
      '--- /dev/null',
      '+++ "b/caf\\303\\251.txt"',
      '@@ -0,0 +1 @@',
      '+bonjour',
    ].join('\n');

    expect(parseDiff(diff).files[0]).toMatchObject({ path: 'café.txt', kind: 'added' });
  });

  it('should return an empty change set for empty input', () => {
    expect(parseDiff('')).toEqual({ files: [] });
  });

  describe('malformed input', () => {
    it('should reject a hunk that ends before its declared counts', () => {
      const diff = ['--- a/x', '+++ b/x', '@@ -1,2 +1,2 @@', ' one'].join('\n');

      expect(() => parseDiff(diff)).toThrow(MalformedDiffError);
      expect(() => parseDiff(diff)).toThrow('hunk ended early, missing 1 old and 1 new line(s) (diff line 4)');
    });

    it('should reject an unparsable hunk header', () => {
      const diff = ['--- a/x', '+++ b/x', '@@ -a +1 @@', '+x'].join('\n');

      expect(() => parseDiff(diff)).toThrow('unparsable hunk header "@@ -a +1 @@" (diff line 3)');
    });

    it('should reject overlapping hunks', () => {
      const diff = ['--- a/x', '+++ b/x', '@@ -1,2 +1,2 @@', ' a', ' b', '@@ -2 +2 @@', '-b', '+c'].join('\n');

      expect(() => parseDiff(diff)).toThrow('hunks overlap or are out of order (diff line 6)');
    });

    it('should reject body lines beyond the declared counts', () => {
      const diff = ['--- a/x', '+++ b/x', '@@ -1 +1 @@', '-a', '+b', '+c'].join('\n');

      expect(() => parseDiff(diff)).toThrow('hunk body is longer than its header declares (diff line 6)');
    });

    it('should reject a path that appears twice', () => {
      const entry = ['--- a/x', '+++ b/x', '@@ -1 +1 @@', '-a', '+b'];
      const diff = [...entry, ...entry].join('\n');

      expect(() => parseDiff(diff)).toThrow('duplicate entry for path "x" (diff line 6)');
    });
  });

  describe('encoding', () => {
    it('should reject bytes that are not UTF-8', () => {
      expect(() => parseDiff(new Uint8Array([0x2d, 0xff, 0xfe]))).toThrow(EncodingError);
    });

    it('should reject NUL characters in a file not marked binary', () => {
      const diff = ['--- a/blob.dat', '+++ b/blob.dat', '@@ -1 +1 @@', '-a', '+b\u0000c'].join('\n');

      expect(() => parseDiff(diff)).toThrow(
        'blob.dat: line 1 contains NUL characters but the file is not marked binary'
      );
    });
  });
});

describe('unquotePath', () => {
  it('should leave unquoted paths alone', () => {
    expect(unquotePath('src/a b.ts')).toBe('src/a b.ts');
  });

  it('should decode escapes', () => {
    expect(unquotePath('"a\\tb\\"c"')).toBe('a\tb"c');
  });
});
