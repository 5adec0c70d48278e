/**
 * Tests for heuristics.ts - type, scope and confidence inference
 */

import { describe, it, expect } from 'vitest';
import { defaultWardenConfig, type ChangeSet, type WardenConfig } from '@commit-warden/contracts';
import { resolvePackages } from '../../src/analyzer/package-resolver';
import { classifyChangeSet, inferScopes, isSmallModification } from '../../src/generator/heuristics';
import { changeSet, file, lines } from '../factories';

function classify(files: ChangeSet, manifests: string[] = [], config: WardenConfig = defaultWardenConfig) {
  return classifyChangeSet(files, resolvePackages(files, manifests), config);
}

describe('classifyChangeSet', () => {
  it('should classify a docs-only change as docs without a scope', () => {
    expect(classify(changeSet(file('docs/guide.md')))).toEqual({
      type: 'docs',
      scopes: [],
      breaking: false,
      confidence: 0.95,
      reasons: ['all 1 path(s) match docs patterns'],
      diagnostics: [],
    });
  });

  it('should classify test-only and ci-only changes', () => {
    expect(classify(changeSet(file('src/parser.test.ts'), file('tests/fixtures.ts'))).type).toBe('test');
    expect(classify(changeSet(file('.github/workflows/ci.yml'))).type).toBe('ci');
    expect(classify(changeSet(file('.github/workflows/ci.yml'))).confidence).toBe(0.9);
  });

  it('should order scopes by changed lines', () => {
    const files = changeSet(
      file('packages/pkg-b/src/index.ts', { added: lines(5) }),
      file('packages/pkg-a/src/index.ts', { added: lines(40) })
    );

    const classification = classify(files, ['packages/pkg-a', 'packages/pkg-b']);

    expect(classification.scopes).toEqual(['pkg-a', 'pkg-b']);
    expect(classification.type).toBe('feat');
    expect(classification.confidence).toBe(0.6);
  });

  it('should lower confidence when a heuristic matches only part of the change', () => {
    const classification = classify(changeSet(file('src/a.ts', { added: lines(3) }), file('src/a.test.ts', { added: lines(3) })));

    expect(classification.type).toBe('feat');
    expect(classification.confidence).toBe(0.45);
    expect(classification.reasons).toEqual(['1 of 2 path(s) match test patterns', 'new or extended functionality']);
  });

  it('should classify small rewrites of existing lines as fix', () => {
    const classification = classify(changeSet(file('src/a.ts', { added: ['x = 2'], removed: ['x = 1'] })));

    expect(classification.type).toBe('fix');
    expect(classification.confidence).toBe(0.6);
  });

  it('should flag breaking markers and raise confidence', () => {
    const classification = classify(changeSet(file('src/a.ts', { added: ['/** @deprecated use parseV2 */'] })));

    expect(classification).toMatchObject({ type: 'feat', breaking: true, confidence: 0.8 });
    expect(classification.reasons[0]).toBe('added lines contain breaking marker "@deprecated"');
  });

  it('should classify deletion-only changes as chore', () => {
    const classification = classify(changeSet(file('src/old.ts', { kind: 'deleted', added: [], removed: ['a'] })));

    expect(classification).toMatchObject({ type: 'chore', confidence: 0.4 });
  });

  it('should fall back to chore with zero confidence for an empty change set', () => {
    expect(classify({ files: [] })).toMatchObject({
      type: 'chore',
      confidence: 0,
      reasons: ['empty change set', 'no heuristic applied'],
    });
  });

  it('should skip candidate types that are not allowed', () => {
    const config: WardenConfig = {
      ...defaultWardenConfig,
      rules: { ...defaultWardenConfig.rules, allowedTypes: ['feat', 'fix', 'chore'] },
    };

    const classification = classify(changeSet(file('docs/guide.md')), [], config);

    expect(classification.type).toBe('feat');
    expect(classification.reasons[0]).toBe('all 1 path(s) match docs patterns, but type "docs" is not allowed');
  });

  it('should carry the context of the dominant hunk', () => {
    const files = changeSet(
      file('src/parser.ts', { added: lines(6), header: 'function parseHeader(line: string) {' }),
      file('src/util.ts', { added: lines(2), header: 'const helper = () => {' })
    );

    expect(classify(files).dominantContext).toBe('function parseHeader(line: string) {');
  });

  it('should carry scope ambiguity diagnostics', () => {
    const files = changeSet(file('shared/a.ts'));
    const packageMap = resolvePackages(files, [
      { root: 'libs/a', members: ['shared'] },
      { root: 'libs/b', members: ['shared'] },
    ]);

    expect(classifyChangeSet(files, packageMap).diagnostics).toEqual([
      { kind: 'scope-ambiguous', path: 'shared/a.ts', candidates: ['libs/a', 'libs/b'] },
    ]);
  });
});

describe('inferScopes', () => {
  it('should collapse more scopes than the maximum into multi', () => {
    const files = changeSet(file('a/x.ts'), file('b/x.ts'), file('c/x.ts'), file('d/x.ts'));

    expect(inferScopes(files, resolvePackages(files, ['a', 'b', 'c', 'd']), 3)).toEqual(['multi']);
  });

  it('should count lines per package when two packages share a directory name', () => {
    const files = changeSet(
      file('apps/web/index.ts', { added: lines(3) }),
      file('libs/web/index.ts', { added: lines(4) }),
      file('libs/core/index.ts', { added: lines(5) })
    );

    expect(inferScopes(files, resolvePackages(files, ['apps/web', 'libs/web', 'libs/core']), 3)).toEqual([
      'core',
      'libs/web',
      'apps/web',
    ]);
  });

  it('should never use the repository root as a scope', () => {
    const files = changeSet(file('README.txt'), file('a/x.ts'));

    expect(inferScopes(files, resolvePackages(files, ['/', 'a']), 3)).toEqual(['a']);
  });
});

describe('isSmallModification', () => {
  it('should reject added files and pure additions', () => {
    expect(isSmallModification([file('a.ts', { kind: 'added' })], 10)).toBe(false);
    expect(isSmallModification([file('a.ts', { added: ['x'] })], 10)).toBe(false);
    expect(isSmallModification([file('a.ts', { added: lines(6), removed: lines(5) })], 10)).toBe(false);
  });
});
