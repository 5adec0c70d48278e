/**
 * Tests for package-resolver.ts - longest-prefix package resolution
 */

import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@commit-warden/contracts';
import {
  buildPackages,
  normalizeRepoPath,
  resolvePackages,
  resolvePath,
  touchedPackages,
} from '../../src/analyzer/package-resolver';
import { changeSet, file } from '../factories';

describe('normalizeRepoPath', () => {
  it('should strip leading and trailing separators', () => {
    expect(normalizeRepoPath('/libs/x/')).toBe('libs/x');
    expect(normalizeRepoPath('./libs//x')).toBe('libs/x');
    expect(normalizeRepoPath('libs\\x')).toBe('libs/x');
  });

  it('should map the repository root to the empty string', () => {
    expect(normalizeRepoPath('/')).toBe('');
    expect(normalizeRepoPath('.')).toBe('');
  });
});

describe('buildPackages', () => {
  it('should name packages after their last segment and the root after the root scope', () => {
    const packages = buildPackages(['/', 'libs/x', { root: 'apps/web', name: 'frontend' }], 'repo');

    expect(packages.map((p) => [p.id, p.name, p.root])).toEqual([
      ['.', 'repo', ''],
      ['apps/web', 'frontend', 'apps/web'],
      ['libs/x', 'x', 'libs/x'],
    ]);
  });

  it('should keep the first entry for a duplicate root', () => {
    const packages = buildPackages([{ root: 'libs/x', name: 'first' }, { root: '/libs/x/', name: 'second' }]);

    expect(packages).toHaveLength(1);
    expect(packages[0]?.name).toBe('first');
  });

  it('should name packages sharing a name after their roots', () => {
    const packages = buildPackages(['apps/web', 'libs/core', { root: 'libs/web' }, { root: 'tools/ui', name: 'core' }]);

    expect(packages.map((p) => [p.id, p.name])).toEqual([
      ['apps/web', 'apps/web'],
      ['libs/core', 'libs/core'],
      ['libs/web', 'libs/web'],
      ['tools/ui', 'tools/ui'],
    ]);
  });
});

describe('resolvePath', () => {
  it('should not match a sibling directory sharing a name prefix', () => {
    const packages = buildPackages(['libs/x']);

    expect(resolvePath('libs/xy/file.ts', packages)).toEqual({ kind: 'outside' });
  });
});

describe('resolvePackages', () => {
  it('should resolve to the longest matching package, not the root', () => {
    const packageMap = resolvePackages(changeSet(file('libs/x/y.rs')), ['/', '/libs/x']);

    expect(packageMap.assignments).toHaveLength(1);
    expect(packageMap.assignments[0]?.path).toBe('libs/x/y.rs');
    expect(packageMap.assignments[0]?.packages.map((p) => p.id)).toEqual(['libs/x']);
    expect(packageMap.diagnostics).toEqual([]);
  });

  it('should assign files outside every package to the synthetic root', () => {
    const packageMap = resolvePackages(changeSet(file('scripts/run.sh')), ['libs/x'], { rootScope: 'repo' });

    expect(packageMap.assignments[0]?.packages).toEqual([
      { id: '.', name: 'repo', root: '', members: [''], synthetic: true },
    ]);
  });

  it('should report equal-length matches as a scope-ambiguous diagnostic', () => {
    const debug = vi.fn();
    const logger: Logger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const manifests = [
      { root: 'libs/b', members: ['shared'] },
      { root: 'libs/a', members: ['shared'] },
    ];

    const packageMap = resolvePackages(changeSet(file('shared/util.ts')), manifests, { logger });

    expect(packageMap.diagnostics).toEqual([
      { kind: 'scope-ambiguous', path: 'shared/util.ts', candidates: ['libs/a', 'libs/b'] },
    ]);
    expect(packageMap.assignments[0]?.packages.map((p) => p.id)).toEqual(['.']);
    expect(debug).toHaveBeenCalledWith('Ambiguous package resolution', {
      path: 'shared/util.ts',
      candidates: ['libs/a', 'libs/b'],
    });
  });

  it('should resolve a renamed file against both of its paths', () => {
    const renamed = file('libs/b/moved.ts', { kind: 'renamed', oldPath: 'libs/a/moved.ts' });
    const packageMap = resolvePackages(changeSet(renamed), ['libs/a', 'libs/b']);

    expect(packageMap.assignments[0]?.packages.map((p) => p.name)).toEqual(['a', 'b']);
  });

  it('should not depend on manifest or file order', () => {
    const files = [file('libs/x/a.ts'), file('apps/web/b.ts'), file('README.md')];
    const first = resolvePackages(changeSet(...files), ['/', 'libs/x', 'apps/web']);
    const second = resolvePackages(changeSet(...[...files].reverse()), ['apps/web', 'libs/x', '/']);

    expect(second).toEqual(first);
    expect(first.assignments.map((a) => a.path)).toEqual(['README.md', 'apps/web/b.ts', 'libs/x/a.ts']);
  });

  it('should list each touched package once', () => {
    const packageMap = resolvePackages(
      changeSet(file('libs/x/a.ts'), file('libs/x/b.ts'), file('apps/web/c.ts')),
      ['libs/x', 'apps/web']
    );

    expect(touchedPackages(packageMap).map((p) => p.id)).toEqual(['apps/web', 'libs/x']);
  });
});
