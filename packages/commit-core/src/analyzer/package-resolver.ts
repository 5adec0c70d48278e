/**
 * Package resolver - maps changed paths to monorepo packages
 *
 * The package whose member prefix is the longest match for a path owns it.
 * Two different packages matching with prefixes of equal length is reported
 * as a scope-ambiguous diagnostic and the file falls back to the synthetic
 * root package.
 */

import {
  noopLogger,
  type ChangeSet,
  type Logger,
  type Package,
  type PackageAssignment,
  type PackageMap,
  type ScopeDiagnostic,
} from '@commit-warden/contracts';

/**
 * A manifest location: either a bare root path or a described package
 */
export interface ManifestLocation {
  /** Package root, repository-relative; '/' or '' is the repository root */
  root: string;
  /** Package name used as scope (default: last segment of the root) */
  name?: string;
  /** Path prefixes owned by the package (default: the root) */
  members?: string[];
}

export type ManifestInput = string | ManifestLocation;

export interface ResolveOptions {
  /** Name of the synthetic root package (default: 'root') */
  rootScope?: string;
  logger?: Logger;
}

export const ROOT_PACKAGE_ID = '.';

/**
 * Normalize a repository path: POSIX separators, no leading './' or '/',
 * no trailing '/'. The repository root becomes ''.
 */
export function normalizeRepoPath(path: string): string {
  let normalized = path.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  while (normalized.startsWith('./')) normalized = normalized.slice(2);
  normalized = normalized.replace(/^\/+/, '').replace(/\/+$/, '');
  return normalized === '.' ? '' : normalized;
}

export function createRootPackage(rootScope: string): Package {
  return {
    id: ROOT_PACKAGE_ID,
    name: rootScope,
    root: '',
    members: [''],
    synthetic: true,
  };
}

/**
 * Build the package list from manifest locations.
 * Duplicate roots keep the first entry; the result is sorted by root.
 * Names shared by several packages are replaced by each package's root.
 */
export function buildPackages(manifests: readonly ManifestInput[], rootScope = 'root'): Package[] {
  const byRoot = new Map<string, Package>();

  for (const manifest of manifests) {
    const location: ManifestLocation = typeof manifest === 'string' ? { root: manifest } : manifest;
    const root = normalizeRepoPath(location.root);
    if (byRoot.has(root)) continue;

    const members = (location.members ?? [root]).map(normalizeRepoPath);
    const lastSegment = root.split('/').pop();

    byRoot.set(root, {
      id: root === '' ? ROOT_PACKAGE_ID : root,
      name: location.name ?? (root === '' ? rootScope : lastSegment ?? root),
      root,
      members: [...new Set(members)].sort(),
      synthetic: false,
    });
  }

  const packages = [...byRoot.values()].sort((a, b) => compareStrings(a.root, b.root));
  return disambiguateNames(packages);
}

function disambiguateNames(packages: Package[]): Package[] {
  const counts = new Map<string, number>();
  for (const pkg of packages) {
    counts.set(pkg.name, (counts.get(pkg.name) ?? 0) + 1);
  }
  return packages.map((pkg) =>
    (counts.get(pkg.name) ?? 0) > 1 && pkg.root !== '' ? { ...pkg, name: pkg.root } : pkg
  );
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function prefixMatches(path: string, prefix: string): boolean {
  return prefix === '' || path === prefix || path.startsWith(`${prefix}/`);
}

export type PathResolution =
  | { kind: 'resolved'; pkg: Package }
  | { kind: 'ambiguous'; candidates: Package[] }
  | { kind: 'outside' };

/**
 * Find the package owning a single path
 */
export function resolvePath(path: string, packages: readonly Package[]): PathResolution {
  const normalized = normalizeRepoPath(path);
  let bestLength = -1;
  let best: Package[] = [];

  for (const pkg of packages) {
    const lengths = pkg.members.filter((m) => prefixMatches(normalized, m)).map((m) => m.length);
    if (lengths.length === 0) continue;
    const length = Math.max(...lengths);

    if (length > bestLength) {
      bestLength = length;
      best = [pkg];
    } else if (length === bestLength) {
      best.push(pkg);
    }
  }

  const [first] = best;
  if (!first) return { kind: 'outside' };
  if (best.length > 1) return { kind: 'ambiguous', candidates: best };
  return { kind: 'resolved', pkg: first };
}

/**
 * Map every changed file to the packages it belongs to.
 *
 * A renamed file belongs to the packages of both its old and new path.
 * The mapping only depends on the set of manifests, not on their order.
 */
export function resolvePackages(
  changeSet: ChangeSet,
  manifests: readonly ManifestInput[],
  options: ResolveOptions = {}
): PackageMap {
  const rootScope = options.rootScope ?? 'root';
  const logger = options.logger ?? noopLogger;
  const packages = buildPackages(manifests, rootScope);
  const rootPackage = createRootPackage(rootScope);

  const files = [...changeSet.files].sort((a, b) => compareStrings(a.path, b.path));
  const assignments: PackageAssignment[] = [];
  const diagnostics: ScopeDiagnostic[] = [];

  for (const file of files) {
    const owners = new Map<string, Package>();
    const paths = file.oldPath !== undefined ? [file.path, file.oldPath] : [file.path];

    for (const path of paths) {
      const resolution = resolvePath(path, packages);
      switch (resolution.kind) {
        case 'resolved':
          owners.set(resolution.pkg.id, resolution.pkg);
          break;
        case 'outside':
          owners.set(rootPackage.id, rootPackage);
          break;
        case 'ambiguous': {
          const candidates = resolution.candidates.map((pkg) => pkg.root).sort(compareStrings);
          logger.debug('Ambiguous package resolution', { path, candidates });
          diagnostics.push({ kind: 'scope-ambiguous', path, candidates });
          owners.set(rootPackage.id, rootPackage);
          break;
        }
      }
    }

    assignments.push({
      path: file.path,
      packages: [...owners.values()].sort((a, b) => compareStrings(a.id, b.id)),
    });
  }

  return { assignments, diagnostics };
}

/**
 * Packages touched by a change set, each listed once
 */
export function touchedPackages(packageMap: PackageMap): Package[] {
  const byId = new Map<string, Package>();
  for (const assignment of packageMap.assignments) {
    for (const pkg of assignment.packages) {
      byId.set(pkg.id, pkg);
    }
  }
  return [...byId.values()].sort((a, b) => compareStrings(a.id, b.id));
}
