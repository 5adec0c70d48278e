/**
 * Manifest discovery - finds package roots in a repository
 * Supports:
 * 1. Marker files: package.json, Cargo.toml, go.mod, ...
 * 2. Packages declared explicitly in configuration (win over discovered ones)
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { globby } from 'globby';
import { z } from 'zod';
import { noopLogger, type ExplicitPackageConfig, type Logger } from '@commit-warden/contracts';
import { normalizeRepoPath, type ManifestLocation } from './package-resolver';

const IGNORED_DIRECTORIES = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/target/**',
  '**/vendor/**',
  '**/.*/**',
];

const PackageJsonSchema = z.object({
  name: z.string().min(1).optional(),
});

/**
 * `@acme/core` -> `core`
 */
export function scopeFromPackageName(name: string): string {
  const slash = name.lastIndexOf('/');
  return name.startsWith('@') && slash !== -1 ? name.slice(slash + 1) : name;
}

async function readPackageJsonName(file: string, logger: Logger): Promise<string | undefined> {
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
    return parsed.success && parsed.data.name ? scopeFromPackageName(parsed.data.name) : undefined;
  } catch (error) {
    logger.warn('Skipping unreadable package.json', {
      file,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export interface DiscoverOptions {
  /** File names marking a package root */
  markers: readonly string[];
  /** Packages declared in configuration */
  packages?: readonly ExplicitPackageConfig[];
  logger?: Logger;
}

/**
 * Discover package roots under `cwd`.
 * The repository root itself counts when it holds a marker.
 */
export async function discoverManifestLocations(
  cwd: string,
  options: DiscoverOptions
): Promise<ManifestLocation[]> {
  const logger = options.logger ?? noopLogger;
  const locations = new Map<string, ManifestLocation>();

  for (const declared of options.packages ?? []) {
    const root = normalizeRepoPath(declared.path);
    locations.set(root, {
      root,
      name: declared.scope,
      members: declared.members?.map(normalizeRepoPath),
    });
  }

  if (options.markers.length > 0) {
    const markerFiles = await globby(
      options.markers.map((marker) => `**/${marker}`),
      {
        cwd,
        onlyFiles: true,
        ignore: IGNORED_DIRECTORIES,
      }
    );

    for (const file of markerFiles.sort()) {
      const segments = normalizeRepoPath(file).split('/');
      const marker = segments.pop();
      const root = segments.join('/');
      if (locations.has(root)) continue;

      const name = marker === 'package.json' ? await readPackageJsonName(join(cwd, file), logger) : undefined;
      locations.set(root, { root, name });
    }
  }

  logger.debug('Discovered package roots', { count: locations.size });

  return [...locations.values()].sort((a, b) => (a.root < b.root ? -1 : a.root > b.root ? 1 : 0));
}
