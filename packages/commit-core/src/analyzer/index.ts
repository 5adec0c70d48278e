/**
 * Analyzer module: packages, secrets, git access
 */

export {
  resolvePackages,
  resolvePath,
  buildPackages,
  createRootPackage,
  normalizeRepoPath,
  touchedPackages,
  ROOT_PACKAGE_ID,
  type ManifestInput,
  type ManifestLocation,
  type PathResolution,
  type ResolveOptions,
} from './package-resolver';

export { discoverManifestLocations, scopeFromPackageName, type DiscoverOptions } from './manifest-discovery';

export {
  isSecretFile,
  scanChangeSet,
  createSecretScanner,
  compileSecretPatterns,
  shannonEntropy,
  entropyThreshold,
  redact,
  BUILT_IN_SECRET_PATTERNS,
  ENTROPY_PATTERN_ID,
  type SecretPattern,
  type SecretScanner,
  type ScanReport,
  type SkippedFile,
} from './secrets-detector';

export {
  findRepoRoot,
  getStagedDiff,
  getCurrentBranch,
  getCommit,
  getCommitsInRange,
  type CommitRecord,
  type RangeOptions,
} from './git-history';
