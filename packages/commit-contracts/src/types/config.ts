/**
 * Warden Configuration Contract
 *
 * Resolved, camelCase shape of the `.commit-warden.json` document.
 * The document itself (snake_case keys) is validated by `parseWardenConfig`
 * in schema/config.schema.ts and converted into this shape.
 */

import { ConfigurationError, type ConfigIssue } from '../errors';
import type { Severity } from '../schema';

// ============================================================================
// Custom rules
// ============================================================================

interface CustomRuleBase {
  /** Rule identifier reported in violations */
  id: string;
  severity: Severity;
  /** Message template, `{placeholder}` values depend on the rule kind */
  message?: string;
  /** Rule applies only when some changed path matches one of these globs */
  paths: string[];
  /** Rule applies only when the branch is known and matches one of these globs */
  branches: string[];
}

export type CustomRuleConfig =
  | (CustomRuleBase & { kind: 'require-scope' })
  | (CustomRuleBase & { kind: 'require-body' })
  | (CustomRuleBase & { kind: 'forbid-types'; types: string[] })
  | (CustomRuleBase & { kind: 'require-types'; types: string[] })
  | (CustomRuleBase & { kind: 'max-subject-length'; max: number })
  | (CustomRuleBase & { kind: 'min-subject-length'; min: number })
  | (CustomRuleBase & { kind: 'subject-pattern'; pattern: string; flags?: string });

export type CustomRuleKind = CustomRuleConfig['kind'];

// ============================================================================
// Sections
// ============================================================================

/**
 * Message shape rules
 */
export interface RulesConfig {
  /** Maximum header length in characters (default: 72) */
  maxSubjectLength: number;
  /** Minimum header length, 0 disables the check (default: 0) */
  minSubjectLength: number;
  requireScope: boolean;
  requireBody: boolean;
  allowedTypes: string[];
  forbiddenTypes: string[];
  /** Empty means any scope is accepted */
  allowedScopes: string[];
  /** Changed lines above which an oversized-commit warning is raised (default: 500) */
  maxChangedLines: number;
  custom: CustomRuleConfig[];
}

export interface SecretPatternConfig {
  id: string;
  /** Regular expression source */
  pattern: string;
  flags?: string;
  description?: string;
  confidence?: number;
}

export interface EntropyConfig {
  enabled: boolean;
  /** Shannon entropy in bits per character above which a token is flagged */
  threshold: number;
  /** Threshold for tokens made only of hex digits, which carry at most 4 bits per character */
  hexThreshold: number;
  /** Shortest token run that is measured */
  minLength: number;
}

/**
 * Secret scanning
 */
export interface SecurityConfig {
  enabled: boolean;
  /** Findings are errors when true, warnings otherwise (default: true) */
  blockOnSecret: boolean;
  /** Extra patterns, evaluated after the built-in ones */
  patterns: SecretPatternConfig[];
  entropy: EntropyConfig;
  /** Characters kept at each end of a redacted excerpt (default: 4) */
  excerptChars: number;
  /** Globs for paths that are never scanned */
  ignorePaths: string[];
}

export interface ClassifierConfig {
  testPaths: string[];
  docsPaths: string[];
  ciPaths: string[];
  /** Added-line markers that signal a breaking change */
  breakingMarkers: string[];
  /** Hunks up to this many changed lines count as small (default: 10) */
  smallHunkLines: number;
  /** More touched packages than this collapse the scope to `multi` (default: 3) */
  maxScopes: number;
}

export interface SynthesisConfig {
  /** Confidence at which the summary is derived from the dominant hunk (default: 0.8) */
  smartConfidenceThreshold: number;
}

export interface ExplicitPackageConfig {
  /** Repository-relative package root */
  path: string;
  scope?: string;
  /** Extra path prefixes owned by the package */
  members?: string[];
}

export interface MonorepoConfig {
  /** Scope name of the synthetic root package (default: 'root') */
  rootScope: string;
  /** File names that mark a package root during discovery */
  packageMarkers: string[];
  packages: ExplicitPackageConfig[];
}

/**
 * Fully resolved configuration
 */
export interface WardenConfig {
  rules: RulesConfig;
  security: SecurityConfig;
  classifier: ClassifierConfig;
  synthesis: SynthesisConfig;
  monorepo: MonorepoConfig;
}

/**
 * Configuration as read from a file: every section and key optional
 */
export interface WardenFileConfig {
  rules?: Partial<RulesConfig>;
  security?: Partial<Omit<SecurityConfig, 'entropy'>> & { entropy?: Partial<EntropyConfig> };
  classifier?: Partial<ClassifierConfig>;
  synthesis?: Partial<SynthesisConfig>;
  monorepo?: Partial<MonorepoConfig>;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_ALLOWED_TYPES = [
  'feat',
  'fix',
  'docs',
  'style',
  'refactor',
  'perf',
  'test',
  'chore',
  'revert',
  'build',
  'ci',
] as const;

export const defaultWardenConfig: WardenConfig = {
  rules: {
    maxSubjectLength: 72,
    minSubjectLength: 0,
    requireScope: false,
    requireBody: false,
    allowedTypes: [...DEFAULT_ALLOWED_TYPES],
    forbiddenTypes: ['wip'],
    allowedScopes: [],
    maxChangedLines: 500,
    custom: [],
  },
  security: {
    enabled: true,
    blockOnSecret: true,
    patterns: [],
    entropy: {
      enabled: true,
      threshold: 4.5,
      hexThreshold: 3,
      minLength: 20,
    },
    excerptChars: 4,
    ignorePaths: [],
  },
  classifier: {
    testPaths: ['**/*.test.*', '**/*.spec.*', '**/__tests__/**', '**/test/**', '**/tests/**'],
    docsPaths: ['**/*.md', '**/*.mdx', '**/*.rst', '**/*.adoc', '**/docs/**', '**/LICENSE*'],
    ciPaths: [
      '.github/workflows/**',
      '.gitlab-ci.yml',
      '.circleci/**',
      '.travis.yml',
      'azure-pipelines.yml',
      'Jenkinsfile',
    ],
    breakingMarkers: ['BREAKING CHANGE', 'BREAKING-CHANGE', '@deprecated'],
    smallHunkLines: 10,
    maxScopes: 3,
  },
  synthesis: {
    smartConfidenceThreshold: 0.8,
  },
  monorepo: {
    rootScope: 'root',
    packageMarkers: ['package.json', 'Cargo.toml', 'go.mod', 'pyproject.toml', 'pom.xml'],
    packages: [],
  },
};

// ============================================================================
// Environment overrides
// ============================================================================

/**
 * Environment variables read by commit-warden
 */
export const WARDEN_ENV_VARS = [
  'WARDEN_MAX_SUBJECT_LENGTH',
  'WARDEN_REQUIRE_SCOPE',
  'WARDEN_BLOCK_ON_SECRET',
  'WARDEN_SECRETS_ENABLED',
] as const;

export type WardenEnvVar = (typeof WARDEN_ENV_VARS)[number];

export type WardenEnv = Partial<Record<WardenEnvVar, string>>;

function parseBooleanEnv(name: WardenEnvVar, value: string, issues: ConfigIssue[]): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  issues.push({ path: name, message: `expected a boolean, got "${value}"` });
  return undefined;
}

/**
 * Resolve config with env variable overrides
 *
 * @param fileConfig - Sections read from the configuration document
 * @param env - Environment variables, see {@link WARDEN_ENV_VARS}
 * @throws ConfigurationError when an env variable holds a malformed value
 */
export function resolveWardenConfig(
  fileConfig: WardenFileConfig = {},
  env: WardenEnv = {}
): WardenConfig {
  const defaults = defaultWardenConfig;
  const rules = fileConfig.rules ?? {};
  const security = fileConfig.security ?? {};
  const classifier = fileConfig.classifier ?? {};
  const monorepo = fileConfig.monorepo ?? {};

  const config: WardenConfig = {
    rules: {
      maxSubjectLength: rules.maxSubjectLength ?? defaults.rules.maxSubjectLength,
      minSubjectLength: rules.minSubjectLength ?? defaults.rules.minSubjectLength,
      requireScope: rules.requireScope ?? defaults.rules.requireScope,
      requireBody: rules.requireBody ?? defaults.rules.requireBody,
      allowedTypes: [...(rules.allowedTypes ?? defaults.rules.allowedTypes)],
      forbiddenTypes: [...(rules.forbiddenTypes ?? defaults.rules.forbiddenTypes)],
      allowedScopes: [...(rules.allowedScopes ?? defaults.rules.allowedScopes)],
      maxChangedLines: rules.maxChangedLines ?? defaults.rules.maxChangedLines,
      custom: [...(rules.custom ?? defaults.rules.custom)],
    },
    security: {
      enabled: security.enabled ?? defaults.security.enabled,
      blockOnSecret: security.blockOnSecret ?? defaults.security.blockOnSecret,
      patterns: [...(security.patterns ?? defaults.security.patterns)],
      entropy: {
        enabled: security.entropy?.enabled ?? defaults.security.entropy.enabled,
        threshold: security.entropy?.threshold ?? defaults.security.entropy.threshold,
        hexThreshold: security.entropy?.hexThreshold ?? defaults.security.entropy.hexThreshold,
        minLength: security.entropy?.minLength ?? defaults.security.entropy.minLength,
      },
      excerptChars: security.excerptChars ?? defaults.security.excerptChars,
      ignorePaths: [...(security.ignorePaths ?? defaults.security.ignorePaths)],
    },
    classifier: {
      testPaths: [...(classifier.testPaths ?? defaults.classifier.testPaths)],
      docsPaths: [...(classifier.docsPaths ?? defaults.classifier.docsPaths)],
      ciPaths: [...(classifier.ciPaths ?? defaults.classifier.ciPaths)],
      breakingMarkers: [...(classifier.breakingMarkers ?? defaults.classifier.breakingMarkers)],
      smallHunkLines: classifier.smallHunkLines ?? defaults.classifier.smallHunkLines,
      maxScopes: classifier.maxScopes ?? defaults.classifier.maxScopes,
    },
    synthesis: {
      smartConfidenceThreshold:
        fileConfig.synthesis?.smartConfidenceThreshold ?? defaults.synthesis.smartConfidenceThreshold,
    },
    monorepo: {
      rootScope: monorepo.rootScope ?? defaults.monorepo.rootScope,
      packageMarkers: [...(monorepo.packageMarkers ?? defaults.monorepo.packageMarkers)],
      packages: [...(monorepo.packages ?? defaults.monorepo.packages)],
    },
  };

  const issues: ConfigIssue[] = [];

  // Environment variable overrides (highest priority)
  if (env.WARDEN_MAX_SUBJECT_LENGTH !== undefined) {
    const max = Number(env.WARDEN_MAX_SUBJECT_LENGTH);
    if (Number.isInteger(max) && max > 0) {
      config.rules.maxSubjectLength = max;
    } else {
      issues.push({
        path: 'WARDEN_MAX_SUBJECT_LENGTH',
        message: `expected a positive integer, got "${env.WARDEN_MAX_SUBJECT_LENGTH}"`,
      });
    }
  }

  if (env.WARDEN_REQUIRE_SCOPE !== undefined) {
    const value = parseBooleanEnv('WARDEN_REQUIRE_SCOPE', env.WARDEN_REQUIRE_SCOPE, issues);
    if (value !== undefined) config.rules.requireScope = value;
  }

  if (env.WARDEN_BLOCK_ON_SECRET !== undefined) {
    const value = parseBooleanEnv('WARDEN_BLOCK_ON_SECRET', env.WARDEN_BLOCK_ON_SECRET, issues);
    if (value !== undefined) config.security.blockOnSecret = value;
  }

  if (env.WARDEN_SECRETS_ENABLED !== undefined) {
    const value = parseBooleanEnv('WARDEN_SECRETS_ENABLED', env.WARDEN_SECRETS_ENABLED, issues);
    if (value !== undefined) config.security.enabled = value;
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid environment configuration', issues);
  }

  return config;
}
