/**
 * Secrets detection module
 *
 * Scans added lines for credential-shaped strings (pattern detector) and
 * for long random-looking tokens (entropy detector). Findings carry a
 * redacted excerpt only; the scanned change set is never modified.
 */

import { minimatch } from 'minimatch';
import {
  defaultWardenConfig,
  noopLogger,
  type ChangeSet,
  type EntropyConfig,
  type FileChange,
  type Logger,
  type ScanFinding,
  type SecretPatternConfig,
  type SecurityConfig,
} from '@commit-warden/contracts';

/**
 * File patterns that likely contain secrets
 * Based on common secret file conventions
 */
const SECRET_FILE_PATTERNS = [
  // Environment files
  '.env',
  '.env.*',
  '*.env',
  '.envrc',

  // NPM/Node
  '.npmrc',
  '.yarnrc.yml',

  // SSH/GPG keys
  '*.key',
  '*.pem',
  '*.p12',
  '*.pfx',
  'id_rsa',
  'id_dsa',
  'id_ecdsa',
  'id_ed25519',

  // Cloud credentials
  '.aws/**',
  'credentials',
  '.docker/config.json',
  '*-service-account.json',
  'service-account*.json',

  // Git credentials
  '.git-credentials',
  '.netrc',

  // Kubernetes / Terraform
  'kubeconfig',
  '*.kubeconfig',
  '*.tfvars',
  'terraform.tfstate',

  // Other common secrets
  'secrets.yml',
  'secrets.yaml',
  'passwords.txt',
];

/**
 * Check if file path matches secret file patterns
 */
export function isSecretFile(filePath: string): boolean {
  // Normalize path separators
  const normalizedPath = filePath.replace(/\\/g, '/');

  return SECRET_FILE_PATTERNS.some((pattern) =>
    minimatch(normalizedPath, pattern, { matchBase: true, dot: true })
  );
}

// ============================================================================
// Patterns
// ============================================================================

export interface SecretPattern {
  id: string;
  regex: RegExp;
  description: string;
  confidence: number;
}

/**
 * Content patterns that indicate secrets
 */
export const BUILT_IN_SECRET_PATTERNS: readonly SecretPatternConfig[] = [
  { id: 'aws-access-key', pattern: '(?:AKIA|ASIA)[0-9A-Z]{16}', description: 'AWS access key id', confidence: 0.95 },
  {
    id: 'aws-secret-key',
    pattern: 'aws[_-]?secret[_-]?access[_-]?key[\'"]?\\s*[:=]\\s*[\'"]?[A-Za-z0-9/+=]{40}',
    flags: 'i',
    description: 'AWS secret access key',
    confidence: 0.9,
  },
  { id: 'github-token', pattern: 'gh[pousr]_[A-Za-z0-9_]{36,}', description: 'GitHub token', confidence: 0.95 },
  { id: 'slack-token', pattern: 'xox[baprs]-[0-9A-Za-z-]{10,}', description: 'Slack token', confidence: 0.9 },
  { id: 'npm-token', pattern: 'npm_[A-Za-z0-9]{36}', description: 'npm access token', confidence: 0.9 },
  {
    id: 'private-key',
    pattern: '-----BEGIN (?:RSA |DSA |EC |OPENSSH |PGP |ENCRYPTED )?PRIVATE KEY(?: BLOCK)?-----',
    description: 'Private key block',
    confidence: 0.99,
  },
  {
    id: 'jwt',
    pattern: 'eyJ[A-Za-z0-9_-]{10,}\\.eyJ[A-Za-z0-9_-]{10,}\\.[A-Za-z0-9_-]{10,}',
    description: 'JSON Web Token',
    confidence: 0.8,
  },
  {
    id: 'generic-api-key',
    pattern: '(?:api[_-]?key|auth[_-]?token|access[_-]?token)[\'"]?\\s*[:=]\\s*[\'"]?[A-Za-z0-9_-]{20,}',
    flags: 'i',
    description: 'API key or token assignment',
    confidence: 0.7,
  },
  {
    id: 'generic-secret',
    pattern: '(?:secret|password|passwd)[\'"]?\\s*[:=]\\s*[\'"][^\'"\\s]{8,}[\'"]',
    flags: 'i',
    description: 'Hard-coded secret or password',
    confidence: 0.6,
  },
];

/**
 * Compile the built-in patterns followed by the configured ones
 */
export function compileSecretPatterns(custom: readonly SecretPatternConfig[] = []): SecretPattern[] {
  return [...BUILT_IN_SECRET_PATTERNS, ...custom].map((config) => ({
    id: config.id,
    regex: new RegExp(config.pattern, `${config.flags ?? ''}g`),
    description: config.description ?? config.id,
    confidence: config.confidence ?? 0.8,
  }));
}

// ============================================================================
// Entropy
// ============================================================================

export const ENTROPY_PATTERN_ID = 'entropy';

/**
 * Shannon entropy in bits per character
 */
export function shannonEntropy(text: string): number {
  if (text.length === 0) return 0;

  const counts = new Map<string, number>();
  for (const ch of text) {
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }

  const length = [...text].length;
  let entropy = 0;
  for (const count of counts.values()) {
    const p = count / length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

const HEX_TOKEN = /^[0-9a-fA-F]+$/;
const HAS_DIGIT = /[0-9]/;
const HAS_LETTER = /[A-Za-z]/;

/** Bits kept below the most a token of this length and alphabet can reach */
const ENTROPY_HEADROOM = 0.5;

/**
 * Threshold for one token. Tokens mixing digits and letters are treated as
 * generated: hex ones get their own threshold (an alphabet of 16 tops out at
 * 4 bits), and both are capped below the maximum entropy a token of that
 * length can reach, `log2(min(length, alphabet))`. Plain words and numbers
 * keep the configured threshold.
 */
export function entropyThreshold(token: string, config: EntropyConfig): number {
  if (!HAS_DIGIT.test(token) || !HAS_LETTER.test(token)) return config.threshold;

  const hex = HEX_TOKEN.test(token);
  const alphabet = hex ? 16 : 64;
  const ceiling = Math.log2(Math.min([...token].length, alphabet)) - ENTROPY_HEADROOM;
  return Math.min(hex ? config.hexThreshold : config.threshold, ceiling);
}

/**
 * Keep the first and last `keep` characters, mask the rest
 */
export function redact(value: string, keep: number): string {
  const chars = [...value];
  if (chars.length <= keep * 2) {
    return '*'.repeat(chars.length);
  }
  return [
    ...chars.slice(0, keep),
    '*'.repeat(chars.length - keep * 2),
    ...chars.slice(chars.length - keep),
  ].join('');
}

// ============================================================================
// Scanner
// ============================================================================

export interface SkippedFile {
  path: string;
  reason: string;
}

export interface ScanReport {
  findings: ScanFinding[];
  /** Files whose scan failed; they are reported, never silently dropped */
  skipped: SkippedFile[];
}

export interface SecretScanner {
  scan(changeSet: ChangeSet): ScanReport;
}

interface Span {
  start: number;
  end: number;
}

/**
 * Create a scanner with patterns compiled once
 */
export function createSecretScanner(
  config: SecurityConfig = defaultWardenConfig.security,
  logger: Logger = noopLogger
): SecretScanner {
  const patterns = compileSecretPatterns(config.patterns);
  const tokenRun = new RegExp(`[A-Za-z0-9+/=_-]{${config.entropy.minLength},}`, 'g');

  const scanLine = (path: string, line: number, text: string, findings: ScanFinding[]) => {
    const covered: Span[] = [];
    // Findings are unique per (path, line, pattern id); path and line are fixed here
    const reported = new Set<string>();

    for (const pattern of patterns) {
      for (const match of text.matchAll(pattern.regex)) {
        const start = match.index ?? 0;
        covered.push({ start, end: start + match[0].length });
        if (reported.has(pattern.id)) continue;
        reported.add(pattern.id);
        findings.push({
          path,
          line,
          patternId: pattern.id,
          excerpt: redact(match[0], config.excerptChars),
          confidence: pattern.confidence,
        });
      }
    }

    if (!config.entropy.enabled) return;

    for (const match of text.matchAll(tokenRun)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (covered.some((span) => span.start < end && start < span.end)) continue;

      const entropy = shannonEntropy(match[0]);
      const threshold = entropyThreshold(match[0], config.entropy);
      if (entropy <= threshold) continue;
      if (reported.has(ENTROPY_PATTERN_ID)) continue;
      reported.add(ENTROPY_PATTERN_ID);

      findings.push({
        path,
        line,
        patternId: ENTROPY_PATTERN_ID,
        excerpt: redact(match[0], config.excerptChars),
        confidence: Math.min(0.9, 0.5 + (entropy - threshold) / 2),
      });
    }
  };

  const scanFile = (file: FileChange): ScanFinding[] => {
    const findings: ScanFinding[] = [];
    for (const hunk of file.hunks) {
      for (const edit of hunk.edits) {
        if (edit.kind !== 'added' || edit.newLine === undefined) continue;
        scanLine(file.path, edit.newLine, edit.text, findings);
      }
    }
    return findings;
  };

  return {
    scan(changeSet: ChangeSet): ScanReport {
      const report: ScanReport = { findings: [], skipped: [] };
      if (!config.enabled) return report;

      for (const file of changeSet.files) {
        if (file.kind === 'binary') continue;
        if (config.ignorePaths.some((glob) => minimatch(file.path, glob, { dot: true }))) continue;

        try {
          for (const finding of scanFile(file)) report.findings.push(finding);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          logger.warn('Secret scan failed, file skipped', { path: file.path, reason });
          report.skipped.push({ path: file.path, reason });
        }
      }

      return report;
    },
  };
}

/**
 * Scan the added lines of a change set for secrets
 */
export function scanChangeSet(
  changeSet: ChangeSet,
  config: SecurityConfig = defaultWardenConfig.security
): ScanFinding[] {
  return createSecretScanner(config).scan(changeSet).findings;
}
