/**
 * Configuration document schema
 *
 * Validates the snake_case JSON document and converts it into a
 * {@link WardenConfig}. Unknown keys are dropped, missing keys take defaults,
 * and any malformed value rejects the whole document.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { CommitTypeSchema, ScopeSchema, SeveritySchema } from '../schema';
import {
  resolveWardenConfig,
  type CustomRuleConfig,
  type WardenConfig,
  type WardenEnv,
  type WardenFileConfig,
} from '../types/config';

// ============================================================================
// Building blocks
// ============================================================================

const GlobListSchema = z.array(z.string().min(1));

const RegexFlagsSchema = z
  .string()
  .regex(/^[imsu]*$/, 'only the i, m, s and u flags are supported');

function isValidRegex(source: string, flags?: string): boolean {
  try {
    new RegExp(source, flags);
    return true;
  } catch {
    return false;
  }
}

const TypeListSchema = z
  .array(CommitTypeSchema)
  .refine((types) => new Set(types).size === types.length, 'types must be unique');

// ============================================================================
// Custom rules
// ============================================================================

const customRuleBase = {
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'rule id must be kebab-case'),
  severity: SeveritySchema.optional(),
  message: z.string().min(1).optional(),
  paths: GlobListSchema.optional(),
  branches: GlobListSchema.optional(),
};

export const CustomRuleDocumentSchema = z
  .discriminatedUnion('kind', [
    z.object({ ...customRuleBase, kind: z.literal('require-scope') }),
    z.object({ ...customRuleBase, kind: z.literal('require-body') }),
    z.object({ ...customRuleBase, kind: z.literal('forbid-types'), types: TypeListSchema }),
    z.object({ ...customRuleBase, kind: z.literal('require-types'), types: TypeListSchema }),
    z.object({ ...customRuleBase, kind: z.literal('max-subject-length'), max: z.number().int().positive() }),
    z.object({ ...customRuleBase, kind: z.literal('min-subject-length'), min: z.number().int().positive() }),
    z.object({
      ...customRuleBase,
      kind: z.literal('subject-pattern'),
      pattern: z.string().min(1),
      flags: RegexFlagsSchema.optional(),
    }),
  ])
  .superRefine((rule, ctx) => {
    if (rule.kind === 'subject-pattern' && !isValidRegex(rule.pattern, rule.flags)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `invalid regular expression: ${rule.pattern}`,
      });
    }
  });

export type CustomRuleDocument = z.infer<typeof CustomRuleDocumentSchema>;

// ============================================================================
// Sections
// ============================================================================

const SecretPatternDocumentSchema = z
  .object({
    id: z.string().min(1),
    pattern: z.string().min(1),
    flags: RegexFlagsSchema.optional(),
    description: z.string().optional(),
    confidence: z.number().min(0).max(1).optional(),
  })
  .superRefine((pattern, ctx) => {
    if (!isValidRegex(pattern.pattern, pattern.flags)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pattern'],
        message: `invalid regular expression: ${pattern.pattern}`,
      });
    }
  });

const SecretsDocumentSchema = z.object({
  enabled: z.boolean().optional(),
  patterns: z.array(SecretPatternDocumentSchema).optional(),
  entropy: z
    .object({
      enabled: z.boolean().optional(),
      threshold: z.number().positive().max(8).optional(),
      hex_threshold: z.number().positive().max(4).optional(),
      min_length: z.number().int().min(8).optional(),
    })
    .optional(),
  excerpt_chars: z.number().int().min(0).max(16).optional(),
  ignore_paths: GlobListSchema.optional(),
});

const ClassifierDocumentSchema = z.object({
  test_paths: GlobListSchema.optional(),
  docs_paths: GlobListSchema.optional(),
  ci_paths: GlobListSchema.optional(),
  breaking_markers: z.array(z.string().min(1)).optional(),
  small_hunk_lines: z.number().int().positive().optional(),
});

const MonorepoDocumentSchema = z.object({
  root_scope: ScopeSchema.optional(),
  package_markers: z.array(z.string().min(1)).optional(),
  packages: z
    .array(
      z.object({
        path: z.string(),
        scope: ScopeSchema.optional(),
        members: z.array(z.string()).optional(),
      })
    )
    .optional(),
});

/**
 * The `.commit-warden.json` document
 */
export const WardenConfigDocumentSchema = z
  .object({
    max_subject_length: z.number().int().positive().optional(),
    min_subject_length: z.number().int().min(0).optional(),
    require_scope: z.boolean().optional(),
    require_body: z.boolean().optional(),
    allowed_types: TypeListSchema.refine((types) => types.length > 0, 'at least one type is required').optional(),
    forbidden_types: TypeListSchema.optional(),
    allowed_scopes: z.array(ScopeSchema).optional(),
    block_on_secret: z.boolean().optional(),
    max_scopes: z.number().int().positive().optional(),
    max_changed_lines: z.number().int().positive().optional(),
    smart_confidence_threshold: z.number().min(0).max(1).optional(),
    rules: z.array(CustomRuleDocumentSchema).optional(),
    classifier: ClassifierDocumentSchema.optional(),
    secrets: SecretsDocumentSchema.optional(),
    monorepo: MonorepoDocumentSchema.optional(),
  })
  .superRefine((doc, ctx) => {
    const max = doc.max_subject_length ?? 72;
    if (doc.min_subject_length !== undefined && doc.min_subject_length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min_subject_length'],
        message: `must not exceed max_subject_length (${max})`,
      });
    }

    const ids = new Set<string>();
    doc.rules?.forEach((rule, index) => {
      if (ids.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rules', index, 'id'],
          message: `duplicate rule id "${rule.id}"`,
        });
      }
      ids.add(rule.id);
    });
  });

export type WardenConfigDocument = z.infer<typeof WardenConfigDocumentSchema>;

// ============================================================================
// Conversion
// ============================================================================

function toCustomRule(rule: CustomRuleDocument): CustomRuleConfig {
  const base = {
    id: rule.id,
    severity: rule.severity ?? 'error',
    message: rule.message,
    paths: rule.paths ?? [],
    branches: rule.branches ?? [],
  };

  switch (rule.kind) {
    case 'require-scope':
    case 'require-body':
      return { ...base, kind: rule.kind };
    case 'forbid-types':
    case 'require-types':
      return { ...base, kind: rule.kind, types: rule.types };
    case 'max-subject-length':
      return { ...base, kind: rule.kind, max: rule.max };
    case 'min-subject-length':
      return { ...base, kind: rule.kind, min: rule.min };
    case 'subject-pattern':
      return { ...base, kind: rule.kind, pattern: rule.pattern, flags: rule.flags };
  }
}

/**
 * Map a validated document onto the file-config shape consumed by
 * {@link resolveWardenConfig}
 */
export function toFileConfig(doc: WardenConfigDocument): WardenFileConfig {
  return {
    rules: {
      maxSubjectLength: doc.max_subject_length,
      minSubjectLength: doc.min_subject_length,
      requireScope: doc.require_scope,
      requireBody: doc.require_body,
      allowedTypes: doc.allowed_types,
      forbiddenTypes: doc.forbidden_types,
      allowedScopes: doc.allowed_scopes,
      maxChangedLines: doc.max_changed_lines,
      custom: doc.rules?.map(toCustomRule),
    },
    security: {
      enabled: doc.secrets?.enabled,
      blockOnSecret: doc.block_on_secret,
      patterns: doc.secrets?.patterns,
      entropy: {
        enabled: doc.secrets?.entropy?.enabled,
        threshold: doc.secrets?.entropy?.threshold,
        hexThreshold: doc.secrets?.entropy?.hex_threshold,
        minLength: doc.secrets?.entropy?.min_length,
      },
      excerptChars: doc.secrets?.excerpt_chars,
      ignorePaths: doc.secrets?.ignore_paths,
    },
    classifier: {
      testPaths: doc.classifier?.test_paths,
      docsPaths: doc.classifier?.docs_paths,
      ciPaths: doc.classifier?.ci_paths,
      breakingMarkers: doc.classifier?.breaking_markers,
      smallHunkLines: doc.classifier?.small_hunk_lines,
      maxScopes: doc.max_scopes,
    },
    synthesis: {
      smartConfidenceThreshold: doc.smart_confidence_threshold,
    },
    monorepo: {
      rootScope: doc.monorepo?.root_scope,
      packageMarkers: doc.monorepo?.package_markers,
      packages: doc.monorepo?.packages,
    },
  };
}

/**
 * Validate a configuration document and resolve it against defaults and env
 *
 * @param raw - Parsed JSON, `undefined` when no configuration file exists
 * @throws ConfigurationError listing every invalid key
 */
export function parseWardenConfig(raw: unknown, env: WardenEnv = {}): WardenConfig {
  const result = WardenConfigDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid commit-warden configuration',
      result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }
  return resolveWardenConfig(toFileConfig(result.data), env);
}
