/**
 * Plugin extension point
 *
 * A plugin is a name plus up to two synchronous hooks. Classify hooks may
 * override parts of the built-in classification; rule hooks add violations.
 * A hook that throws or returns something malformed counts as having
 * returned nothing.
 */

import {
  ClassificationOverrideSchema,
  HookFailure,
  HookViolationsSchema,
  noopLogger,
  type ChangeSet,
  type Classification,
  type ClassificationOverride,
  type Logger,
  type PackageMap,
  type ScanFinding,
  type Violation,
} from '@commit-warden/contracts';

export type ClassifyHook = (
  changeSet: ChangeSet,
  packageMap: PackageMap
) => ClassificationOverride | null | undefined;

export type RuleHook = (
  classification: Classification,
  changeSet: ChangeSet,
  findings: readonly ScanFinding[],
  message: string
) => Violation[];

export interface WardenPlugin {
  name: string;
  classify?: ClassifyHook;
  rules?: RuleHook;
}

function reportFailure(logger: Logger, failure: HookFailure): void {
  logger.warn(failure.message, { plugin: failure.plugin, hook: failure.hook });
}

/**
 * Merge an override into a classification.
 * Only the fields the override sets are replaced.
 */
export function mergeClassification(base: Classification, override: ClassificationOverride, source: string): Classification {
  return {
    ...base,
    type: override.type ?? base.type,
    scopes: override.scopes ?? base.scopes,
    breaking: override.breaking ?? base.breaking,
    confidence: override.confidence,
    reasons: [...base.reasons, `override from plugin "${source}"`],
  };
}

/**
 * Run classify hooks in plugin order.
 *
 * An override wins only with a confidence strictly above the current result;
 * on a tie the existing (built-in or earlier) classification stays.
 */
export function applyClassifyHooks(
  builtIn: Classification,
  plugins: readonly WardenPlugin[],
  changeSet: ChangeSet,
  packageMap: PackageMap,
  logger: Logger = noopLogger
): Classification {
  let current = builtIn;

  for (const plugin of plugins) {
    if (!plugin.classify) continue;

    let raw: unknown;
    try {
      raw = plugin.classify(changeSet, packageMap);
    } catch (error) {
      reportFailure(logger, new HookFailure(plugin.name, 'classify', error));
      continue;
    }
    if (raw === null || raw === undefined) continue;

    const parsed = ClassificationOverrideSchema.safeParse(raw);
    if (!parsed.success) {
      reportFailure(logger, new HookFailure(plugin.name, 'classify', parsed.error));
      continue;
    }

    if (parsed.data.confidence > current.confidence) {
      current = mergeClassification(current, parsed.data, plugin.name);
    } else {
      logger.debug('Plugin override yields to higher-confidence classification', {
        plugin: plugin.name,
        override: parsed.data.confidence,
        current: current.confidence,
      });
    }
  }

  return current;
}

/**
 * Collect violations from rule hooks, in plugin order
 */
export function runRuleHooks(
  plugins: readonly WardenPlugin[],
  classification: Classification,
  changeSet: ChangeSet,
  findings: readonly ScanFinding[],
  message: string,
  logger: Logger = noopLogger
): Violation[] {
  const violations: Violation[] = [];

  for (const plugin of plugins) {
    if (!plugin.rules) continue;

    let raw: unknown;
    try {
      raw = plugin.rules(classification, changeSet, findings, message);
    } catch (error) {
      reportFailure(logger, new HookFailure(plugin.name, 'rules', error));
      continue;
    }

    const parsed = HookViolationsSchema.safeParse(raw);
    if (!parsed.success) {
      reportFailure(logger, new HookFailure(plugin.name, 'rules', parsed.error));
      continue;
    }
    violations.push(...parsed.data);
  }

  return violations;
}
