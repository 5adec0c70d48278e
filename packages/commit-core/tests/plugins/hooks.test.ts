/**
 * Tests for hooks.ts - plugin classify and rule hooks
 */

import { describe, it, expect, vi } from 'vitest';
import { defaultWardenConfig, type Classification, type Logger, type PackageMap } from '@commit-warden/contracts';
import { applyClassifyHooks, runRuleHooks, type WardenPlugin } from '../../src/plugins/hooks';
import { evaluate } from '../../src/rules/rule-engine';
import { buildRuleSet } from '../../src/rules/rule-set';
import { changeSet, file } from '../factories';

const builtIn: Classification = {
  type: 'feat',
  scopes: ['core'],
  breaking: false,
  confidence: 0.6,
  reasons: ['new or extended functionality'],
  diagnostics: [],
};

const files = changeSet(file('packages/core/src/cache.ts'));
const packageMap: PackageMap = { assignments: [], diagnostics: [] };

function createLogger() {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
  return logger;
}

describe('applyClassifyHooks', () => {
  it('should apply an override with higher confidence', () => {
    const plugin: WardenPlugin = { name: 'perf-detector', classify: () => ({ type: 'perf', confidence: 0.9 }) };

    expect(applyClassifyHooks(builtIn, [plugin], files, packageMap)).toEqual({
      ...builtIn,
      type: 'perf',
      confidence: 0.9,
      reasons: ['new or extended functionality', 'override from plugin "perf-detector"'],
    });
  });

  it('should keep the built-in classification on equal confidence', () => {
    const logger = createLogger();
    const plugin: WardenPlugin = { name: 'tie', classify: () => ({ type: 'refactor', confidence: 0.6 }) };

    expect(applyClassifyHooks(builtIn, [plugin], files, packageMap, logger)).toBe(builtIn);
    expect(logger.debug).toHaveBeenCalledWith('Plugin override yields to higher-confidence classification', {
      plugin: 'tie',
      override: 0.6,
      current: 0.6,
    });
  });

  it('should compare later plugins against the current result', () => {
    const first: WardenPlugin = { name: 'first', classify: () => ({ scopes: ['cache'], confidence: 0.8 }) };
    const second: WardenPlugin = { name: 'second', classify: () => ({ type: 'fix', confidence: 0.7 }) };

    const result = applyClassifyHooks(builtIn, [first, second], files, packageMap);

    expect(result.type).toBe('feat');
    expect(result.scopes).toEqual(['cache']);
    expect(result.confidence).toBe(0.8);
  });

  it('should ignore hooks that abstain', () => {
    const plugin: WardenPlugin = { name: 'quiet', classify: () => null };

    expect(applyClassifyHooks(builtIn, [plugin], files, packageMap)).toBe(builtIn);
  });

  it('should log and skip a hook that throws', () => {
    const logger = createLogger();
    const plugin: WardenPlugin = {
      name: 'broken',
      classify: () => {
        throw new Error('boom');
      },
    };

    expect(applyClassifyHooks(builtIn, [plugin], files, packageMap, logger)).toBe(builtIn);
    expect(logger.warn).toHaveBeenCalledWith('Plugin "broken" classify hook failed: boom', {
      plugin: 'broken',
      hook: 'classify',
    });
  });

  it('should log and skip an override that does not validate', () => {
    const logger = createLogger();
    const plugin: WardenPlugin = { name: 'sloppy', classify: () => ({ type: 'Perf', confidence: 0.99 }) };

    expect(applyClassifyHooks(builtIn, [plugin], files, packageMap, logger)).toBe(builtIn);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0]?.[1]).toEqual({ plugin: 'sloppy', hook: 'classify' });
  });
});

describe('runRuleHooks', () => {
  it('should collect violations in plugin order and drop failing hooks', () => {
    const logger = createLogger();
    const plugins: WardenPlugin[] = [
      { name: 'ticket', rules: () => [{ ruleId: 'ticket-ref', severity: 'warning', message: 'No ticket reference' }] },
      {
        name: 'crashy',
        rules: () => {
          throw new Error('rule hook crashed');
        },
      },
      { name: 'owners', rules: () => [{ ruleId: 'owners', severity: 'error', message: 'Needs review', path: 'CODEOWNERS' }] },
    ];

    const violations = runRuleHooks(plugins, builtIn, files, [], 'feat: add cache', logger);

    expect(violations).toEqual([
      { ruleId: 'ticket-ref', severity: 'warning', message: 'No ticket reference' },
      { ruleId: 'owners', severity: 'error', message: 'Needs review', path: 'CODEOWNERS' },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('Plugin "crashy" rules hook failed: rule hook crashed', {
      plugin: 'crashy',
      hook: 'rules',
    });
  });

  it('should pass the message to the hook and let its errors fail the verdict', () => {
    const rules = vi.fn(() => [{ ruleId: 'plugin-check', severity: 'error' as const, message: 'Rejected by plugin' }]);

    const verdict = evaluate(
      buildRuleSet(defaultWardenConfig),
      { classification: builtIn, changeSet: files, findings: [], message: 'feat(core): add cache' },
      { plugins: [{ name: 'gate', rules }] }
    );

    expect(rules).toHaveBeenCalledWith(builtIn, files, [], 'feat(core): add cache');
    expect(verdict).toEqual({
      violations: [{ ruleId: 'plugin-check', severity: 'error', message: 'Rejected by plugin' }],
      outcome: 'fail',
    });
  });
});
