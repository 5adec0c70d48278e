/**
 * Custom rules declared under `rules` in the configuration document
 */

import type { CustomRuleConfig } from '@commit-warden/contracts';
import { characterCount } from './commit-message';
import type { Rule, RuleHit } from './types';

const DEFAULT_TEMPLATES: Record<CustomRuleConfig['kind'], string> = {
  'require-scope': 'A scope is required ({id})',
  'require-body': 'A message body is required ({id})',
  'forbid-types': 'Type "{type}" is not allowed here ({id})',
  'require-types': 'Type must be one of: {types} ({id})',
  'max-subject-length': 'Header is {length} characters long, the maximum here is {max} ({id})',
  'min-subject-length': 'Header is {length} characters long, the minimum here is {min} ({id})',
  'subject-pattern': 'Subject must match /{pattern}/ ({id})',
};

export function createCustomRule(config: CustomRuleConfig): Rule {
  const fired = (values: RuleHit['values'] = {}): RuleHit[] => [{ values: { id: config.id, ...values } }];
  const check = checkFor(config, fired);

  return {
    id: config.id,
    severity: config.severity,
    template: config.message ?? DEFAULT_TEMPLATES[config.kind],
    shape: 'message',
    paths: config.paths,
    branches: config.branches,
    check,
  };
}

function checkFor(config: CustomRuleConfig, fired: (values?: RuleHit['values']) => RuleHit[]): Rule['check'] {
  switch (config.kind) {
    case 'require-scope':
      return ({ parsed }) => (parsed.scope === undefined ? fired() : []);

    case 'require-body':
      return ({ parsed }) => (parsed.body === undefined ? fired() : []);

    case 'forbid-types': {
      const { types } = config;
      return ({ parsed }) =>
        parsed.type !== undefined && types.includes(parsed.type) ? fired({ type: parsed.type }) : [];
    }

    case 'require-types': {
      const { types } = config;
      return ({ parsed }) =>
        parsed.type !== undefined && !types.includes(parsed.type)
          ? fired({ type: parsed.type, types: types.join(', ') })
          : [];
    }

    case 'max-subject-length': {
      const { max } = config;
      return ({ parsed }) => {
        const length = characterCount(parsed.header);
        return length > max ? fired({ length, max }) : [];
      };
    }

    case 'min-subject-length': {
      const { min } = config;
      return ({ parsed }) => {
        const length = characterCount(parsed.header);
        return length < min ? fired({ length, min }) : [];
      };
    }

    case 'subject-pattern': {
      const source = config.pattern;
      const pattern = new RegExp(source, config.flags);
      return ({ parsed }) => (pattern.test(parsed.subject ?? parsed.header) ? [] : fired({ pattern: source }));
    }
  }
}

export function createCustomRules(configs: readonly CustomRuleConfig[]): Rule[] {
  return configs.map(createCustomRule);
}
