/**
 * Environment variable definitions for commit-warden
 */

import { WARDEN_ENV_VARS, type WardenEnv, type WardenEnvVar } from './types/config';

export interface EnvVarDefinition {
  type: 'boolean' | 'number';
  description: string;
}

export const wardenEnv: Record<WardenEnvVar, EnvVarDefinition> = {
  WARDEN_MAX_SUBJECT_LENGTH: {
    type: 'number',
    description: 'Maximum commit header length, overrides max_subject_length',
  },
  WARDEN_REQUIRE_SCOPE: {
    type: 'boolean',
    description: 'Require a scope in the commit header, overrides require_scope',
  },
  WARDEN_BLOCK_ON_SECRET: {
    type: 'boolean',
    description: 'Fail when a secret is detected, overrides block_on_secret',
  },
  WARDEN_SECRETS_ENABLED: {
    type: 'boolean',
    description: 'Enable secret scanning, overrides secrets.enabled',
  },
};

/**
 * Pick the variables commit-warden reads out of a process environment.
 * Empty strings count as unset.
 */
export function readWardenEnv(source: NodeJS.ProcessEnv = process.env): WardenEnv {
  const env: WardenEnv = {};
  for (const name of WARDEN_ENV_VARS) {
    const value = source[name];
    if (value !== undefined && value !== '') {
      env[name] = value;
    }
  }
  return env;
}
