/**
 * Configuration file loading
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import {
  ConfigurationError,
  parseWardenConfig,
  type WardenConfig,
  type WardenEnv,
} from '@commit-warden/contracts';

export const CONFIG_FILE_NAME = '.commit-warden.json';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readOptional(file: string): Promise<string | undefined> {
  try {
    return await readFile(file, 'utf-8');
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

/**
 * Load `.commit-warden.json` from `root` (or an explicit path) and resolve it
 * against defaults and environment overrides. A missing default file means
 * defaults; a missing explicit file is an error.
 */
export async function loadWardenConfig(
  root: string,
  configPath?: string,
  env: WardenEnv = {}
): Promise<WardenConfig> {
  const file = configPath ? (isAbsolute(configPath) ? configPath : join(root, configPath)) : join(root, CONFIG_FILE_NAME);
  const text = await readOptional(file);

  if (text === undefined) {
    if (configPath) {
      throw new ConfigurationError(`Configuration file not found: ${file}`);
    }
    return parseWardenConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`${file} is not valid JSON`, [
      { path: '', message: error instanceof Error ? error.message : String(error) },
    ]);
  }
  return parseWardenConfig(raw, env);
}
