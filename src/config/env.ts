/**
 * Environment loading with dotenv support
 *
 * Settings may come from:
 * - Environment variables (via .env files or process.env), named FLEETQUERY_<OPTION>
 * - JSON settings files whose string values reference env vars
 *
 * Env var reference patterns:
 * - $VAR_NAME
 * - ${VAR_NAME}
 * - ${VAR_NAME:-default}  (with default value)
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ENV_PREFIX } from './constants.js';
import { isRecord } from '../utils/type-guards.js';

export interface EnvFileOptions {
  /** Path to .env file (default: .env in cwd) */
  envFile?: string;
  /** Additional .env files to load (loaded in order, later files override) */
  envFiles?: string[];
  /** Base directory for resolving relative paths */
  baseDir?: string;
}

export interface LoadEnvResult {
  /** Whether any .env files were loaded */
  loaded: boolean;
  /** Paths of loaded .env files */
  files: string[];
  /** Number of variables loaded */
  count: number;
}

/**
 * Load environment variables from .env files
 */
export function loadEnv(options: EnvFileOptions = {}): LoadEnvResult {
  const baseDir = options.baseDir || process.cwd();
  const files: string[] = [];
  let totalCount = 0;

  const envFilePaths: string[] = [];

  if (options.envFiles) {
    envFilePaths.push(...options.envFiles.map((f) => resolve(baseDir, f)));
  } else if (options.envFile) {
    envFilePaths.push(resolve(baseDir, options.envFile));
  } else {
    // Default: look for .env, .env.local in order
    for (const file of ['.env', '.env.local']) {
      envFilePaths.push(resolve(baseDir, file));
    }
  }

  // Later files override earlier ones
  for (const envPath of envFilePaths) {
    if (existsSync(envPath)) {
      const result = dotenvConfig({ path: envPath, override: true });
      if (!result.error && result.parsed) {
        files.push(envPath);
        totalCount += Object.keys(result.parsed).length;
      }
    }
  }

  return {
    loaded: files.length > 0,
    files,
    count: totalCount,
  };
}

/**
 * Resolve environment variable references in a string
 */
export function resolveEnvString(value: string, env: NodeJS.ProcessEnv = process.env): string {
  // ${VAR:-default} or ${VAR}
  const bracketPattern = /\$\{([^}:]+)(?::-([^}]*))?\}/g;
  // $VAR (word characters only, not followed by {)
  const simplePattern = /\$([A-Za-z_][A-Za-z0-9_]*)/g;

  const result = value.replace(bracketPattern, (_match, varName: string, defaultValue?: string) => {
    const envValue = env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    return defaultValue ?? '';
  });

  return result.replace(simplePattern, (_match, varName: string) => env[varName] ?? '');
}

/**
 * Recursively resolve env var references in every string of a parsed document
 */
export function resolveEnvReferences(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnvString(value, env);
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvReferences(item, env));
  }

  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = resolveEnvReferences(entry, env);
    }
    return result;
  }

  return value;
}

/**
 * Collect FLEETQUERY_* variables, keyed by lowercased option name.
 * Empty values are treated as unset.
 *
 * Convention: FLEETQUERY_{OPTION}
 * Example: FLEETQUERY_RETRY_COUNT=2 → { retry_count: '2' }
 */
export function readPrefixedEnv(
  env: NodeJS.ProcessEnv = process.env,
  prefix: string = ENV_PREFIX
): Record<string, string> {
  const options: Record<string, string> = {};

  for (const [name, value] of Object.entries(env)) {
    if (!name.startsWith(prefix) || value === undefined) continue;
    const trimmed = value.trim();
    if (trimmed.length === 0) continue;
    options[name.slice(prefix.length).toLowerCase()] = trimmed;
  }

  return options;
}
