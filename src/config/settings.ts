/**
 * Settings schema and loader
 *
 * Precedence (later wins): defaults < settings file < FLEETQUERY_* env < explicit overrides.
 * Option names are snake_case everywhere they are user-facing.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { QUERY_DEFAULTS, EXPORT_DEFAULTS, AUTH_DEFAULTS } from './constants.js';
import { readPrefixedEnv, resolveEnvReferences } from './env.js';
import { ConfigurationError } from '../errors/index.js';
import { errorMessage } from '../utils/type-guards.js';
import type { JobSettings } from '../jobs/types.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const settingsSchema = z
  .object({
    output_folder: z.string().min(1),
    job_name: z.string().min(1),
    export_csv: z.boolean(),
    export_json: z.boolean(),
    parse_dynamics: z.boolean(),
    /** Seconds */
    query_timeout: z.number().int().positive(),
    retry_count: z.number().int().min(0).max(10),
    concurrency_limit: z.number().int().min(1).max(100),
    /** Seconds */
    validation_interval: z.number().int().positive(),
    page_buffer_size: z.number().int().positive(),
    log_level: logLevelSchema,
    /** Static bearer token; when absent the CLI credential broker is used */
    access_token: z.string().min(1).optional(),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

/** Settings files may set any subset of options; unknown keys are rejected */
const fileSettingsSchema = settingsSchema.partial();

const envBoolean = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envInteger = z.coerce.number().int();

/** Environment values arrive as strings */
const envSettingsSchema = z
  .object({
    output_folder: z.string(),
    job_name: z.string(),
    export_csv: envBoolean,
    export_json: envBoolean,
    parse_dynamics: envBoolean,
    query_timeout: envInteger,
    retry_count: envInteger,
    concurrency_limit: envInteger,
    validation_interval: envInteger,
    page_buffer_size: envInteger,
    log_level: z.string().toLowerCase(),
    access_token: z.string(),
  })
  .partial();

export const DEFAULT_SETTINGS: Settings = {
  output_folder: EXPORT_DEFAULTS.OUTPUT_FOLDER,
  job_name: EXPORT_DEFAULTS.JOB_NAME,
  export_csv: EXPORT_DEFAULTS.EXPORT_CSV,
  export_json: EXPORT_DEFAULTS.EXPORT_JSON,
  parse_dynamics: EXPORT_DEFAULTS.PARSE_DYNAMICS,
  query_timeout: QUERY_DEFAULTS.TIMEOUT_SECONDS,
  retry_count: QUERY_DEFAULTS.RETRY_COUNT,
  concurrency_limit: QUERY_DEFAULTS.CONCURRENCY_LIMIT,
  validation_interval: AUTH_DEFAULTS.VALIDATION_INTERVAL_MS / 1000,
  page_buffer_size: EXPORT_DEFAULTS.PAGE_BUFFER_SIZE,
  log_level: 'info',
};

export interface LoadSettingsOptions {
  /** JSON settings file; string values may reference env vars */
  file?: string;
  /** Environment to read FLEETQUERY_* options from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, e.g. from command-line flags */
  overrides?: Partial<Settings>;
}

/**
 * Merge every settings source and validate the result
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;

  const fromFile = options.file ? readSettingsFile(options.file, env) : {};
  const fromEnv = parseOrThrow(envSettingsSchema, readPrefixedEnv(env), 'Invalid environment settings');

  return parseOrThrow(
    settingsSchema,
    {
      ...DEFAULT_SETTINGS,
      ...fromFile,
      ...fromEnv,
      ...withoutUndefined(options.overrides ?? {}),
    },
    'Invalid settings'
  );
}

/**
 * Read and validate a JSON settings file
 */
export function readSettingsFile(path: string, env: NodeJS.ProcessEnv = process.env): Partial<Settings> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${path}`, [errorMessage(error)]);
  }

  return parseOrThrow(fileSettingsSchema, resolveEnvReferences(raw, env), `Invalid settings file ${path}`);
}

/**
 * The per-job snapshot of export settings
 */
export function toJobSettings(settings: Settings): JobSettings {
  return {
    outputFolder: settings.output_folder,
    jobName: settings.job_name,
    exportCsv: settings.export_csv,
    exportJson: settings.export_json,
    parseDynamics: settings.parse_dynamics,
  };
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown, message: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(message, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function withoutUndefined(values: Partial<Settings>): Partial<Settings> {
  const result: Partial<Settings> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}
