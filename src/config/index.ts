export * from './constants.js';
export {
  loadEnv,
  resolveEnvString,
  resolveEnvReferences,
  readPrefixedEnv,
  type EnvFileOptions,
  type LoadEnvResult,
} from './env.js';
export {
  settingsSchema,
  loadSettings,
  readSettingsFile,
  toJobSettings,
  DEFAULT_SETTINGS,
  type Settings,
  type LoadSettingsOptions,
} from './settings.js';
