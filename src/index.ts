export * from './errors/index.js';
export * from './auth/index.js';
export * from './client/index.js';
export * from './execution/index.js';
export * from './export/index.js';
export * from './jobs/index.js';
export * from './batch/index.js';
export {
  QUERY_DEFAULTS,
  EXPORT_DEFAULTS,
  AUTH_DEFAULTS,
  REMOTE_DEFAULTS,
  settingsSchema,
  DEFAULT_SETTINGS,
  loadSettings,
  readSettingsFile,
  toJobSettings,
  loadEnv,
  type Settings,
  type LoadSettingsOptions,
} from './config/index.js';
export {
  createStructuredLogger,
  silentLogger,
  ConsoleOutput,
  JsonLinesOutput,
  BufferOutput,
  type StructuredLogger,
  type LogLevel,
  type LogEntry,
  type LogOutput,
} from './observability/index.js';
