export {
  runBatch,
  selectTargets,
  formatSummary,
  toJsonReport,
  type BatchQuery,
  type BatchCallbacks,
  type BatchOptions,
  type BatchResult,
  type JsonReportEntry,
} from './run-batch.js';
