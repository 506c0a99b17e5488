export type {
  JobSettings,
  JobStatus,
  JobSuccess,
  JobOutcome,
  Job,
  PlannedQuery,
  JobStartedMessage,
  JobCompletedMessage,
  JobMessage,
  JobSortOrder,
  JobCounts,
} from './types.js';
export { JobPlanner, type JobPlannerOptions } from './planner.js';
export { ConcurrencyLimiter, type ReleasePermit } from './limiter.js';
export { CompletionBus } from './completion-bus.js';
export { JobRegistry, isTerminal } from './registry.js';
export { JobRunner, type JobRunnerOptions } from './runner.js';
export { QueryEngine, type QueryEngineOptions, type EngineCallbacks } from './engine.js';
