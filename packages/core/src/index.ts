// Types
export type {
  ProjectId, TaskId, LabelId,
  RemoteProject, RemoteTask, RemoteLabel, DueDescriptor, TaskUpdate,
  RemoteError, ClientResult,
  QueueConfig, PromotionStatus, PromotionResult,
} from './types/index.js';
export { ok, fail, describeRemoteError } from './types/index.js';

// Logging
export { createLogger, silentSink } from './logging.js';
export type { Logger, LogLevel, LogSink } from './logging.js';

// Remote client
export * from './client/index.js';

// Projects
export { resolveProjectPath } from './projects/index.js';

// Queues
export * from './queue/index.js';

// Config
export * from './config/index.js';
