export type { ProjectId, TaskId, LabelId, RemoteProject, RemoteTask, RemoteLabel, DueDescriptor, TaskUpdate } from './remote.js';
export type { RemoteError, ClientResult } from './results.js';
export { ok, fail, describeRemoteError } from './results.js';
export type { QueueConfig, PromotionStatus, PromotionResult } from './queue.js';
