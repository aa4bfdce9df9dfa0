export type { TaskServiceClient } from './task-service.js';
export { TodoistClient, DEFAULT_API_BASE } from './todoist-client.js';
export type { TodoistClientOptions, FetchFn } from './todoist-client.js';
export { LabelCache } from './label-cache.js';
export type { LabelSource } from './label-cache.js';
