export { orderKey, orderTasks, compareTasks, comparePrefixes, compareIds } from './order.js';
export type { OrderKey } from './order.js';
export { promoteQueue, NO_DUE_DATE } from './promote.js';
export type { PromoteOptions } from './promote.js';
export { runQueues } from './run.js';
export type { RunOptions } from './run.js';
export { loadQueue } from './load.js';
export type { LoadedQueue } from './load.js';
