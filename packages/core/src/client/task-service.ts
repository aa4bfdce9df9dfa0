import type { ClientResult } from '../types/results.js';
import type { ProjectId, RemoteLabel, RemoteProject, RemoteTask, TaskId, TaskUpdate } from '../types/remote.js';

/**
 * The narrow request/response surface the promotion engine consumes.
 * Failures come back as `{ type: 'error' }` values, never as throws.
 */
export interface TaskServiceClient {
  listProjects(): Promise<ClientResult<RemoteProject[]>>;
  /** Active (non-completed) tasks of one project */
  listTasks(projectId: ProjectId): Promise<ClientResult<RemoteTask[]>>;
  updateTask(taskId: TaskId, update: TaskUpdate): Promise<ClientResult<void>>;
  listLabels(): Promise<ClientResult<RemoteLabel[]>>;
  createLabel(name: string): Promise<ClientResult<RemoteLabel>>;
  /** Find a label by case-insensitive name, creating it on first use */
  ensureLabel(name: string): Promise<ClientResult<RemoteLabel>>;
}
