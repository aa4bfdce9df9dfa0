import type { TaskServiceClient } from '../client/task-service.js';
import type { ProjectId, RemoteTask } from '../types/remote.js';
import type { RemoteError } from '../types/results.js';
import { resolveProjectPath } from '../projects/project-resolver.js';
import { orderTasks } from './order.js';

export type LoadedQueue =
  | { readonly type: 'found'; readonly projectId: ProjectId; readonly tasks: RemoteTask[] }
  | { readonly type: 'project-not-found' }
  | { readonly type: 'error'; readonly error: RemoteError };

/** Resolve a queue against a fresh project listing and fetch its tasks in queue order */
export async function loadQueue(client: TaskServiceClient, queueName: string): Promise<LoadedQueue> {
  const projects = await client.listProjects();
  if (projects.type === 'error') return projects;

  const projectId = resolveProjectPath(projects.data, queueName);
  if (projectId === null) return { type: 'project-not-found' };

  const tasks = await client.listTasks(projectId);
  if (tasks.type === 'error') return tasks;

  return { type: 'found', projectId, tasks: orderTasks(tasks.data) };
}
