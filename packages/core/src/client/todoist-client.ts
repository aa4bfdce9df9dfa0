/**
 * Todoist REST v2 client over the global fetch.
 *
 * Every public method resolves to a ClientResult; HTTP failures, network
 * failures and malformed bodies are all reported as values.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { ClientResult } from '../types/results.js';
import type { ProjectId, RemoteLabel, RemoteProject, RemoteTask, TaskId, TaskUpdate } from '../types/remote.js';
import { fail, ok } from '../types/results.js';
import { createLogger, type LogSink, type Logger } from '../logging.js';
import { LabelCache } from './label-cache.js';
import { LabelListSchema, LabelSchema, ProjectListSchema, TaskListSchema } from './schemas.js';
import type { TaskServiceClient } from './task-service.js';

export const DEFAULT_API_BASE = 'https://api.todoist.com/rest/v2';

export type FetchFn = typeof fetch;

export interface TodoistClientOptions {
  token: string;
  baseUrl?: string;
  fetch?: FetchFn;
  logSink?: LogSink;
}

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
}

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

export class TodoistClient implements TaskServiceClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly log: Logger;
  private readonly labels: LabelCache;

  constructor(opts: TodoistClientOptions) {
    this.token = opts.token;
    this.baseUrl = (opts.baseUrl ?? DEFAULT_API_BASE).replace(/\/+$/, '');
    this.fetchFn = opts.fetch ?? fetch;
    this.log = createLogger('todoist', opts.logSink);
    this.labels = new LabelCache(this);
  }

  listProjects(): Promise<ClientResult<RemoteProject[]>> {
    return this.request('GET', '/projects', ProjectListSchema);
  }

  listTasks(projectId: ProjectId): Promise<ClientResult<RemoteTask[]>> {
    return this.request('GET', '/tasks', TaskListSchema, { query: { project_id: projectId } });
  }

  async updateTask(taskId: TaskId, update: TaskUpdate): Promise<ClientResult<void>> {
    const body = update.kind === 'due'
      ? { due_string: update.dueString, due_lang: update.dueLang }
      : { labels: update.labels };
    const result = await this.send('POST', `/tasks/${encodeURIComponent(taskId)}`, { body });
    return result.type === 'success' ? ok(undefined) : result;
  }

  listLabels(): Promise<ClientResult<RemoteLabel[]>> {
    return this.request('GET', '/labels', LabelListSchema);
  }

  createLabel(name: string): Promise<ClientResult<RemoteLabel>> {
    return this.request('POST', '/labels', LabelSchema, { body: { name } });
  }

  ensureLabel(name: string): Promise<ClientResult<RemoteLabel>> {
    return this.labels.ensure(name);
  }

  // --- Transport ---

  private async request<T>(
    method: string,
    path: string,
    schema: Schema<T>,
    opts: RequestOptions = {},
  ): Promise<ClientResult<T>> {
    const sent = await this.send(method, path, opts);
    if (sent.type === 'error') return sent;

    const parsed = schema.safeParse(sent.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return fail({ kind: 'invalid-response', message: `${method} ${path}${where}: ${issue?.message ?? 'invalid body'}` });
    }
    return ok(parsed.data);
  }

  /** Perform one HTTP call; resolves to the decoded JSON body, or null when there is none */
  private async send(method: string, path: string, opts: RequestOptions): Promise<ClientResult<unknown>> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(opts.query ?? {})) {
      url.searchParams.set(key, value);
    }

    this.log.debug(`${method} ${url.pathname}${url.search}`);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
      });
      text = await res.text();
    } catch (err: unknown) {
      return fail({ kind: 'network', message: err instanceof Error ? err.message : String(err) });
    }

    if (res.status >= 400) {
      this.log.debug(`${method} ${url.pathname} -> ${res.status}`);
      return fail({ kind: 'remote', status: res.status, message: text });
    }

    const contentType = res.headers.get('content-type') ?? '';
    if (!text || !contentType.includes('application/json')) return ok(null);

    try {
      const body: unknown = JSON.parse(text);
      return ok(body);
    } catch {
      return fail({ kind: 'invalid-response', message: `${method} ${path}: body is not valid JSON` });
    }
  }
}
