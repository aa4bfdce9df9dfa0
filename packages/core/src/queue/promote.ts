/**
 * Queue promotion: make the head of a queue due, clear the rest, label the head.
 *
 * Every write is derived from the current remote snapshot alone, so running
 * it again on an unchanged queue repeats the same writes.
 */

import type { TaskServiceClient } from '../client/task-service.js';
import type { QueueConfig, PromotionResult } from '../types/queue.js';
import type { RemoteTask } from '../types/remote.js';
import type { RemoteError } from '../types/results.js';
import { describeRemoteError } from '../types/results.js';
import { createLogger, type LogSink, type Logger } from '../logging.js';
import { loadQueue } from './load.js';

/** Due string the service reads as "remove the due date" */
export const NO_DUE_DATE = 'no due date';

export interface PromoteOptions {
  logSink?: LogSink;
}

function failed(config: QueueConfig, error: RemoteError): PromotionResult {
  return { status: 'error', queueName: config.queueName, errorDetail: describeRemoteError(error) };
}

export async function promoteQueue(
  client: TaskServiceClient,
  config: QueueConfig,
  options: PromoteOptions = {},
): Promise<PromotionResult> {
  const log = createLogger('queue', options.logSink);
  const queueName = config.queueName;

  // resolving, ordering
  const loaded = await loadQueue(client, queueName);
  if (loaded.type === 'error') return failed(config, loaded.error);
  if (loaded.type === 'project-not-found') {
    log.debug(`${queueName}: no project matches`);
    return { status: 'project_not_found', queueName };
  }

  const [head, ...rest] = loaded.tasks;
  if (!head) return { status: 'empty', queueName };
  log.debug(`${queueName}: head is "${head.content}" of ${loaded.tasks.length} tasks`);

  // promoting
  const promoted = await client.updateTask(head.id, {
    kind: 'due',
    dueString: config.dueExpression,
    dueLang: config.locale,
  });
  if (promoted.type === 'error') return failed(config, promoted.error);

  // demoting
  let demotedCount = 0;
  if (config.clearDueOnRest) {
    for (const task of rest) {
      if (task.due === null) continue;
      const cleared = await client.updateTask(task.id, {
        kind: 'due',
        dueString: NO_DUE_DATE,
        dueLang: config.locale,
      });
      if (cleared.type === 'error') return failed(config, cleared.error);
      demotedCount++;
    }
  }

  // labeling
  const labelApplied = config.promoteLabel
    ? await applyLabel(client, head, config.promoteLabel, log)
    : false;

  return {
    status: 'ok',
    queueName,
    promotedTaskTitle: head.content || '(unnamed)',
    dueExpression: config.dueExpression,
    demotedCount,
    labelApplied,
    label: config.promoteLabel,
  };
}

/** Best effort: any failure is logged and reported as false */
async function applyLabel(
  client: TaskServiceClient,
  head: RemoteTask,
  labelName: string,
  log: Logger,
): Promise<boolean> {
  try {
    const label = await client.ensureLabel(labelName);
    if (label.type === 'error') {
      log.warn(`could not resolve label ${labelName}: ${describeRemoteError(label.error)}`);
      return false;
    }

    // Tasks may carry label ids or names depending on the API version.
    const carried = head.labels.some((l) => l === label.data.id || l === labelName || l === label.data.name);
    if (carried) return true;

    const written = await client.updateTask(head.id, {
      kind: 'labels',
      labels: [...head.labels, label.data.name],
    });
    if (written.type === 'error') {
      log.warn(`could not label "${head.content}": ${describeRemoteError(written.error)}`);
      return false;
    }
    return true;
  } catch (err: unknown) {
    log.warn(`labeling "${head.content}" failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
