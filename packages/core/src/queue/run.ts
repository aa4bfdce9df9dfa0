import type { TaskServiceClient } from '../client/task-service.js';
import type { QueueConfig, PromotionResult } from '../types/queue.js';
import type { LogSink } from '../logging.js';
import { promoteQueue } from './promote.js';

export interface RunOptions {
  logSink?: LogSink;
  /** Called with each queue's result as soon as it is known */
  onResult?: (result: PromotionResult) => void;
}

/**
 * Promote every queue, one after another, in configuration order.
 * A queue that throws is reported as an error and the run moves on.
 */
export async function runQueues(
  client: TaskServiceClient,
  queues: readonly QueueConfig[],
  options: RunOptions = {},
): Promise<PromotionResult[]> {
  const results: PromotionResult[] = [];
  for (const config of queues) {
    let result: PromotionResult;
    try {
      result = await promoteQueue(client, config, { logSink: options.logSink });
    } catch (err: unknown) {
      result = {
        status: 'error',
        queueName: config.queueName,
        errorDetail: err instanceof Error ? err.message : String(err),
      };
    }
    results.push(result);
    options.onResult?.(result);
  }
  return results;
}
