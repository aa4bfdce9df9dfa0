import { Command } from 'commander';
import { describeRemoteError, loadQueue } from '@chore-queue/core';
import * as out from '../output.js';
import { $try, createClient, globalOptions } from '../helpers.js';

export function createOrderCommand(): Command {
  return new Command('order')
    .description('Show a queue in promotion order without changing anything')
    .argument('<queue>', 'Project name or path, e.g. "Chores/Rotating Chore Queue"')
    .action((queueName: string, _opts: unknown, cmd: Command) => $try(async () => {
      const client = createClient(globalOptions(cmd));
      const loaded = await loadQueue(client, queueName);

      switch (loaded.type) {
        case 'project-not-found':
          out.printResult({ status: 'project_not_found', queueName });
          return;
        case 'error':
          out.printResult({ status: 'error', queueName, errorDetail: describeRemoteError(loaded.error) });
          return;
        case 'found':
          if (loaded.tasks.length === 0) {
            out.printResult({ status: 'empty', queueName });
            return;
          }
          for (const line of out.formatQueueOrder(loaded.tasks)) console.log(line);
      }
    }));
}
