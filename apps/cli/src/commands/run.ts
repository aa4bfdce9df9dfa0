import { Command } from 'commander';
import { loadQueueConfig, runQueues } from '@chore-queue/core';
import * as out from '../output.js';
import { $try, createClient, createLogSink, globalOptions, selectQueues } from '../helpers.js';

export function createRunCommand(): Command {
  return new Command('run')
    .description('Promote the head of every configured queue')
    .option('-q, --queue <name...>', 'Only process the named queues')
    .action((opts: { queue?: string[] }, cmd: Command) => $try(async () => {
      const global = globalOptions(cmd);
      const client = createClient(global);
      const { queues } = loadQueueConfig({ path: global.config });

      await runQueues(client, selectQueues(queues, opts.queue), {
        logSink: createLogSink(global.verbose ?? false),
        onResult: out.printResult,
      });
    }));
}
