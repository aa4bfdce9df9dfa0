import { Command } from 'commander';
import chalk from 'chalk';
import { loadQueueConfig } from '@chore-queue/core';
import * as out from '../output.js';
import { $try, globalOptions } from '../helpers.js';

export function createQueuesCommand(): Command {
  return new Command('queues')
    .description('List the configured queues')
    .action((_opts: unknown, cmd: Command) => $try(async () => {
      const { queues, source } = loadQueueConfig({ path: globalOptions(cmd).config });

      console.log(chalk.bold.underline('Queues'));
      console.log();
      for (const queue of queues) console.log(out.formatQueueConfig(queue));
      console.log();
      out.info(chalk.dim(source ? `from ${source}` : 'from PROJECT_NAME (no config file)'));
    }));
}
