#!/usr/bin/env node

import { Command, Option } from 'commander';

import { createRunCommand } from './commands/run.js';
import { createOrderCommand } from './commands/order.js';
import { createQueuesCommand } from './commands/queues.js';

// Build the CLI program
const program = new Command()
  .name('chore-queue')
  .description('Keep exactly one task due in each Todoist chore queue')
  .version('1.0.0')
  .option('-c, --config <path>', 'Queue config file (default: ./chore-queue.json)')
  .addOption(new Option('--token <token>', 'Todoist API token').env('TODOIST_TOKEN'))
  .addOption(new Option('--api-url <url>', 'Todoist REST base URL').env('TODOIST_API_URL'))
  .option('-v, --verbose', 'Log every request');

// Register commands
program.addCommand(createRunCommand(), { isDefault: true });
program.addCommand(createOrderCommand());
program.addCommand(createQueuesCommand());

await program.parseAsync();
