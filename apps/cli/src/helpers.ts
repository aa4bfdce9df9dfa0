/**
 * CLI helpers: global options, queue selection, logging, error handling.
 */

import type { Command } from 'commander';
import { ConfigError, TodoistClient } from '@chore-queue/core';
import type { LogSink, QueueConfig } from '@chore-queue/core';
import * as out from './output.js';

export type GlobalOptions = {
  config?: string;
  token?: string;
  apiUrl?: string;
  verbose?: boolean;
};

/** A failure no queue can recover from; the process exits non-zero */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

export function globalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

export function requireToken(opts: GlobalOptions): string {
  const token = opts.token?.trim();
  if (!token) throw new FatalError('error: set TODOIST_TOKEN');
  return token;
}

/** Debug lines only with --verbose; warnings always */
export function createLogSink(verbose: boolean): LogSink {
  return (level, line) => {
    if (level === 'warn') out.warning(line);
    else if (verbose) out.debug(line);
  };
}

export function createClient(opts: GlobalOptions): TodoistClient {
  return new TodoistClient({
    token: requireToken(opts),
    baseUrl: opts.apiUrl,
    logSink: createLogSink(opts.verbose ?? false),
  });
}

/**
 * Restrict the configured queues to the requested names (case-insensitive),
 * keeping configuration order. No names means every queue.
 */
export function selectQueues(queues: readonly QueueConfig[], names: readonly string[] | undefined): QueueConfig[] {
  if (!names || names.length === 0) return [...queues];
  const wanted = new Set(names.map((n) => n.trim().toLowerCase()));
  const selected = queues.filter((q) => wanted.has(q.queueName.trim().toLowerCase()));
  const known = new Set(selected.map((q) => q.queueName.trim().toLowerCase()));
  const unknown = [...wanted].filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new FatalError(`error: no configured queue named '${unknown.join("', '")}'`);
  }
  return selected;
}

/**
 * Wrap a command action with error handling. Fatal and config errors are
 * printed and set a non-zero exit code; anything else is rethrown.
 */
export async function $try(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (err instanceof FatalError) {
      out.fatal(err.message);
    } else if (err instanceof ConfigError) {
      out.fatal(`error: ${err.message}`);
    } else {
      throw err;
    }
    process.exitCode = 1;
  }
}
