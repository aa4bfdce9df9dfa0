/**
 * Queue configuration: a JSON file of queues, or one queue from the environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import type { QueueConfig } from '../types/queue.js';

export const DEFAULT_CONFIG_FILE = 'chore-queue.json';
export const DEFAULT_PROJECT_NAME = 'chore queue';

export const QUEUE_DEFAULTS = {
  dueExpression: 'today',
  locale: 'en',
  promoteLabel: '@next',
  clearDueOnRest: true,
} as const;

export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

const QueueConfigSchema = z.object({
  queueName: z.string().trim().min(1, 'queueName must not be empty'),
  dueExpression: z.string().trim().min(1).default(QUEUE_DEFAULTS.dueExpression),
  locale: z.string().trim().min(1).default(QUEUE_DEFAULTS.locale),
  // null (or "") switches labeling off
  promoteLabel: z
    .string()
    .nullable()
    .default(QUEUE_DEFAULTS.promoteLabel)
    .transform((v) => (v && v.trim() ? v : null)),
  clearDueOnRest: z.boolean().default(QUEUE_DEFAULTS.clearDueOnRest),
});

const ConfigFileSchema = z.object({
  queues: z.array(QueueConfigSchema).min(1, 'at least one queue is required'),
});

export interface ConfigSource {
  /** Explicit --config path */
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface LoadedConfig {
  queues: QueueConfig[];
  /** File the queues came from; null when built from the environment */
  source: string | null;
}

/** Validate an already-parsed config document */
export function parseQueueConfig(data: unknown, path?: string): QueueConfig[] {
  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue?.message ?? 'invalid config'}`, path);
  }
  return parsed.data.queues;
}

/** One queue named by $PROJECT_NAME with every other setting at its default */
export function queueFromEnv(env: NodeJS.ProcessEnv): QueueConfig {
  const name = env['PROJECT_NAME']?.trim();
  return {
    queueName: name || DEFAULT_PROJECT_NAME,
    ...QUEUE_DEFAULTS,
  };
}

/**
 * Lookup order: explicit path, $CHORE_QUEUE_CONFIG, ./chore-queue.json, environment.
 * An explicit path that does not exist is an error; a missing default file is not.
 */
export function loadQueueConfig(source: ConfigSource = {}): LoadedConfig {
  const env = source.env ?? process.env;
  const cwd = source.cwd ?? process.cwd();

  const explicit = source.path ?? env['CHORE_QUEUE_CONFIG'];
  const filePath = explicit ? resolve(cwd, explicit) : join(cwd, DEFAULT_CONFIG_FILE);

  if (!existsSync(filePath)) {
    if (explicit) throw new ConfigError('config file not found', filePath);
    return { queues: [queueFromEnv(env)], source: null };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err: unknown) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), filePath);
  }

  return { queues: parseQueueConfig(data, filePath), source: filePath };
}
