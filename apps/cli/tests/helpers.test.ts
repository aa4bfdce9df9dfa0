import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';
import { ConfigError } from '@chore-queue/core';
import type { QueueConfig } from '@chore-queue/core';
import { $try, FatalError, createLogSink, requireToken, selectQueues } from '../src/helpers.js';

chalk.level = 0;

function queue(queueName: string): QueueConfig {
  return { queueName, dueExpression: 'today', locale: 'en', promoteLabel: null, clearDueOnRest: true };
}

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('requireToken', () => {
  it('returns the trimmed token', () => {
    expect(requireToken({ token: ' test-token ' })).toBe('test-token');
  });

  it('fails without a token', () => {
    expect(() => requireToken({})).toThrow(FatalError);
    expect(() => requireToken({ token: '  ' })).toThrow('error: set TODOIST_TOKEN');
  });
});

describe('selectQueues', () => {
  const queues = [queue('kitchen'), queue('Chores/Bathroom'), queue('garden')];

  it('returns every queue when none are named', () => {
    expect(selectQueues(queues, undefined)).toEqual(queues);
    expect(selectQueues(queues, [])).toEqual(queues);
  });

  it('keeps configuration order and ignores case', () => {
    expect(selectQueues(queues, ['garden', 'chores/bathroom']).map((q) => q.queueName))
      .toEqual(['Chores/Bathroom', 'garden']);
  });

  it('rejects names that are not configured', () => {
    expect(() => selectQueues(queues, ['kitchen', 'attic'])).toThrow("error: no configured queue named 'attic'");
  });
});

describe('createLogSink', () => {
  it('drops debug lines unless verbose', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogSink(false)('debug', '[TODOIST]: GET /projects');
    expect(err).not.toHaveBeenCalled();

    createLogSink(true)('debug', '[TODOIST]: GET /projects');
    expect(err).toHaveBeenCalledWith('[TODOIST]: GET /projects');
  });

  it('always prints warnings to stderr', () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogSink(false)('warn', '[QUEUE]: could not label');
    expect(err).toHaveBeenCalledWith('[QUEUE]: could not label');
  });
});

describe('$try', () => {
  it('prints fatal errors and sets the exit code', async () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    await $try(async () => {
      throw new FatalError('error: set TODOIST_TOKEN');
    });
    expect(err).toHaveBeenCalledWith('error: set TODOIST_TOKEN');
    expect(process.exitCode).toBe(1);
  });

  it('prints config errors', async () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    await $try(async () => {
      throw new ConfigError('config file not found', '/tmp/q.json');
    });
    expect(err).toHaveBeenCalledWith('error: /tmp/q.json: config file not found');
    expect(process.exitCode).toBe(1);
  });

  it('rethrows anything else', async () => {
    await expect($try(async () => {
      throw new TypeError('boom');
    })).rejects.toThrow('boom');
    expect(process.exitCode).toBeUndefined();
  });
});
