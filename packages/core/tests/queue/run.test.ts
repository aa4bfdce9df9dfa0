import { describe, it, expect, vi } from 'vitest';
import { runQueues } from '../../src/queue/run.js';
import type { QueueConfig, PromotionResult } from '../../src/types/queue.js';
import { FakeTaskService, makeTask, project } from '../helpers/fake-service.js';

function queue(queueName: string): QueueConfig {
  return { queueName, dueExpression: 'today', locale: 'en', promoteLabel: null, clearDueOnRest: true };
}

describe('runQueues', () => {
  it('processes queues in configuration order', async () => {
    const service = new FakeTaskService({
      projects: [project('k', 'kitchen'), project('b', 'bathroom')],
      tasks: [makeTask('01 oven', { projectId: 'k' }), makeTask('01 tub', { projectId: 'b' })],
    });

    const results = await runQueues(service, [queue('bathroom'), queue('kitchen'), queue('garage')]);

    expect(results.map((r) => [r.queueName, r.status])).toEqual([
      ['bathroom', 'ok'],
      ['kitchen', 'ok'],
      ['garage', 'project_not_found'],
    ]);
    const listed = service.calls.flatMap((c) => (c.op === 'listTasks' ? [c.projectId] : []));
    expect(listed).toEqual(['b', 'k']);
  });

  it('isolates a queue that throws', async () => {
    const service = new FakeTaskService({
      projects: [project('k', 'kitchen')],
      tasks: [makeTask('01 oven', { projectId: 'k' })],
    });
    const listProjects = service.listProjects.bind(service);
    vi.spyOn(service, 'listProjects')
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockImplementation(listProjects);

    const results = await runQueues(service, [queue('kitchen'), queue('kitchen')]);

    expect(results[0]).toEqual({ status: 'error', queueName: 'kitchen', errorDetail: 'socket hang up' });
    expect(results[1]?.status).toBe('ok');
  });

  it('reports each result as it is produced', async () => {
    const service = new FakeTaskService({ projects: [project('k', 'kitchen')] });
    const seen: PromotionResult[] = [];

    const results = await runQueues(service, [queue('kitchen'), queue('garage')], {
      onResult: (r) => seen.push(r),
    });

    expect(seen).toEqual(results);
    expect(seen.map((r) => r.status)).toEqual(['empty', 'project_not_found']);
  });

  it('returns nothing for no queues', async () => {
    expect(await runQueues(new FakeTaskService(), [])).toEqual([]);
  });
});
