import { describe, it, expect } from 'vitest';
import { Coordinator } from '../src/core/coordinator.js';
import type { CoordinatorResult } from '../src/core/coordinator.js';
import { CollaboratorError } from '../src/core/errors.js';
import { EventLog } from '../src/core/events.js';
import { ProgressPublisher } from '../src/core/progress.js';
import { LockStore } from '../src/core/store.js';
import { TaskManager } from '../src/core/tasks.js';
import type { ChunkPlan } from '../src/core/types.js';
import { ChunkWorker } from '../src/core/worker.js';
import { FakeGenerator, FakeIntegrator, FakeWorkspace, Gate, makeDb, plan, silentLog } from './helpers.js';

function setup(plans: ChunkPlan[], maxChunkAttempts = 3) {
  const db = makeDb();
  const log = silentLog();
  const events = new EventLog(db, log);
  const store = new LockStore(db, log);
  const tasks = new TaskManager(db, log);
  const progress = new ProgressPublisher(db, log, { tasks, store });
  const generator = new FakeGenerator();
  const integrator = new FakeIntegrator();

  const task = tasks.submit('/work/repo', 'Add export');
  tasks.transition(task.id, 'processing_chunks');
  store.createChunks(task.id, plans);
  tasks.setTotalChunks(task.id, plans.length);

  const worker = new ChunkWorker(
    'w1',
    { events, store, tasks, generator, integrator, workspace: new FakeWorkspace() },
    log
  );
  worker.start();
  const coordinator = new Coordinator(
    task.id,
    { events, store, tasks, progress, integrator },
    { workerId: 'w1', pollIntervalMs: 5, maxChunkAttempts },
    log
  );
  coordinator.attach();

  const id = (planId: string) => `${task.id}_${planId}`;
  const statusOf = (planId: string) => store.getChunk(id(planId))?.status;

  async function runToEnd(maxCycles = 20): Promise<CoordinatorResult | null> {
    for (let i = 0; i < maxCycles; i++) {
      const result = await coordinator.runCycle();
      await worker.drain();
      if (result) return result;
    }
    return coordinator.stopped;
  }

  return { events, store, tasks, progress, generator, integrator, worker, coordinator, task, id, statusOf, runToEnd };
}

describe('Coordinator', () => {
  it('keeps chunks with overlapping files apart and merges in dependency order', async () => {
    const t = setup([plan('A', ['a.py', 'b.py']), plan('B', ['b.py', 'c.py']), plan('C', ['d.py'], ['A'])]);
    const gate = new Gate();
    t.generator.gate = gate.promise;

    await t.coordinator.runCycle();

    expect(t.statusOf('A')).toBe('in_progress');
    expect(t.statusOf('B')).toBe('planned');
    expect(t.statusOf('C')).toBe('planned');
    expect(t.store.listLocks().map((l) => [l.filePath, l.chunkId])).toEqual([
      ['a.py', t.id('A')],
      ['b.py', t.id('A')]
    ]);

    gate.open();
    await t.worker.drain();
    expect(t.statusOf('A')).toBe('complete');
    expect(t.store.listLocks()).toEqual([]);

    const result = await t.runToEnd();
    expect(result).toEqual({ reason: 'completed' });
    expect(t.store.listChunks({ taskId: t.task.id }).map((c) => c.status)).toEqual(['merged', 'merged', 'merged']);

    const task = t.tasks.get(t.task.id);
    expect(task?.status).toBe('merging');
    expect(task?.completedChunks).toBe(3);
    expect([...(task?.integrationHandles ?? [])].sort()).toEqual([`pr-${t.id('A')}`, `pr-${t.id('B')}`, `pr-${t.id('C')}`].sort());

    const merged = t.events
      .query({ type: 'integration.completed' })
      .reverse()
      .map((e) => e.payload.chunkId);
    expect(merged.indexOf(t.id('A'))).toBeLessThan(merged.indexOf(t.id('C')));

    // B only got b.py after A gave it back.
    const unlockA = t.events.query({ type: 'file.unlocked' }).find((e) => e.payload.chunkId === t.id('A'));
    const lockB = t.events.query({ type: 'file.locked' }).find((e) => e.payload.chunkId === t.id('B'));
    expect(lockB?.seq).toBeGreaterThan(unlockA?.seq ?? Number.POSITIVE_INFINITY);

    expect(t.events.query({ type: 'feature.completed' })).toHaveLength(1);
    expect(t.progress.getTaskEvents(t.task.id).map((e) => e.type)).toContain('merging_started');
  });

  it('retries a chunk after a retryable failure', async () => {
    const t = setup([plan('A', ['a.py'])]);
    t.generator.failures.set(t.id('A'), [new CollaboratorError('generator busy', true)]);

    const result = await t.runToEnd();

    expect(result).toEqual({ reason: 'completed' });
    const chunk = t.store.getChunk(t.id('A'));
    expect(chunk?.status).toBe('merged');
    expect(chunk?.attempts).toBe(1);
    expect(chunk?.lastError).toBe('generator busy');
    expect(t.generator.calls).toEqual([t.id('A'), t.id('A')]);
    expect(t.store.listLocks()).toEqual([]);
  });

  it('stops with a failure when an error is not retryable', async () => {
    const t = setup([plan('A', ['a.py'])]);
    t.generator.failures.set(t.id('A'), [new CollaboratorError('unsupported language', false)]);

    const result = await t.runToEnd();

    expect(result).toEqual({
      reason: 'failed',
      error: `Chunk ${t.id('A')} failed after 1 attempt(s): unsupported language`
    });
    expect(t.statusOf('A')).toBe('planned');
    expect(t.store.listLocks()).toEqual([]);
  });

  it('gives up once the attempt budget is spent', async () => {
    const t = setup([plan('A', ['a.py'])], 2);
    t.generator.failures.set(t.id('A'), [new Error('flaky'), new Error('flaky')]);

    const result = await t.runToEnd();

    expect(result).toEqual({ reason: 'failed', error: `Chunk ${t.id('A')} failed after 2 attempt(s): flaky` });
    expect(t.generator.calls).toHaveLength(2);
  });

  it('holds back a merge until its dependencies are merged', async () => {
    const t = setup([plan('A', ['a.py']), plan('B', ['b.py'], ['A'])]);
    t.integrator.refuse.add(`pr-${t.id('A')}`);

    for (let i = 0; i < 4; i++) {
      await t.coordinator.runCycle();
      await t.worker.drain();
    }

    expect(t.statusOf('A')).toBe('complete');
    expect(t.statusOf('B')).toBe('complete');
    expect(t.integrator.completed).toEqual([]);
    expect(t.tasks.get(t.task.id)?.status).toBe('merging');
    expect(t.coordinator.stopped).toBeNull();

    t.integrator.refuse.clear();
    const result = await t.coordinator.runCycle();

    expect(result).toEqual({ reason: 'completed' });
    expect(t.integrator.completed).toEqual([`pr-${t.id('A')}`, `pr-${t.id('B')}`]);
  });

  it('ends when the task is cancelled', async () => {
    const t = setup([plan('A', ['a.py'])]);
    t.tasks.cancel(t.task.id);

    const result = await t.coordinator.runCycle();

    expect(result).toEqual({ reason: 'cancelled' });
    expect(t.statusOf('A')).toBe('planned');
    expect(t.worker.busy).toBe(0);
  });

  it('returns from run once stopped', async () => {
    const t = setup([plan('A', ['a.py'])]);
    t.integrator.refuse.add(`pr-${t.id('A')}`);

    const running = t.coordinator.run();
    setTimeout(() => t.coordinator.stop(), 20);

    await expect(running).resolves.toEqual({ reason: 'stopped' });
    await t.worker.drain();
  });
});
