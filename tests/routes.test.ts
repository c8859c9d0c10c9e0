import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { registerRoutes } from '../src/api/routes.js';
import { createGantry } from '../src/core/gantry.js';
import { fakeCollaborators, makeDb, silentLog } from './helpers.js';

async function makeApp() {
  const gantry = createGantry(
    makeDb(),
    silentLog(),
    {
      GANTRY_WORKER_ID: 'w1',
      GANTRY_POLL_INTERVAL_MS: 5,
      GANTRY_QUEUE_POLL_INTERVAL_MS: 5,
      GANTRY_MAX_CHUNK_ATTEMPTS: 3,
      GANTRY_PROGRESS_QUEUE_SIZE: 100
    },
    fakeCollaborators()
  );
  const app = Fastify();
  await registerRoutes(app, gantry);
  return { app, gantry };
}

describe('HTTP API', () => {
  it('submits a task and reads its summary', async () => {
    const { app } = await makeApp();

    const created = await app.inject({
      method: 'POST',
      url: '/api/tasks',
      payload: { targetPath: '/work/repo', featureDescription: 'Add dark mode' }
    });
    expect(created.statusCode).toBe(201);
    const task = created.json();
    expect(task.ok).toBe(true);
    expect(task.data.status).toBe('queued');

    const summary = await app.inject({ method: 'GET', url: `/api/tasks/${task.data.id}` });
    expect(summary.statusCode).toBe(200);
    expect(summary.json().data).toMatchObject({
      taskId: task.data.id,
      currentPhase: 'Queued',
      progressPercentage: 0,
      chunks: []
    });

    const list = await app.inject({ method: 'GET', url: '/api/tasks?status=queued' });
    expect(list.json().data.map((t: { id: string }) => t.id)).toEqual([task.data.id]);
  });

  it('rejects an invalid submission', async () => {
    const { app } = await makeApp();
    const res = await app.inject({ method: 'POST', url: '/api/tasks', payload: { targetPath: '' } });

    expect(res.statusCode).toBe(400);
    expect(res.json().ok).toBe(false);
    expect(res.json().error).toBe('invalid_request');
  });

  it('returns 404 for unknown tasks', async () => {
    const { app } = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/tasks/unknown-task' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'Task not found: unknown-task' });
  });

  it('cancels a task once', async () => {
    const { app, gantry } = await makeApp();
    const task = gantry.orchestrator.submit('/work/repo', 'Add dark mode');

    const first = await app.inject({ method: 'POST', url: `/api/tasks/${task.id}/cancel` });
    expect(first.statusCode).toBe(200);
    expect(first.json().data.status).toBe('cancelled');

    const again = await app.inject({ method: 'POST', url: `/api/tasks/${task.id}/cancel` });
    expect(again.statusCode).toBe(409);
    expect(again.json().error).toBe(`Task ${task.id} is already cancelled`);

    const progress = await app.inject({ method: 'GET', url: `/api/tasks/${task.id}/progress` });
    expect(progress.json().data.map((e: { type: string }) => e.type)).toEqual(['task_cancelled', 'task_started']);
  });

  it('lists chunks, locks and events', async () => {
    const { app, gantry } = await makeApp();
    gantry.store.createChunks('t1', [{ id: 'A', description: 'A', files: ['a.ts'], dependencies: [] }]);
    gantry.store.acquire('w1', 't1_A', ['a.ts']);
    await gantry.events.publish('file.locked', 'coordinator', { taskId: 't1', chunkId: 't1_A', files: ['a.ts'] });

    const chunks = await app.inject({ method: 'GET', url: '/api/chunks?taskId=t1' });
    expect(chunks.json().data.map((c: { id: string }) => c.id)).toEqual(['t1_A']);

    const locks = await app.inject({ method: 'GET', url: '/api/locks' });
    expect(locks.json().data).toEqual([
      expect.objectContaining({ filePath: 'a.ts', actor: 'w1', chunkId: 't1_A' })
    ]);

    const events = await app.inject({ method: 'GET', url: '/api/events?type=file.locked' });
    expect(events.json().data[0].payload).toEqual({ taskId: 't1', chunkId: 't1_A', files: ['a.ts'] });

    const bad = await app.inject({ method: 'GET', url: '/api/events?type=not.a.type' });
    expect(bad.statusCode).toBe(400);
  });

  it('reports orchestrator status', async () => {
    const { app } = await makeApp();
    const res = await app.inject({ method: 'GET', url: '/api/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json().data).toMatchObject({ running: false, currentTaskId: null, activeTasks: 0 });
  });
});
