import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { EventTypeSchema } from '../core/events.js';
import type { Gantry } from '../core/gantry.js';
import { CHUNK_STATUSES, TASK_STATUSES } from '../core/types.js';

const TaskSubmitBody = z.object({
  targetPath: z.string().min(1).describe('Directory the feature is implemented in'),
  featureDescription: z.string().min(1).max(20000)
});

const TaskParams = z.object({ id: z.string().min(4) });

const TaskListQuery = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

const ChunkListQuery = z.object({
  taskId: z.string().optional(),
  status: z.enum(CHUNK_STATUSES).optional()
});

const LockListQuery = z.object({ actor: z.string().optional() });

const EventListQuery = z.object({
  type: EventTypeSchema.optional(),
  actor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(200)
});

const ProgressQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).optional()
});

export async function registerRoutes(app: FastifyInstance, gantry: Gantry) {
  const { tasks, store, events, progress, orchestrator } = gantry;

  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof z.ZodError) {
      return reply.code(400).send({
        ok: false,
        error: 'invalid_request',
        issues: err.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
      });
    }
    app.log.error({ err }, 'request.failed');
    return reply.code(err.statusCode ?? 500).send({ ok: false, error: err.message });
  });

  app.get('/api/status', async () => ({ ok: true, data: orchestrator.status() }));

  app.post('/api/tasks', async (req, reply) => {
    const body = TaskSubmitBody.parse(req.body);
    const task = orchestrator.submit(body.targetPath, body.featureDescription);
    return reply.code(201).send({ ok: true, data: task });
  });

  app.get('/api/tasks', async (req) => {
    const q = TaskListQuery.parse(req.query);
    return { ok: true, data: tasks.list(q) };
  });

  app.get('/api/tasks/:id', async (req, reply) => {
    const { id } = TaskParams.parse(req.params);
    const summary = progress.getSummary(id);
    if (!summary) return reply.code(404).send({ ok: false, error: `Task not found: ${id}` });
    return { ok: true, data: summary };
  });

  app.post('/api/tasks/:id/cancel', async (req, reply) => {
    const { id } = TaskParams.parse(req.params);
    const task = tasks.get(id);
    if (!task) return reply.code(404).send({ ok: false, error: `Task not found: ${id}` });
    if (!orchestrator.cancel(id)) {
      return reply.code(409).send({ ok: false, error: `Task ${id} is already ${task.status}` });
    }
    return { ok: true, data: tasks.get(id) };
  });

  app.get('/api/tasks/:id/progress', async (req, reply) => {
    const { id } = TaskParams.parse(req.params);
    const q = ProgressQuery.parse(req.query);
    if (!tasks.get(id)) return reply.code(404).send({ ok: false, error: `Task not found: ${id}` });
    return { ok: true, data: progress.getTaskEvents(id, q.limit) };
  });

  app.get('/api/chunks', async (req) => {
    const q = ChunkListQuery.parse(req.query);
    return { ok: true, data: store.listChunks(q) };
  });

  app.get('/api/locks', async (req) => {
    const q = LockListQuery.parse(req.query);
    return { ok: true, data: store.listLocks(q.actor) };
  });

  app.get('/api/events', async (req) => {
    const q = EventListQuery.parse(req.query);
    return { ok: true, data: events.query(q) };
  });
}
