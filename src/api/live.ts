import type { FastifyInstance } from 'fastify';
import type {} from '@fastify/websocket';
import type WebSocket from 'ws';
import { z } from 'zod';
import type { ProgressPublisher } from '../core/progress.js';
import type { ProgressSubscription } from '../core/subscription.js';

const WsQuery = z.object({ taskId: z.string().min(4).optional() });

async function pump(sub: ProgressSubscription, socket: WebSocket) {
  for await (const evt of sub) {
    if (socket.readyState !== 1) break;
    socket.send(JSON.stringify({ type: 'progress', event: evt }));
  }
}

/** Live progress over `/ws`: every task, or one task with `?taskId=`. */
export function registerLiveProgress(app: FastifyInstance, progress: ProgressPublisher) {
  app.get(
    '/ws',
    {
      websocket: true,
      // A bad query is refused before the upgrade rather than widened to every task.
      preValidation: async (req, reply) => {
        const q = WsQuery.safeParse(req.query);
        if (!q.success) {
          return reply.code(400).send({
            ok: false,
            error: 'invalid_request',
            issues: q.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
          });
        }
      }
    },
    (socket, req) => {
      const { taskId } = WsQuery.parse(req.query);
      const sub = taskId ? progress.subscribe(taskId) : progress.subscribeAll();

      socket.send(JSON.stringify({ type: 'gantry.hello', taskId: taskId ?? null, ts: Date.now() }));
      socket.on('close', () => sub.close());
      pump(sub, socket).catch((err) => app.log.error({ err, taskId }, 'ws.pump_failed'));
    }
  );
}
