import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import websocket from '@fastify/websocket';

import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { openDb } from './infra/db.js';
import { createGantry } from './core/gantry.js';
import { registerRoutes } from './api/routes.js';
import { registerLiveProgress } from './api/live.js';
import { CommandGenerator, CommandIntegrator, CommandPlanner } from './infra/commandCollaborators.js';
import { FsWorkspace } from './infra/workspace.js';

async function main() {
  const cfg = loadConfig(process.env);
  const log = createLogger(cfg);
  const app = Fastify({ logger: log });

  await app.register(helmet, { global: true });
  await app.register(rateLimit, { max: cfg.GANTRY_RATE_LIMIT_RPM, timeWindow: '1 minute' });
  await app.register(websocket);

  const db = openDb(cfg);
  const opts = { timeoutMs: cfg.GANTRY_COLLABORATOR_TIMEOUT_MS };
  const gantry = createGantry(db, log, cfg, {
    planner: new CommandPlanner(cfg.GANTRY_PLANNER_CMD, opts),
    generator: new CommandGenerator(cfg.GANTRY_GENERATOR_CMD, opts),
    integrator: new CommandIntegrator(cfg.GANTRY_INTEGRATOR_CMD, opts),
    workspace: new FsWorkspace()
  });

  await registerRoutes(app, gantry);

  registerLiveProgress(app, gantry.progress);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down...');
    await gantry.orchestrator.stop();
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        log.error({ err, signal }, 'shutdown.failed');
        process.exit(1);
      });
    });
  }

  app.addHook('onClose', async () => {
    db.close();
  });

  const addr = await app.listen({ port: cfg.GANTRY_PORT, host: cfg.GANTRY_BIND });
  gantry.orchestrator.start();
  log.info({ addr }, 'Gantry listening');
}

main().catch((err) => {
  console.error('Failed to start Gantry:', err);
  process.exit(1);
});
