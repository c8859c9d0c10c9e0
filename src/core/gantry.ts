import type { Logger } from 'pino';
import type { GantryDb } from '../infra/db.js';
import type { Collaborators } from './collaborators.js';
import type { GantryConfig } from './config.js';
import { EventLog } from './events.js';
import { Orchestrator } from './orchestrator.js';
import { ProgressPublisher } from './progress.js';
import { LockStore } from './store.js';
import { TaskManager } from './tasks.js';

export interface Gantry {
  events: EventLog;
  store: LockStore;
  tasks: TaskManager;
  progress: ProgressPublisher;
  orchestrator: Orchestrator;
}

export type GantrySettings = Pick<
  GantryConfig,
  | 'GANTRY_WORKER_ID'
  | 'GANTRY_POLL_INTERVAL_MS'
  | 'GANTRY_QUEUE_POLL_INTERVAL_MS'
  | 'GANTRY_MAX_CHUNK_ATTEMPTS'
  | 'GANTRY_PROGRESS_QUEUE_SIZE'
>;

/** Wires every component over one store. Nothing runs until `orchestrator.start()`. */
export function createGantry(db: GantryDb, log: Logger, cfg: GantrySettings, collaborators: Collaborators): Gantry {
  const events = new EventLog(db, log.child({ component: 'events' }));
  const store = new LockStore(db, log.child({ component: 'store' }));
  const tasks = new TaskManager(db, log.child({ component: 'tasks' }));
  const progress = new ProgressPublisher(
    db,
    log.child({ component: 'progress' }),
    { tasks, store },
    { queueSize: cfg.GANTRY_PROGRESS_QUEUE_SIZE }
  );
  const orchestrator = new Orchestrator(
    { events, store, tasks, progress, collaborators },
    {
      workerId: cfg.GANTRY_WORKER_ID,
      pollIntervalMs: cfg.GANTRY_POLL_INTERVAL_MS,
      queuePollIntervalMs: cfg.GANTRY_QUEUE_POLL_INTERVAL_MS,
      maxChunkAttempts: cfg.GANTRY_MAX_CHUNK_ATTEMPTS
    },
    log.child({ component: 'orchestrator' })
  );
  return { events, store, tasks, progress, orchestrator };
}
