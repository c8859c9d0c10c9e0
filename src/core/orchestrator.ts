import type { Logger } from 'pino';
import type { Collaborators } from './collaborators.js';
import { Coordinator } from './coordinator.js';
import type { CoordinatorResult } from './coordinator.js';
import { CollaboratorError, ConsistencyError, errorMessage } from './errors.js';
import type { EventLog } from './events.js';
import type { ProgressPublisher } from './progress.js';
import type { LockStore } from './store.js';
import type { TaskManager } from './tasks.js';
import type { BuiltinProgressType, EventPayloads, EventType, Task, TaskId, TaskStatus } from './types.js';
import { ChunkWorker } from './worker.js';

export interface OrchestratorDeps {
  events: EventLog;
  store: LockStore;
  tasks: TaskManager;
  progress: ProgressPublisher;
  collaborators: Collaborators;
}

export interface OrchestratorOptions {
  workerId: string;
  pollIntervalMs: number;
  queuePollIntervalMs: number;
  maxChunkAttempts: number;
}

type ProgressMirror = {
  [K in EventType]?: { progress: BuiltinProgressType; describe: (p: EventPayloads[K]) => string };
};

// Worker and coordinator events that are also shown to progress viewers.
const MIRRORS: ProgressMirror = {
  'chunk.started': {
    progress: 'chunk_processing_started',
    describe: (p) => `Chunk started: ${p.chunkId} - ${p.description} (files: ${p.files.join(', ')})`
  },
  'code_generation.started': {
    progress: 'code_generation_started',
    describe: (p) => `Code generation started: ${p.chunkId}`
  },
  'files.modified': {
    progress: 'files_modified',
    describe: (p) => `Files modified for ${p.chunkId}: ${p.modifiedFiles.length > 0 ? p.modifiedFiles.join(', ') : 'none'}`
  },
  'integration.opened': {
    progress: 'pr_created',
    describe: (p) => `Integration opened: ${p.integrationHandle} for ${p.chunkId}`
  },
  'integration.completed': {
    progress: 'pr_merged',
    describe: (p) => `Integration merged: ${p.integrationHandle} for ${p.chunkId}`
  },
  'chunk.failed': {
    progress: 'error_occurred',
    describe: (p) => `Chunk ${p.chunkId} failed${p.retryable ? ' (will retry)' : ''}: ${p.error}`
  }
};

function toRecord(value: object): Record<string, unknown> {
  return { ...value };
}

function clip(s: string, max: number): string {
  return s.length <= max ? s : `${s.slice(0, max)}...`;
}

export const ORCHESTRATOR_ACTOR = 'orchestrator';

/**
 * Runs queued tasks one at a time: analysis, chunk planning, then a
 * coordinator until every chunk is merged. The current task lives on this
 * object, so several orchestrators over separate stores do not interfere.
 */
export class Orchestrator {
  private currentTaskId: TaskId | null = null;
  private coordinator: Coordinator | null = null;
  private running = false;
  private stopping = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private unsubscribers: Array<() => void> = [];
  readonly worker: ChunkWorker;

  constructor(
    private deps: OrchestratorDeps,
    private opts: OrchestratorOptions,
    private log: Logger
  ) {
    const { events, store, tasks, collaborators } = deps;
    this.worker = new ChunkWorker(
      opts.workerId,
      {
        events,
        store,
        tasks,
        generator: collaborators.generator,
        integrator: collaborators.integrator,
        workspace: collaborators.workspace
      },
      log.child({ component: 'worker', workerId: opts.workerId })
    );
  }

  get current(): TaskId | null {
    return this.currentTaskId;
  }

  get isRunning(): boolean {
    return this.running;
  }

  submit(targetPath: string, featureDescription: string): Task {
    const task = this.deps.tasks.submit(targetPath, featureDescription);
    this.deps.progress.publishProgress(
      task.id,
      'task_started',
      { targetPath, featureDescription },
      `Task submitted: ${clip(featureDescription, 100)}`
    );
    this.wake?.();
    return task;
  }

  cancel(taskId: TaskId): boolean {
    const ok = this.deps.tasks.cancel(taskId);
    if (ok) {
      this.deps.progress.publishProgress(taskId, 'task_cancelled', {}, 'Task cancelled by user');
    }
    return ok;
  }

  /** Subscribes the worker and the progress mirrors without starting the queue loop. */
  attach(): void {
    if (this.unsubscribers.length > 0) return;
    this.worker.start();
    this.unsubscribers.push(
      this.mirror('chunk.started'),
      this.mirror('code_generation.started'),
      this.mirror('files.modified'),
      this.mirror('integration.opened'),
      this.mirror('integration.completed'),
      this.mirror('chunk.failed'),
      () => this.worker.stop()
    );
  }

  detach(): void {
    for (const off of this.unsubscribers.splice(0)) off();
  }

  start(): void {
    if (this.running) return;
    this.attach();
    this.running = true;
    this.stopping = false;
    this.loop = this.processQueue();
    this.log.info({ workerId: this.opts.workerId }, 'orchestrator.started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopping = true;
    this.coordinator?.stop();
    this.wake?.();
    await this.loop;
    this.loop = null;
    await this.worker.drain();
    this.detach();
    this.log.info('orchestrator.stopped');
  }

  /**
   * Picks the oldest queued task and runs it to a terminal state, unless a
   * task is already current. Returns the task it picked.
   */
  async processNext(): Promise<Task | null> {
    if (this.currentTaskId) return null;
    const task = this.deps.tasks.nextQueued();
    if (!task) return null;

    this.currentTaskId = task.id;
    try {
      await this.processTask(task);
    } catch (err) {
      this.log.error({ err, taskId: task.id }, 'task.processing_failed');
      this.failTask(task.id, errorMessage(err), err instanceof ConsistencyError ? { issues: err.issues } : {});
    } finally {
      this.currentTaskId = null;
    }
    return this.deps.tasks.get(task.id);
  }

  status() {
    const { chunks, locks } = this.deps.store.counts();
    return {
      running: this.running,
      currentTaskId: this.currentTaskId,
      activeTasks: this.deps.tasks.listActive().length,
      chunks,
      locks,
      workerBusy: this.worker.busy
    };
  }

  private async processQueue(): Promise<void> {
    while (this.running) {
      let picked: Task | null = null;
      try {
        picked = await this.processNext();
      } catch (err) {
        this.log.error({ err }, 'queue.poll_failed');
      }
      if (!picked && this.running) await this.sleep(this.opts.queuePollIntervalMs);
    }
  }

  private async processTask(task: Task): Promise<void> {
    const { events, store, tasks, progress, collaborators } = this.deps;
    const taskId = task.id;
    const log = this.log.child({ taskId });

    if (!this.advance(taskId, 'analyzing')) return;
    progress.publishProgress(taskId, 'feature_analysis_started', {}, 'Analyzing feature');

    const structure = await collaborators.workspace.listFiles(task.targetPath);
    await events.publish('feature.analyze_requested', ORCHESTRATOR_ACTOR, {
      taskId,
      featureDescription: task.featureDescription,
      fileCount: structure.length
    });
    const plans = await collaborators.planner.decompose(task.featureDescription, structure);
    if (plans.length === 0) throw new CollaboratorError('Planner returned no chunks', false);
    await events.publish('feature.analyzed', ORCHESTRATOR_ACTOR, { taskId, chunkCount: plans.length });
    progress.publishProgress(
      taskId,
      'feature_analysis_completed',
      { chunkCount: plans.length },
      `Feature analyzed into ${plans.length} chunk(s)`
    );

    if (!this.advance(taskId, 'chunking')) return;
    progress.publishProgress(taskId, 'chunking_started', {}, 'Planning chunks');
    const chunks = store.createChunks(taskId, plans);
    tasks.setTotalChunks(taskId, chunks.length);
    await events.publish('chunks.planned', ORCHESTRATOR_ACTOR, {
      taskId,
      totalChunks: chunks.length,
      chunkIds: chunks.map((c) => c.id)
    });
    progress.publishProgress(
      taskId,
      'chunking_completed',
      { totalChunks: chunks.length, chunkIds: chunks.map((c) => c.id) },
      `Planned ${chunks.length} chunk(s)`
    );

    if (!this.advance(taskId, 'processing_chunks')) return;
    const result = await this.coordinate(taskId);
    log.info({ reason: result.reason }, 'task.coordinator_finished');

    switch (result.reason) {
      case 'completed':
        if (tasks.transition(taskId, 'completed')) {
          progress.publishProgress(taskId, 'task_completed', {}, 'Feature implementation completed successfully');
        }
        break;
      case 'failed':
        this.failTask(taskId, result.error ?? 'Coordinator failed');
        break;
      case 'stopped':
        this.haltTask(taskId);
        break;
      case 'cancelled':
        break;
    }
  }

  private async coordinate(taskId: TaskId): Promise<CoordinatorResult> {
    const coordinator = new Coordinator(
      taskId,
      {
        events: this.deps.events,
        store: this.deps.store,
        tasks: this.deps.tasks,
        progress: this.deps.progress,
        integrator: this.deps.collaborators.integrator
      },
      {
        workerId: this.opts.workerId,
        pollIntervalMs: this.opts.pollIntervalMs,
        maxChunkAttempts: this.opts.maxChunkAttempts
      },
      this.log.child({ component: 'coordinator', taskId })
    );
    this.coordinator = coordinator;
    if (this.stopping) coordinator.stop();
    try {
      return await coordinator.run();
    } finally {
      this.coordinator = null;
    }
  }

  /**
   * False when the task went terminal underneath us (typically a cancel), or
   * when the orchestrator is shutting down, in which case the task is halted.
   */
  private advance(taskId: TaskId, status: TaskStatus): boolean {
    if (this.stopping) {
      this.haltTask(taskId);
      return false;
    }
    return this.deps.tasks.transition(taskId, status);
  }

  // Only queued tasks are picked up after a restart; a task cut off by shutdown ends cancelled.
  private haltTask(taskId: TaskId): void {
    if (!this.deps.tasks.transition(taskId, 'cancelled', { errorMessage: 'Orchestrator stopped' })) return;
    this.deps.progress.publishProgress(taskId, 'task_cancelled', { reason: 'shutdown' }, 'Task cancelled: orchestrator stopped');
  }

  private failTask(taskId: TaskId, message: string, extra: Record<string, unknown> = {}): void {
    if (!this.deps.tasks.transition(taskId, 'failed', { errorMessage: message })) return;
    this.deps.progress.publishProgress(taskId, 'task_failed', { error: message, ...extra }, `Task failed: ${message}`);
  }

  private mirror<K extends EventType>(type: K): () => void {
    const rule = MIRRORS[type];
    if (!rule) return () => undefined;
    return this.deps.events.subscribe(type, (e) => {
      this.deps.progress.publishProgress(e.payload.taskId, rule.progress, toRecord(e.payload), rule.describe(e.payload));
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
