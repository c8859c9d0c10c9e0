import type { Logger } from 'pino';
import type { Integrator } from './collaborators.js';
import { errorMessage } from './errors.js';
import type { EventLog } from './events.js';
import type { ProgressPublisher } from './progress.js';
import { availableChunks, mergeEligibleChunks, pendingDependencies, summarizeStatuses } from './scheduler.js';
import type { LockStore } from './store.js';
import type { TaskManager } from './tasks.js';
import { isTerminal } from './types.js';
import type { BusEvent, Chunk, ChunkId, TaskId } from './types.js';

export type StopReason = 'completed' | 'cancelled' | 'failed' | 'stopped';

export interface CoordinatorResult {
  reason: StopReason;
  error?: string;
}

export interface CoordinatorDeps {
  events: EventLog;
  store: LockStore;
  tasks: TaskManager;
  progress: ProgressPublisher;
  integrator: Integrator;
}

export interface CoordinatorOptions {
  workerId: string;
  pollIntervalMs: number;
  maxChunkAttempts: number;
}

// One scheduling attempt for a planned chunk. `attempting` covers the lock
// acquisition; contention sends the chunk back to planned for the next poll.
type AttemptState = 'planned' | 'attempting' | 'in_progress';

const ATTEMPT_TRANSITIONS: Record<AttemptState, readonly AttemptState[]> = {
  planned: ['attempting'],
  attempting: ['in_progress', 'planned'],
  in_progress: []
};

function advance<T extends AttemptState>(from: AttemptState, to: T): T {
  if (!ATTEMPT_TRANSITIONS[from].includes(to)) {
    throw new Error(`Illegal attempt transition: ${from} -> ${to}`);
  }
  return to;
}

export interface AttemptOutcome {
  chunkId: ChunkId;
  state: Exclude<AttemptState, 'attempting'>;
}

export const COORDINATOR_ACTOR = 'coordinator';

/**
 * Drives one task's chunks to integration. Each cycle assigns available
 * chunks, merges complete chunks whose dependencies are merged, and checks
 * whether the task is done. Workers report back through `chunk.completed`
 * and `chunk.failed`.
 */
export class Coordinator {
  private result: CoordinatorResult | null = null;
  private unsubscribers: Array<() => void> = [];
  private wake: (() => void) | null = null;

  constructor(
    readonly taskId: TaskId,
    private deps: CoordinatorDeps,
    private opts: CoordinatorOptions,
    private log: Logger
  ) {}

  attach(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers.push(
      this.deps.events.subscribe('chunk.completed', (e) => this.onChunkCompleted(e)),
      this.deps.events.subscribe('chunk.failed', (e) => this.onChunkFailed(e))
    );
  }

  detach(): void {
    for (const off of this.unsubscribers.splice(0)) off();
  }

  get stopped(): CoordinatorResult | null {
    return this.result;
  }

  /** Polls until the task completes, fails, is cancelled or `stop` is called. */
  async run(): Promise<CoordinatorResult> {
    this.attach();
    try {
      for (;;) {
        try {
          await this.runCycle();
        } catch (err) {
          this.log.error({ err, taskId: this.taskId }, 'cycle.failed');
        }
        const done = this.result;
        if (done) return done;
        await this.sleep(this.opts.pollIntervalMs);
      }
    } finally {
      this.detach();
    }
  }

  stop(): void {
    this.finish({ reason: 'stopped' });
  }

  /** One scheduling pass. Returns the stop result once the loop should end. */
  async runCycle(): Promise<CoordinatorResult | null> {
    if (this.result) return this.result;

    const task = this.deps.tasks.get(this.taskId);
    if (!task) return this.finish({ reason: 'failed', error: `Task ${this.taskId} no longer exists` });
    if (isTerminal(task.status)) {
      return this.finish({ reason: task.status, error: task.errorMessage ?? undefined });
    }

    await this.assignAvailable();
    await this.coordinateMerging();

    const chunks = this.deps.store.listChunks({ taskId: this.taskId });
    if (chunks.length === 0) return this.result;

    const counts = summarizeStatuses(chunks);
    if (task.status === 'processing_chunks' && counts.planned === 0 && counts.in_progress === 0) {
      if (this.deps.tasks.transition(this.taskId, 'merging')) {
        this.deps.progress.publishProgress(
          this.taskId,
          'merging_started',
          { complete: counts.complete, merged: counts.merged },
          'All chunks produced; merging remaining integrations'
        );
      }
    }

    if (counts.merged === chunks.length) {
      await this.deps.events.publish('feature.completed', COORDINATOR_ACTOR, {
        taskId: this.taskId,
        mergedChunks: counts.merged
      });
      this.log.info({ taskId: this.taskId, chunks: chunks.length }, 'feature.completed');
      return this.finish({ reason: 'completed' });
    }

    if (this.result === null) {
      this.log.debug({ taskId: this.taskId, counts, waiting: Object.fromEntries(pendingDependencies(chunks)) }, 'cycle.idle');
    }
    return this.result;
  }

  private async assignAvailable(): Promise<AttemptOutcome[]> {
    const chunks = this.deps.store.listChunks({ taskId: this.taskId });
    const available = availableChunks(chunks, this.deps.store.listLocks());
    const outcomes: AttemptOutcome[] = [];
    for (const chunk of available) {
      if (this.result) break;
      outcomes.push(await this.attempt(chunk));
    }
    return outcomes;
  }

  private async attempt(chunk: Chunk): Promise<AttemptOutcome> {
    const worker = this.opts.workerId;
    let state: AttemptState = advance('planned', 'attempting');

    if (!this.deps.store.acquire(worker, chunk.id, chunk.files)) {
      state = advance(state, 'planned');
      this.log.debug({ taskId: this.taskId, chunkId: chunk.id }, 'chunk.deferred');
      return { chunkId: chunk.id, state };
    }

    try {
      this.deps.store.updateStatus(chunk.id, 'in_progress', { assignedWorker: worker });
    } catch (err) {
      this.deps.store.release(worker, chunk.id);
      throw err;
    }
    state = advance(state, 'in_progress');

    const ref = { taskId: this.taskId, chunkId: chunk.id };
    await this.deps.events.publish('file.locked', COORDINATOR_ACTOR, { ...ref, files: chunk.files });
    await this.deps.events.publish('chunk.assigned', COORDINATOR_ACTOR, {
      ...ref,
      description: chunk.description,
      files: chunk.files,
      assignedWorker: worker
    });
    this.log.info({ ...ref, worker }, 'chunk.assigned');
    return { chunkId: chunk.id, state };
  }

  /**
   * Integrates complete chunks whose dependencies are merged. A chunk merged
   * in this pass can make its dependents eligible within the same pass.
   */
  private async coordinateMerging(): Promise<void> {
    const tried = new Set<ChunkId>();
    for (;;) {
      const next = mergeEligibleChunks(this.deps.store.listChunks({ taskId: this.taskId })).find((c) => !tried.has(c.id));
      if (!next) return;
      tried.add(next.id);
      await this.integrate(next);
    }
  }

  private async integrate(chunk: Chunk): Promise<void> {
    const handle = chunk.integrationHandle;
    const ref = { taskId: this.taskId, chunkId: chunk.id };
    if (!handle) {
      this.log.warn(ref, 'chunk.missing_integration_handle');
      return;
    }

    await this.deps.events.publish('integration.requested', COORDINATOR_ACTOR, { ...ref, integrationHandle: handle });
    let merged: boolean;
    try {
      merged = await this.deps.integrator.completeIntegration(handle);
    } catch (err) {
      this.log.warn({ ...ref, handle, error: errorMessage(err) }, 'integration.failed');
      return;
    }
    if (!merged) {
      this.log.warn({ ...ref, handle }, 'integration.not_merged');
      return;
    }

    this.deps.store.updateStatus(chunk.id, 'merged');
    this.deps.tasks.recordIntegration(this.taskId, handle);
    await this.deps.events.publish('integration.completed', COORDINATOR_ACTOR, { ...ref, integrationHandle: handle });
    this.log.info({ ...ref, handle }, 'chunk.merged');
  }

  private onChunkCompleted(event: BusEvent<'chunk.completed'>): void {
    const { taskId, chunkId, integrationHandle } = event.payload;
    if (taskId !== this.taskId) return;

    const chunk = this.deps.store.getChunk(chunkId);
    if (!chunk || chunk.status !== 'in_progress') {
      this.log.warn({ taskId, chunkId, status: chunk?.status }, 'chunk.unexpected_completion');
      return;
    }
    this.deps.store.updateStatus(chunkId, 'complete', { integrationHandle });
  }

  private onChunkFailed(event: BusEvent<'chunk.failed'>): void {
    const { taskId, chunkId, error, retryable } = event.payload;
    if (taskId !== this.taskId) return;

    const current = this.deps.store.getChunk(chunkId);
    if (!current || current.status !== 'in_progress') {
      this.log.warn({ taskId, chunkId, status: current?.status }, 'chunk.unexpected_failure');
      return;
    }

    const chunk = this.deps.store.recordAttemptFailure(chunkId, error);
    if (!retryable || chunk.attempts >= this.opts.maxChunkAttempts) {
      this.log.error({ taskId, chunkId, attempts: chunk.attempts, error }, 'chunk.gave_up');
      this.finish({
        reason: 'failed',
        error: `Chunk ${chunkId} failed after ${chunk.attempts} attempt(s): ${error}`
      });
      return;
    }
    this.log.warn({ taskId, chunkId, attempts: chunk.attempts, error }, 'chunk.retry_scheduled');
  }

  private finish(result: CoordinatorResult): CoordinatorResult {
    if (!this.result) this.result = result;
    this.wake?.();
    return this.result;
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
