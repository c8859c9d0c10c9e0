import type { Logger } from 'pino';
import type { CodeGenerator, Integrator, Workspace } from './collaborators.js';
import { CollaboratorError, NotFoundError, errorMessage } from './errors.js';
import type { EventLog } from './events.js';
import type { LockStore } from './store.js';
import type { TaskManager } from './tasks.js';
import type { BusEvent, Chunk, ChunkId } from './types.js';

export interface ChunkWorkerDeps {
  events: EventLog;
  store: LockStore;
  tasks: TaskManager;
  generator: CodeGenerator;
  integrator: Integrator;
  workspace: Workspace;
}

type Outcome =
  | { kind: 'completed'; integrationHandle: string }
  | { kind: 'failed'; error: string; retryable: boolean };

/**
 * Picks up `chunk.assigned` events addressed to its id, produces the change
 * and opens an integration for it. The coordinator has already taken the
 * chunk's file locks under this worker's id; the worker always gives them
 * back before reporting the outcome.
 */
export class ChunkWorker {
  private inflight = new Map<ChunkId, Promise<void>>();
  private unsubscribe: (() => void) | null = null;

  constructor(
    readonly id: string,
    private deps: ChunkWorkerDeps,
    private log: Logger
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.deps.events.subscribe('chunk.assigned', (e) => this.onAssigned(e));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  get busy(): number {
    return this.inflight.size;
  }

  /** Resolves once every job started so far has finished. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight.values()]);
    }
  }

  private onAssigned(event: BusEvent<'chunk.assigned'>): void {
    const { chunkId, assignedWorker } = event.payload;
    if (assignedWorker !== this.id || this.inflight.has(chunkId)) return;

    const job = this.run(event.payload.taskId, chunkId).finally(() => this.inflight.delete(chunkId));
    this.inflight.set(chunkId, job);
  }

  private async run(taskId: string, chunkId: ChunkId): Promise<void> {
    const log = this.log.child({ taskId, chunkId });
    try {
      const outcome = await this.produce(taskId, chunkId);
      const released = this.deps.store.release(this.id, chunkId);
      await this.deps.events.publish('file.unlocked', this.id, { taskId, chunkId, released });

      if (outcome.kind === 'completed') {
        await this.deps.events.publish('chunk.completed', this.id, {
          taskId,
          chunkId,
          integrationHandle: outcome.integrationHandle
        });
        log.info({ integrationHandle: outcome.integrationHandle }, 'chunk.completed');
      } else {
        await this.deps.events.publish('chunk.failed', this.id, {
          taskId,
          chunkId,
          error: outcome.error,
          retryable: outcome.retryable
        });
        log.warn({ error: outcome.error, retryable: outcome.retryable }, 'chunk.failed');
      }
    } catch (err) {
      // Storage trouble while releasing or reporting. The chunk stays
      // in_progress with its locks until someone releases them.
      log.error({ err }, 'worker.job_failed');
    }
  }

  private async produce(taskId: string, chunkId: ChunkId): Promise<Outcome> {
    try {
      const chunk = this.deps.store.getChunk(chunkId);
      if (!chunk) throw new NotFoundError('chunk', chunkId);
      const task = this.deps.tasks.get(taskId);
      if (!task) throw new NotFoundError('task', taskId);

      await this.deps.events.publish('chunk.started', this.id, {
        taskId,
        chunkId,
        description: chunk.description,
        files: chunk.files
      });
      const integrationHandle = await this.generateAndOpen(task.targetPath, chunk);
      return { kind: 'completed', integrationHandle };
    } catch (err) {
      return {
        kind: 'failed',
        error: errorMessage(err),
        retryable: err instanceof CollaboratorError ? err.retryable : true
      };
    }
  }

  private async generateAndOpen(targetPath: string, chunk: Chunk): Promise<string> {
    const ref = { taskId: chunk.taskId, chunkId: chunk.id };
    const existing = await this.deps.workspace.readFiles(targetPath, chunk.files);

    await this.deps.events.publish('code_generation.started', this.id, { ...ref, description: chunk.description });
    const result = await this.deps.generator.generate(chunk, existing);

    const modifiedFiles = Object.keys(result.files);
    await this.deps.events.publish('files.modified', this.id, { ...ref, modifiedFiles });

    const handle = await this.deps.integrator.openIntegration(chunk, result.files, result.commitMessage);
    await this.deps.events.publish('integration.opened', this.id, {
      ...ref,
      integrationHandle: handle,
      commitMessage: result.commitMessage
    });
    return handle;
  }
}
