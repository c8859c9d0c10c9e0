import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { GantryDb } from '../infra/db.js';
import { parseRecord } from './json.js';
import type { LockStore } from './store.js';
import { ProgressSubscription } from './subscription.js';
import type { TaskManager } from './tasks.js';
import type { Chunk, ProgressEvent, ProgressEventType, TaskId, TaskStatus, TaskSummary } from './types.js';

interface ProgressRow {
  id: string;
  task_id: string;
  type: string;
  payload_json: string;
  message: string | null;
  created_at: number;
}

export interface ProgressPublisherOptions {
  /** Buffer size of each live subscriber queue. */
  queueSize: number;
}

function rowToEvent(r: ProgressRow): ProgressEvent {
  return {
    id: r.id,
    taskId: r.task_id,
    type: r.type,
    payload: parseRecord(r.payload_json),
    message: r.message,
    createdAt: r.created_at
  };
}

export function determinePhase(status: TaskStatus, chunks: Pick<Chunk, 'status'>[]): string {
  switch (status) {
    case 'queued':
      return 'Queued';
    case 'analyzing':
      return 'Analyzing Feature';
    case 'chunking':
      return 'Planning Chunks';
    case 'processing_chunks': {
      const done = chunks.filter((c) => c.status === 'complete' || c.status === 'merged').length;
      return `Processing Chunks (${done}/${chunks.length})`;
    }
    case 'merging':
      return 'Merging Pull Requests';
    case 'completed':
      return 'Completed';
    case 'failed':
      return 'Failed';
    case 'cancelled':
      return 'Cancelled';
  }
}

/**
 * Per-task progress stream. Every event is persisted; live subscribers get a
 * best-effort copy through their own bounded queue.
 */
export class ProgressPublisher {
  private byTask = new Map<TaskId, Set<ProgressSubscription>>();
  private everything = new Set<ProgressSubscription>();

  constructor(
    private db: GantryDb,
    private log: Logger,
    private deps: { tasks: TaskManager; store: LockStore },
    private opts: ProgressPublisherOptions = { queueSize: 1000 }
  ) {}

  publishProgress(
    taskId: TaskId,
    type: ProgressEventType,
    payload: Record<string, unknown> = {},
    message?: string
  ): ProgressEvent {
    const event: ProgressEvent = {
      id: nanoid(16),
      taskId,
      type,
      payload,
      message: message ?? null,
      createdAt: Date.now()
    };

    this.db
      .prepare('INSERT INTO progress_events (id, task_id, type, payload_json, message, created_at) VALUES (?, ?, ?, ?, ?, ?)')
      .run(event.id, event.taskId, event.type, JSON.stringify(event.payload), event.message, event.createdAt);

    let dropped = 0;
    for (const sub of [...(this.byTask.get(taskId) ?? []), ...this.everything]) {
      if (!sub.offer(event)) dropped++;
    }
    if (dropped > 0) this.log.debug({ taskId, type, dropped }, 'progress.dropped');
    return event;
  }

  subscribe(taskId: TaskId): ProgressSubscription {
    const sub = new ProgressSubscription(taskId, this.opts.queueSize, (s) => this.detach(s));
    let set = this.byTask.get(taskId);
    if (!set) {
      set = new Set();
      this.byTask.set(taskId, set);
    }
    set.add(sub);
    return sub;
  }

  subscribeAll(): ProgressSubscription {
    const sub = new ProgressSubscription(null, this.opts.queueSize, (s) => this.detach(s));
    this.everything.add(sub);
    return sub;
  }

  subscriberCount(taskId?: TaskId): number {
    return taskId === undefined ? this.everything.size : (this.byTask.get(taskId)?.size ?? 0);
  }

  /** Newest first. */
  getTaskEvents(taskId: TaskId, limit?: number): ProgressEvent[] {
    const params: Array<string | number> = [taskId];
    let sql = 'SELECT id, task_id, type, payload_json, message, created_at FROM progress_events WHERE task_id = ? ORDER BY seq DESC';
    if (limit) {
      sql += ' LIMIT ?';
      params.push(limit);
    }
    const rows = this.db.prepare(sql).all(...params) as ProgressRow[];
    return rows.map(rowToEvent);
  }

  getRecentEvents(limit = 100): ProgressEvent[] {
    const rows = this.db
      .prepare('SELECT id, task_id, type, payload_json, message, created_at FROM progress_events ORDER BY seq DESC LIMIT ?')
      .all(limit) as ProgressRow[];
    return rows.map(rowToEvent);
  }

  getSummary(taskId: TaskId): TaskSummary | null {
    const task = this.deps.tasks.get(taskId);
    if (!task) return null;

    const chunks = this.deps.store.listChunks({ taskId });
    const total = task.totalChunks ?? chunks.length;
    const percentage = total > 0 ? Math.round((task.completedChunks / total) * 10000) / 100 : 0;

    return {
      taskId: task.id,
      status: task.status,
      featureDescription: task.featureDescription,
      targetPath: task.targetPath,
      totalChunks: total,
      completedChunks: task.completedChunks,
      chunks: chunks.map((c) => ({
        chunkId: c.id,
        status: c.status,
        description: c.description,
        files: c.files,
        integrationHandle: c.integrationHandle,
        attempts: c.attempts
      })),
      integrationHandles: task.integrationHandles,
      progressPercentage: percentage,
      currentPhase: determinePhase(task.status, chunks),
      createdAt: task.createdAt,
      updatedAt: task.updatedAt,
      errorMessage: task.errorMessage
    };
  }

  private detach(sub: ProgressSubscription): void {
    if (sub.taskId === null) {
      this.everything.delete(sub);
      return;
    }
    const set = this.byTask.get(sub.taskId);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) this.byTask.delete(sub.taskId);
  }
}
