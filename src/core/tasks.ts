import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { GantryDb } from '../infra/db.js';
import { InvalidTransitionError, NotFoundError } from './errors.js';
import { parseStringList } from './json.js';
import { TASK_STATUSES, isTerminal } from './types.js';
import type { Task, TaskId, TaskStatus } from './types.js';

const TaskStatusSchema = z.enum(TASK_STATUSES);

const FORWARD_ORDER: TaskStatus[] = ['queued', 'analyzing', 'chunking', 'processing_chunks', 'merging', 'completed'];

interface TaskRow {
  id: string;
  target_path: string;
  feature_description: string;
  status: string;
  created_at: number;
  updated_at: number;
  completed_at: number | null;
  error_message: string | null;
  total_chunks: number | null;
  completed_chunks: number;
  integration_handles_json: string;
}

interface CountRow {
  n: number;
}

const TASK_COLUMNS =
  'id, target_path, feature_description, status, created_at, updated_at, completed_at, error_message, total_chunks, completed_chunks, integration_handles_json';

function now() {
  return Date.now();
}

function rowToTask(r: TaskRow): Task {
  return {
    id: r.id,
    targetPath: r.target_path,
    featureDescription: r.feature_description,
    status: TaskStatusSchema.parse(r.status),
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    completedAt: r.completed_at,
    errorMessage: r.error_message,
    totalChunks: r.total_chunks,
    completedChunks: r.completed_chunks,
    integrationHandles: parseStringList(r.integration_handles_json)
  };
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  if (isTerminal(from)) return false;
  if (to === 'failed' || to === 'cancelled') return true;
  return FORWARD_ORDER.indexOf(to) > FORWARD_ORDER.indexOf(from);
}

export interface TaskListFilter {
  status?: TaskStatus;
  limit?: number;
}

/**
 * Task records and their status machine. Terminal tasks are read-only: every
 * write path checks the current status first instead of trusting callers.
 */
export class TaskManager {
  constructor(private db: GantryDb, private log: Logger) {}

  submit(targetPath: string, featureDescription: string): Task {
    const t = now();
    const task: Task = {
      id: nanoid(12),
      targetPath,
      featureDescription,
      status: 'queued',
      createdAt: t,
      updatedAt: t,
      completedAt: null,
      errorMessage: null,
      totalChunks: null,
      completedChunks: 0,
      integrationHandles: []
    };
    this.db
      .prepare(
        `INSERT INTO tasks (${TASK_COLUMNS}) VALUES (?, ?, ?, 'queued', ?, ?, NULL, NULL, NULL, 0, '[]')`
      )
      .run(task.id, task.targetPath, task.featureDescription, task.createdAt, task.updatedAt);
    this.log.info({ taskId: task.id, targetPath }, 'task.submitted');
    return task;
  }

  get(id: TaskId): Task | null {
    const row = this.db.prepare(`SELECT ${TASK_COLUMNS} FROM tasks WHERE id = ?`).get(id) as TaskRow | undefined;
    return row ? rowToTask(row) : null;
  }

  /** Oldest first. */
  list(filter: TaskListFilter = {}): Task[] {
    const params: Array<string | number> = [];
    let sql = `SELECT ${TASK_COLUMNS} FROM tasks`;
    if (filter.status) {
      sql += ' WHERE status = ?';
      params.push(filter.status);
    }
    sql += ' ORDER BY created_at ASC, rowid ASC';
    if (filter.limit) {
      sql += ' LIMIT ?';
      params.push(filter.limit);
    }
    const rows = this.db.prepare(sql).all(...params) as TaskRow[];
    return rows.map(rowToTask);
  }

  listActive(): Task[] {
    const rows = this.db
      .prepare(
        `SELECT ${TASK_COLUMNS} FROM tasks WHERE status NOT IN ('completed', 'failed', 'cancelled') ORDER BY created_at ASC, rowid ASC`
      )
      .all() as TaskRow[];
    return rows.map(rowToTask);
  }

  /** Strict FIFO among queued tasks. */
  nextQueued(): Task | null {
    return this.list({ status: 'queued', limit: 1 })[0] ?? null;
  }

  /**
   * Moves a task to `status`. Returns false, without writing, when the task is
   * already terminal. Entering a terminal status stamps `completedAt`.
   */
  transition(id: TaskId, status: TaskStatus, opts: { errorMessage?: string } = {}): boolean {
    const task = this.require(id);
    if (isTerminal(task.status)) {
      this.log.warn({ taskId: id, from: task.status, to: status }, 'task.transition_ignored');
      return false;
    }
    if (!canTransition(task.status, status)) {
      throw new InvalidTransitionError('task', id, task.status, status);
    }

    const t = now();
    const sets = ['status = ?', 'updated_at = ?'];
    const params: Array<string | number> = [status, t];
    if (opts.errorMessage !== undefined) {
      sets.push('error_message = ?');
      params.push(opts.errorMessage);
    }
    if (isTerminal(status)) {
      sets.push('completed_at = ?');
      params.push(t);
    }
    params.push(id, task.status);

    // The status guard in the WHERE clause keeps a concurrent writer from
    // being overwritten between the read above and this update.
    const info = this.db.prepare(`UPDATE tasks SET ${sets.join(', ')} WHERE id = ? AND status = ?`).run(...params);
    if (info.changes === 0) {
      this.log.warn({ taskId: id, to: status }, 'task.transition_lost_race');
      return false;
    }
    this.log.info({ taskId: id, from: task.status, to: status }, 'task.transition');
    return true;
  }

  setTotalChunks(id: TaskId, total: number): void {
    this.writeActive(id, 'total_chunks = ?', total);
  }

  /** Counts one merged chunk and remembers its integration handle. */
  recordIntegration(id: TaskId, handle: string): void {
    const task = this.require(id);
    if (isTerminal(task.status)) {
      this.log.warn({ taskId: id, handle }, 'task.integration_ignored');
      return;
    }
    const handles = [...task.integrationHandles, handle];
    this.db
      .prepare(
        'UPDATE tasks SET completed_chunks = completed_chunks + 1, integration_handles_json = ?, updated_at = ? WHERE id = ?'
      )
      .run(JSON.stringify(handles), now(), id);
  }

  /** Cancels a non-terminal task. False for unknown or already-terminal tasks. */
  cancel(id: TaskId): boolean {
    const task = this.get(id);
    if (!task || isTerminal(task.status)) return false;
    return this.transition(id, 'cancelled');
  }

  counts() {
    const total = (this.db.prepare('SELECT COUNT(1) AS n FROM tasks').get() as CountRow | undefined)?.n ?? 0;
    return { tasks: total, active: this.listActive().length };
  }

  private writeActive(id: TaskId, set: string, value: string | number): void {
    const task = this.require(id);
    if (isTerminal(task.status)) {
      this.log.warn({ taskId: id, set }, 'task.write_ignored');
      return;
    }
    this.db.prepare(`UPDATE tasks SET ${set}, updated_at = ? WHERE id = ?`).run(value, now(), id);
  }

  private require(id: TaskId): Task {
    const task = this.get(id);
    if (!task) throw new NotFoundError('task', id);
    return task;
  }
}
