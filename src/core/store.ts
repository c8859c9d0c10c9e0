import type { Logger } from 'pino';
import { z } from 'zod';
import type { GantryDb } from '../infra/db.js';
import { ConsistencyError, InvalidTransitionError, NotFoundError } from './errors.js';
import { parseStringList } from './json.js';
import { validateChunkBatch } from './scheduler.js';
import { CHUNK_STATUSES } from './types.js';
import type { Chunk, ChunkId, ChunkPlan, ChunkStatus, FileLock, TaskId } from './types.js';

const ChunkStatusSchema = z.enum(CHUNK_STATUSES);

// planned -> in_progress -> complete -> merged. The way back to planned goes
// through recordAttemptFailure only.
const NEXT_STATUS: Record<ChunkStatus, ChunkStatus | null> = {
  planned: 'in_progress',
  in_progress: 'complete',
  complete: 'merged',
  merged: null
};

interface ChunkRow {
  id: string;
  task_id: string;
  description: string;
  status: string;
  assigned_worker: string | null;
  files_json: string;
  dependencies_json: string;
  integration_handle: string | null;
  attempts: number;
  last_error: string | null;
  created_at: number;
  updated_at: number;
}

interface LockRow {
  file_path: string;
  actor: string;
  chunk_id: string;
  locked_at: number;
}

interface CountRow {
  n: number;
}

export interface NewChunk {
  id: ChunkId;
  taskId: TaskId;
  description: string;
  files: string[];
  dependencies: ChunkId[];
}

export interface ChunkFilter {
  status?: ChunkStatus;
  taskId?: TaskId;
}

export interface StatusUpdate {
  assignedWorker?: string;
  integrationHandle?: string;
}

const CHUNK_COLUMNS =
  'id, task_id, description, status, assigned_worker, files_json, dependencies_json, integration_handle, attempts, last_error, created_at, updated_at';

function now() {
  return Date.now();
}

function rowToChunk(r: ChunkRow): Chunk {
  return {
    id: r.id,
    taskId: r.task_id,
    description: r.description,
    status: ChunkStatusSchema.parse(r.status),
    files: parseStringList(r.files_json),
    dependencies: parseStringList(r.dependencies_json),
    assignedWorker: r.assigned_worker,
    integrationHandle: r.integration_handle,
    attempts: r.attempts,
    lastError: r.last_error,
    createdAt: r.created_at,
    updatedAt: r.updated_at
  };
}

function rowToLock(r: LockRow): FileLock {
  return { filePath: r.file_path, actor: r.actor, chunkId: r.chunk_id, lockedAt: r.locked_at };
}

/** Namespaces a planner chunk id under its task: `<taskId>_<planId>`. */
export function chunkIdFor(taskId: TaskId, planId: string): ChunkId {
  const prefix = `${taskId}_`;
  return planId.startsWith(prefix) ? planId : `${prefix}${planId}`;
}

/**
 * Chunk records and the file locks that keep chunks from editing the same
 * file at once. Acquisition is all-or-nothing inside one immediate
 * transaction, which also holds SQLite's write lock against other processes.
 */
export class LockStore {
  constructor(private db: GantryDb, private log: Logger) {}

  acquire(actor: string, chunkId: ChunkId, files: string[]): boolean {
    const paths = [...new Set(files)];
    if (paths.length === 0) return false;

    const placeholders = paths.map(() => '?').join(',');
    const findHeld = this.db.prepare(
      `SELECT file_path, actor, chunk_id, locked_at FROM file_locks WHERE file_path IN (${placeholders})`
    );
    const insert = this.db.prepare('INSERT INTO file_locks (file_path, actor, chunk_id, locked_at) VALUES (?, ?, ?, ?)');

    const tx = this.db.transaction((wanted: string[]): LockRow[] => {
      const held = findHeld.all(...wanted) as LockRow[];
      if (held.length > 0) return held;
      const lockedAt = now();
      for (const p of wanted) insert.run(p, actor, chunkId, lockedAt);
      return [];
    });

    const held = tx.immediate(paths);
    if (held.length > 0) {
      this.log.debug(
        { actor, chunkId, files: paths, heldBy: held.map((h) => `${h.chunk_id}:${h.file_path}`) },
        'lock.conflict'
      );
      return false;
    }
    this.log.debug({ actor, chunkId, files: paths }, 'lock.acquired');
    return true;
  }

  release(actor: string, chunkId: ChunkId): number {
    const info = this.db.prepare('DELETE FROM file_locks WHERE actor = ? AND chunk_id = ?').run(actor, chunkId);
    if (info.changes > 0) this.log.debug({ actor, chunkId, released: info.changes }, 'lock.released');
    return info.changes;
  }

  listLocks(actor?: string): FileLock[] {
    const rows = actor
      ? (this.db
          .prepare('SELECT file_path, actor, chunk_id, locked_at FROM file_locks WHERE actor = ? ORDER BY file_path')
          .all(actor) as LockRow[])
      : (this.db.prepare('SELECT file_path, actor, chunk_id, locked_at FROM file_locks ORDER BY file_path').all() as LockRow[]);
    return rows.map(rowToLock);
  }

  lockedFiles(): Set<string> {
    const rows = this.db.prepare('SELECT file_path FROM file_locks').all() as Array<{ file_path: string }>;
    return new Set(rows.map((r) => r.file_path));
  }

  /** Current holders of any of `files`. */
  holdersOf(files: string[]): FileLock[] {
    if (files.length === 0) return [];
    const placeholders = files.map(() => '?').join(',');
    const rows = this.db
      .prepare(`SELECT file_path, actor, chunk_id, locked_at FROM file_locks WHERE file_path IN (${placeholders}) ORDER BY file_path`)
      .all(...files) as LockRow[];
    return rows.map(rowToLock);
  }

  createChunk(input: NewChunk): Chunk {
    const existing = input.dependencies.length > 0 ? this.existingIds(input.dependencies) : [];
    const issues = validateChunkBatch([input], [...existing, ...this.existingIds([input.id])]);
    if (issues.length > 0) throw new ConsistencyError(issues);
    return this.insertChunk(input);
  }

  /**
   * Creates a task's chunks from a plan in one transaction, namespacing ids
   * and dependency ids under the task. The whole batch is rejected if any
   * chunk could never be scheduled.
   */
  createChunks(taskId: TaskId, plans: ChunkPlan[]): Chunk[] {
    const batch: NewChunk[] = plans.map((p) => ({
      id: chunkIdFor(taskId, p.id),
      taskId,
      description: p.description,
      files: [...new Set(p.files)],
      dependencies: [...new Set(p.dependencies.map((d) => chunkIdFor(taskId, d)))]
    }));

    const existing = this.listChunks({ taskId }).map((c) => c.id);
    const issues = validateChunkBatch(batch, existing);
    if (issues.length > 0) throw new ConsistencyError(issues);

    const tx = this.db.transaction((items: NewChunk[]) => items.map((c) => this.insertChunk(c)));
    const created = tx(batch);
    this.log.info({ taskId, chunks: created.length }, 'chunks.created');
    return created;
  }

  getChunk(id: ChunkId): Chunk | null {
    const row = this.db.prepare(`SELECT ${CHUNK_COLUMNS} FROM chunks WHERE id = ?`).get(id) as ChunkRow | undefined;
    return row ? rowToChunk(row) : null;
  }

  listChunks(filter: ChunkFilter = {}): Chunk[] {
    const conditions: string[] = [];
    const params: string[] = [];
    if (filter.status) {
      conditions.push('status = ?');
      params.push(filter.status);
    }
    if (filter.taskId) {
      conditions.push('task_id = ?');
      params.push(filter.taskId);
    }
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT ${CHUNK_COLUMNS} FROM chunks${where} ORDER BY created_at ASC, rowid ASC`)
      .all(...params) as ChunkRow[];
    return rows.map(rowToChunk);
  }

  /** Moves a chunk one step forward; only the supplied fields change besides status. */
  updateStatus(id: ChunkId, status: ChunkStatus, update: StatusUpdate = {}): Chunk {
    const chunk = this.requireChunk(id);
    if (NEXT_STATUS[chunk.status] !== status) {
      throw new InvalidTransitionError('chunk', id, chunk.status, status);
    }

    const sets = ['status = ?', 'updated_at = ?'];
    const params: Array<string | number> = [status, now()];
    if (update.assignedWorker !== undefined) {
      sets.push('assigned_worker = ?');
      params.push(update.assignedWorker);
    }
    if (update.integrationHandle !== undefined) {
      sets.push('integration_handle = ?');
      params.push(update.integrationHandle);
    }
    params.push(id);

    this.db.prepare(`UPDATE chunks SET ${sets.join(', ')} WHERE id = ?`).run(...params);
    return this.requireChunk(id);
  }

  /** Hands an in-progress chunk back to the scheduler after a failed attempt. */
  recordAttemptFailure(id: ChunkId, error: string): Chunk {
    const chunk = this.requireChunk(id);
    if (chunk.status !== 'in_progress') {
      throw new InvalidTransitionError('chunk', id, chunk.status, 'planned');
    }
    this.db
      .prepare(
        "UPDATE chunks SET status = 'planned', assigned_worker = NULL, attempts = attempts + 1, last_error = ?, updated_at = ? WHERE id = ?"
      )
      .run(error, now(), id);
    return this.requireChunk(id);
  }

  counts() {
    const chunkCount = (this.db.prepare('SELECT COUNT(1) AS n FROM chunks').get() as CountRow | undefined)?.n ?? 0;
    const lockCount = (this.db.prepare('SELECT COUNT(1) AS n FROM file_locks').get() as CountRow | undefined)?.n ?? 0;
    return { chunks: chunkCount, locks: lockCount };
  }

  private requireChunk(id: ChunkId): Chunk {
    const chunk = this.getChunk(id);
    if (!chunk) throw new NotFoundError('chunk', id);
    return chunk;
  }

  private existingIds(ids: ChunkId[]): ChunkId[] {
    const placeholders = ids.map(() => '?').join(',');
    const rows = this.db.prepare(`SELECT id FROM chunks WHERE id IN (${placeholders})`).all(...ids) as Array<{ id: string }>;
    return rows.map((r) => r.id);
  }

  private insertChunk(c: NewChunk): Chunk {
    const t = now();
    this.db
      .prepare(
        `INSERT INTO chunks (${CHUNK_COLUMNS}) VALUES (?, ?, ?, 'planned', NULL, ?, ?, NULL, 0, NULL, ?, ?)`
      )
      .run(c.id, c.taskId, c.description, JSON.stringify(c.files), JSON.stringify(c.dependencies), t, t);
    return {
      id: c.id,
      taskId: c.taskId,
      description: c.description,
      status: 'planned',
      files: c.files,
      dependencies: c.dependencies,
      assignedWorker: null,
      integrationHandle: null,
      attempts: 0,
      lastError: null,
      createdAt: t,
      updatedAt: t
    };
  }
}
