import type { ConsistencyIssue } from './errors.js';
import type { Chunk, ChunkId, ChunkStatus, FileLock } from './types.js';

type ChunkShape = Pick<Chunk, 'id' | 'files' | 'dependencies'>;

const SETTLED: ReadonlySet<ChunkStatus> = new Set<ChunkStatus>(['complete', 'merged']);

function idsWhere(chunks: Chunk[], pred: (c: Chunk) => boolean): Set<ChunkId> {
  return new Set(chunks.filter(pred).map((c) => c.id));
}

/**
 * Chunks that may start now: planned, every dependency complete or merged,
 * and no declared file held by a lock. Order is whatever `chunks` had.
 */
export function availableChunks(chunks: Chunk[], locks: FileLock[]): Chunk[] {
  const settled = idsWhere(chunks, (c) => SETTLED.has(c.status));
  const locked = new Set(locks.map((l) => l.filePath));

  return chunks.filter(
    (c) =>
      c.status === 'planned' &&
      c.dependencies.every((d) => settled.has(d)) &&
      !c.files.some((f) => locked.has(f))
  );
}

/** Complete chunks whose dependencies have all been merged. */
export function mergeEligibleChunks(chunks: Chunk[]): Chunk[] {
  const merged = idsWhere(chunks, (c) => c.status === 'merged');
  return chunks.filter((c) => c.status === 'complete' && c.dependencies.every((d) => merged.has(d)));
}

/** Dependencies of planned chunks that are not yet settled, keyed by chunk id. */
export function pendingDependencies(chunks: Chunk[]): Map<ChunkId, ChunkId[]> {
  const settled = idsWhere(chunks, (c) => SETTLED.has(c.status));
  const out = new Map<ChunkId, ChunkId[]>();
  for (const c of chunks) {
    if (c.status !== 'planned') continue;
    const missing = c.dependencies.filter((d) => !settled.has(d));
    if (missing.length > 0) out.set(c.id, missing);
  }
  return out;
}

export function summarizeStatuses(chunks: Chunk[]): Record<ChunkStatus, number> {
  const counts: Record<ChunkStatus, number> = { planned: 0, in_progress: 0, complete: 0, merged: 0 };
  for (const c of chunks) counts[c.status] += 1;
  return counts;
}

/**
 * Problems that would leave a batch of chunks permanently unschedulable.
 * Dependencies must resolve inside the batch or against `existing` ids.
 */
export function validateChunkBatch(batch: ChunkShape[], existing: Iterable<ChunkId> = []): ConsistencyIssue[] {
  const issues: ConsistencyIssue[] = [];
  const known = new Set<ChunkId>(existing);
  const seen = new Set<ChunkId>();

  for (const c of batch) {
    if (seen.has(c.id) || known.has(c.id)) issues.push({ chunkId: c.id, problem: 'duplicate_id' });
    seen.add(c.id);
    if (c.files.length === 0) issues.push({ chunkId: c.id, problem: 'empty_files' });
  }

  for (const c of batch) {
    for (const d of c.dependencies) {
      if (d === c.id) issues.push({ chunkId: c.id, problem: 'self_dependency' });
      else if (!seen.has(d) && !known.has(d)) issues.push({ chunkId: c.id, problem: 'dangling_dependency', detail: d });
    }
  }

  for (const id of findCycle(batch)) {
    issues.push({ chunkId: id, problem: 'dependency_cycle' });
  }
  return issues;
}

/**
 * Kahn's algorithm over the in-batch edges; whatever never reaches in-degree
 * zero sits on (or behind) a cycle. Self edges are reported separately.
 */
function findCycle(batch: ChunkShape[]): ChunkId[] {
  const ids = new Set(batch.map((c) => c.id));
  const indeg = new Map<ChunkId, number>();
  const adj = new Map<ChunkId, ChunkId[]>();

  for (const c of batch) {
    indeg.set(c.id, 0);
    adj.set(c.id, []);
  }
  for (const c of batch) {
    for (const d of new Set(c.dependencies)) {
      if (d === c.id || !ids.has(d)) continue;
      indeg.set(c.id, (indeg.get(c.id) ?? 0) + 1);
      adj.get(d)?.push(c.id);
    }
  }

  let ready = [...indeg.entries()].filter(([, n]) => n === 0).map(([id]) => id);
  const visited = new Set<ChunkId>();
  while (ready.length > 0) {
    const next: ChunkId[] = [];
    for (const u of ready) {
      visited.add(u);
      for (const v of adj.get(u) ?? []) {
        const deg = (indeg.get(v) ?? 0) - 1;
        indeg.set(v, deg);
        if (deg === 0) next.push(v);
      }
    }
    ready = next;
  }

  return [...indeg.keys()].filter((id) => !visited.has(id));
}
