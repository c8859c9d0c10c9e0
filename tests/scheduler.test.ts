import { describe, it, expect } from 'vitest';
import {
  availableChunks,
  mergeEligibleChunks,
  pendingDependencies,
  summarizeStatuses,
  validateChunkBatch
} from '../src/core/scheduler.js';
import type { FileLock } from '../src/core/types.js';
import { chunk } from './helpers.js';

function lock(filePath: string, chunkId = 'X'): FileLock {
  return { filePath, actor: 'w1', chunkId, lockedAt: 0 };
}

describe('availableChunks', () => {
  it('returns planned chunks whose dependencies are settled and files free', () => {
    const chunks = [
      chunk('A', { status: 'complete' }),
      chunk('B', { dependencies: ['A'] }),
      chunk('C', { dependencies: ['D'] }),
      chunk('D', { status: 'in_progress' }),
      chunk('E', { files: ['shared.ts'] })
    ];
    const ids = availableChunks(chunks, [lock('shared.ts')]).map((c) => c.id);
    expect(ids).toEqual(['B']);
  });

  it('treats merged dependencies as settled', () => {
    const chunks = [chunk('A', { status: 'merged' }), chunk('B', { dependencies: ['A'] })];
    expect(availableChunks(chunks, []).map((c) => c.id)).toEqual(['B']);
  });

  it('keeps the input order', () => {
    const chunks = [chunk('Z'), chunk('A'), chunk('M')];
    expect(availableChunks(chunks, []).map((c) => c.id)).toEqual(['Z', 'A', 'M']);
  });

  it('blocks on a dependency missing from the list', () => {
    expect(availableChunks([chunk('B', { dependencies: ['gone'] })], [])).toEqual([]);
  });
});

describe('mergeEligibleChunks', () => {
  it('requires complete status and merged dependencies', () => {
    const chunks = [
      chunk('A', { status: 'complete' }),
      chunk('B', { status: 'complete', dependencies: ['A'] }),
      chunk('C', { status: 'merged' }),
      chunk('D', { status: 'complete', dependencies: ['C'] }),
      chunk('E', { status: 'in_progress' })
    ];
    expect(mergeEligibleChunks(chunks).map((c) => c.id)).toEqual(['A', 'D']);
  });
});

describe('pendingDependencies', () => {
  it('lists unsettled dependencies of planned chunks', () => {
    const chunks = [
      chunk('A', { status: 'in_progress' }),
      chunk('B', { status: 'complete' }),
      chunk('C', { dependencies: ['A', 'B'] }),
      chunk('D', { dependencies: ['B'] })
    ];
    expect([...pendingDependencies(chunks)]).toEqual([['C', ['A']]]);
  });
});

describe('summarizeStatuses', () => {
  it('counts every status', () => {
    const chunks = [chunk('A'), chunk('B', { status: 'merged' }), chunk('C', { status: 'merged' })];
    expect(summarizeStatuses(chunks)).toEqual({ planned: 1, in_progress: 0, complete: 0, merged: 2 });
  });
});

describe('validateChunkBatch', () => {
  it('accepts a well-formed batch', () => {
    const batch = [chunk('A'), chunk('B', { dependencies: ['A'] })];
    expect(validateChunkBatch(batch)).toEqual([]);
  });

  it('accepts dependencies on existing chunks', () => {
    expect(validateChunkBatch([chunk('B', { dependencies: ['A'] })], ['A'])).toEqual([]);
  });

  it('reports empty files, duplicates, self and dangling dependencies', () => {
    const batch = [
      chunk('A', { files: [] }),
      chunk('B', { dependencies: ['B'] }),
      chunk('C', { dependencies: ['nowhere'] }),
      chunk('D')
    ];
    expect(validateChunkBatch(batch, ['D'])).toEqual([
      { chunkId: 'A', problem: 'empty_files' },
      { chunkId: 'D', problem: 'duplicate_id' },
      { chunkId: 'B', problem: 'self_dependency' },
      { chunkId: 'C', problem: 'dangling_dependency', detail: 'nowhere' }
    ]);
  });

  it('reports every chunk on or behind a cycle', () => {
    const batch = [
      chunk('A', { dependencies: ['C'] }),
      chunk('B', { dependencies: ['A'] }),
      chunk('C', { dependencies: ['B'] }),
      chunk('D', { dependencies: ['C'] }),
      chunk('E')
    ];
    expect(validateChunkBatch(batch)).toEqual([
      { chunkId: 'A', problem: 'dependency_cycle' },
      { chunkId: 'B', problem: 'dependency_cycle' },
      { chunkId: 'C', problem: 'dependency_cycle' },
      { chunkId: 'D', problem: 'dependency_cycle' }
    ]);
  });
});
