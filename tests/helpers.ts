import Database from 'better-sqlite3';
import pino from 'pino';
import { migrate } from '../src/infra/db.js';
import type { GantryDb } from '../src/infra/db.js';
import type {
  CodeGenerator,
  Collaborators,
  FeaturePlanner,
  GenerationResult,
  Integrator,
  Workspace
} from '../src/core/collaborators.js';
import type { Chunk, ChunkId, ChunkPlan } from '../src/core/types.js';

export function makeDb(): GantryDb {
  const db = new Database(':memory:');
  migrate(db);
  return db;
}

export function silentLog() {
  return pino({ level: 'silent' });
}

/** A promise the test resolves by hand. */
export class Gate {
  private release: () => void = () => undefined;
  readonly promise = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }
}

export class FakePlanner implements FeaturePlanner {
  calls: Array<{ featureDescription: string; targetStructure: string[] }> = [];
  gate: Promise<void> | null = null;

  constructor(public plans: ChunkPlan[]) {}

  async decompose(featureDescription: string, targetStructure: string[]): Promise<ChunkPlan[]> {
    this.calls.push({ featureDescription, targetStructure });
    if (this.gate) await this.gate;
    return this.plans;
  }
}

export class FakeGenerator implements CodeGenerator {
  calls: ChunkId[] = [];
  gate: Promise<void> | null = null;
  /** Errors thrown by the next calls for a chunk, in order. */
  failures = new Map<ChunkId, Error[]>();

  async generate(chunk: Chunk, _existingFiles: Record<string, string>): Promise<GenerationResult> {
    this.calls.push(chunk.id);
    if (this.gate) await this.gate;
    const failure = this.failures.get(chunk.id)?.shift();
    if (failure) throw failure;
    return {
      files: Object.fromEntries(chunk.files.map((f) => [f, `// ${chunk.id}\n`])),
      commitMessage: `Implement ${chunk.id}`
    };
  }
}

export class FakeIntegrator implements Integrator {
  opened: ChunkId[] = [];
  completed: string[] = [];
  /** Handles whose merge reports false. */
  refuse = new Set<string>();

  async openIntegration(chunk: Chunk, _files: Record<string, string>, _commitMessage: string): Promise<string> {
    this.opened.push(chunk.id);
    return `pr-${chunk.id}`;
  }

  async completeIntegration(handle: string): Promise<boolean> {
    if (this.refuse.has(handle)) return false;
    this.completed.push(handle);
    return true;
  }
}

export class FakeWorkspace implements Workspace {
  constructor(public files: string[] = ['src/index.ts']) {}

  async listFiles(_targetPath: string): Promise<string[]> {
    return this.files;
  }

  async readFiles(_targetPath: string, _files: string[]): Promise<Record<string, string>> {
    return {};
  }
}

export function fakeCollaborators(plans: ChunkPlan[] = []) {
  const collaborators = {
    planner: new FakePlanner(plans),
    generator: new FakeGenerator(),
    integrator: new FakeIntegrator(),
    workspace: new FakeWorkspace()
  } satisfies Collaborators;
  return collaborators;
}

export function plan(id: string, files: string[], dependencies: string[] = []): ChunkPlan {
  return { id, description: `Chunk ${id}`, files, dependencies };
}

export function chunk(id: string, overrides: Partial<Chunk> = {}): Chunk {
  return {
    id,
    taskId: 't1',
    description: `Chunk ${id}`,
    status: 'planned',
    files: [`${id}.ts`],
    dependencies: [],
    assignedWorker: null,
    integrationHandle: null,
    attempts: 0,
    lastError: null,
    createdAt: 0,
    updatedAt: 0,
    ...overrides
  };
}
