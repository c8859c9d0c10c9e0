import type { Chunk, ChunkPlan } from './types.js';

/** Turns a feature description into chunk plans. `targetStructure` lists repo-relative files. */
export interface FeaturePlanner {
  decompose(featureDescription: string, targetStructure: string[]): Promise<ChunkPlan[]>;
}

export interface GenerationResult {
  /** Repo-relative path -> full new contents. */
  files: Record<string, string>;
  commitMessage: string;
}

export interface CodeGenerator {
  generate(chunk: Chunk, existingFiles: Record<string, string>): Promise<GenerationResult>;
}

/** Wraps version control and hosting: opening and merging one change per chunk. */
export interface Integrator {
  openIntegration(chunk: Chunk, files: Record<string, string>, commitMessage: string): Promise<string>;
  completeIntegration(handle: string): Promise<boolean>;
}

export interface Workspace {
  listFiles(targetPath: string): Promise<string[]>;
  /** Contents of the files that exist; missing files are left out. */
  readFiles(targetPath: string, files: string[]): Promise<Record<string, string>>;
}

export interface Collaborators {
  planner: FeaturePlanner;
  generator: CodeGenerator;
  integrator: Integrator;
  workspace: Workspace;
}
