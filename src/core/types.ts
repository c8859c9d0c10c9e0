export type TaskId = string;
export type ChunkId = string;
export type EventId = string;

export const CHUNK_STATUSES = ['planned', 'in_progress', 'complete', 'merged'] as const;
export type ChunkStatus = (typeof CHUNK_STATUSES)[number];

export const TASK_STATUSES = [
  'queued',
  'analyzing',
  'chunking',
  'processing_chunks',
  'merging',
  'completed',
  'failed',
  'cancelled'
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['completed', 'failed', 'cancelled']);

export function isTerminal(status: TaskStatus): status is TerminalTaskStatus {
  return TERMINAL_TASK_STATUSES.has(status);
}

export interface FileLock {
  filePath: string;
  actor: string;
  chunkId: ChunkId;
  lockedAt: number;
}

export interface Chunk {
  id: ChunkId;
  taskId: TaskId;
  description: string;
  status: ChunkStatus;
  files: string[];
  dependencies: ChunkId[];
  assignedWorker: string | null;
  integrationHandle: string | null;
  attempts: number;
  lastError: string | null;
  createdAt: number;
  updatedAt: number;
}

/** A chunk as returned by the planner, before it is namespaced under its task. */
export interface ChunkPlan {
  id: string;
  description: string;
  files: string[];
  dependencies: string[];
  estimatedEffort?: number;
}

export interface Task {
  id: TaskId;
  targetPath: string;
  featureDescription: string;
  status: TaskStatus;
  createdAt: number;
  updatedAt: number;
  completedAt: number | null;
  errorMessage: string | null;
  totalChunks: number | null;
  completedChunks: number;
  integrationHandles: string[];
}

export const EVENT_TYPES = [
  'feature.analyze_requested',
  'feature.analyzed',
  'chunks.planned',
  'file.locked',
  'file.unlocked',
  'chunk.assigned',
  'chunk.started',
  'code_generation.started',
  'files.modified',
  'integration.opened',
  'chunk.completed',
  'chunk.failed',
  'integration.requested',
  'integration.completed',
  'feature.completed'
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

type ChunkRef = {
  taskId: TaskId;
  chunkId: ChunkId;
};

export interface EventPayloads {
  'feature.analyze_requested': { taskId: TaskId; featureDescription: string; fileCount: number };
  'feature.analyzed': { taskId: TaskId; chunkCount: number };
  'chunks.planned': { taskId: TaskId; totalChunks: number; chunkIds: ChunkId[] };
  'file.locked': ChunkRef & { files: string[] };
  'file.unlocked': ChunkRef & { released: number };
  'chunk.assigned': ChunkRef & { description: string; files: string[]; assignedWorker: string };
  'chunk.started': ChunkRef & { description: string; files: string[] };
  'code_generation.started': ChunkRef & { description: string };
  'files.modified': ChunkRef & { modifiedFiles: string[] };
  'integration.opened': ChunkRef & { integrationHandle: string; commitMessage: string };
  'chunk.completed': ChunkRef & { integrationHandle: string };
  'chunk.failed': ChunkRef & { error: string; retryable: boolean };
  'integration.requested': ChunkRef & { integrationHandle: string };
  'integration.completed': ChunkRef & { integrationHandle: string };
  'feature.completed': { taskId: TaskId; mergedChunks: number };
}

/** A live event as handed to subscribers, with its payload typed by event type. */
export interface BusEvent<K extends EventType> {
  id: EventId;
  type: K;
  actor: string;
  payload: EventPayloads[K];
  createdAt: number;
}

/** An event read back from the log. */
export interface StoredEvent {
  /** Position in the log; strictly increasing in publish order. */
  seq: number;
  id: EventId;
  type: EventType;
  actor: string;
  payload: Record<string, unknown>;
  createdAt: number;
}

export const PROGRESS_EVENT_TYPES = [
  'task_started',
  'feature_analysis_started',
  'feature_analysis_completed',
  'chunking_started',
  'chunking_completed',
  'chunk_processing_started',
  'code_generation_started',
  'files_modified',
  'pr_created',
  'pr_merged',
  'merging_started',
  'task_completed',
  'task_failed',
  'task_cancelled',
  'error_occurred'
] as const;
export type BuiltinProgressType = (typeof PROGRESS_EVENT_TYPES)[number];
// Open set: callers may publish their own phase names.
export type ProgressEventType = BuiltinProgressType | (string & {});

export interface ProgressEvent {
  id: string;
  taskId: TaskId;
  type: ProgressEventType;
  payload: Record<string, unknown>;
  message: string | null;
  createdAt: number;
}

export interface ChunkProgress {
  chunkId: ChunkId;
  status: ChunkStatus;
  description: string;
  files: string[];
  integrationHandle: string | null;
  attempts: number;
}

export interface TaskSummary {
  taskId: TaskId;
  status: TaskStatus;
  featureDescription: string;
  targetPath: string;
  totalChunks: number;
  completedChunks: number;
  chunks: ChunkProgress[];
  integrationHandles: string[];
  progressPercentage: number;
  currentPhase: string;
  createdAt: number;
  updatedAt: number;
  errorMessage: string | null;
}
