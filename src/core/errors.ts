export type GantryErrorCode = 'CONSISTENCY' | 'COLLABORATOR' | 'INVALID_TRANSITION' | 'NOT_FOUND';

export class GantryError extends Error {
  constructor(
    readonly code: GantryErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ConsistencyIssue {
  chunkId: string;
  problem: 'empty_files' | 'duplicate_id' | 'dangling_dependency' | 'self_dependency' | 'dependency_cycle';
  detail?: string;
}

/** A chunk batch that could never be fully scheduled. */
export class ConsistencyError extends GantryError {
  constructor(readonly issues: ConsistencyIssue[]) {
    super(
      'CONSISTENCY',
      `Rejected chunk batch: ${issues.map((i) => `${i.chunkId} (${i.problem}${i.detail ? `: ${i.detail}` : ''})`).join(', ')}`
    );
  }
}

export class CollaboratorError extends GantryError {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: ErrorOptions
  ) {
    super('COLLABORATOR', message, options);
  }
}

export class InvalidTransitionError extends GantryError {
  constructor(entity: string, id: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Illegal ${entity} transition for ${id}: ${from} -> ${to}`);
  }
}

export class NotFoundError extends GantryError {
  constructor(entity: string, id: string) {
    super('NOT_FOUND', `Unknown ${entity}: ${id}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
