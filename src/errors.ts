export type ErrorKind =
  | 'collaborator'
  | 'planning_failed'
  | 'malformed_review'
  | 'persistence'
  | 'invalid_state'
  | 'not_found'
  | 'invalid_input'
  | 'aborted';

export interface ErrorContext {
  sessionId?: string;
  sequence?: number | null;
  cause?: unknown;
}

/**
 * Base of the workflow error taxonomy. Callers only rely on `kind`, the
 * message, and the session/sequence the failure was observed at.
 */
export class WorkflowError extends Error {
  readonly kind: ErrorKind;
  readonly sessionId: string | null;
  readonly sequence: number | null;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'WorkflowError';
    this.kind = kind;
    this.sessionId = context.sessionId ?? null;
    this.sequence = context.sequence ?? null;
  }

  toJSON(): { error: ErrorKind; message: string; session_id: string | null; sequence: number | null } {
    return {
      error: this.kind,
      message: this.message,
      session_id: this.sessionId,
      sequence: this.sequence,
    };
  }
}

/** External service failed, timed out, or returned output that could not be read. */
export class CollaboratorError extends WorkflowError {
  constructor(message: string, context: ErrorContext = {}) {
    super('collaborator', message, context);
    this.name = 'CollaboratorError';
  }
}

export class PlanningFailedError extends WorkflowError {
  constructor(message: string, context: ErrorContext = {}) {
    super('planning_failed', message, context);
    this.name = 'PlanningFailedError';
  }
}

export class MalformedReviewError extends WorkflowError {
  constructor(message: string, context: ErrorContext = {}) {
    super('malformed_review', message, context);
    this.name = 'MalformedReviewError';
  }
}

export class PersistenceError extends WorkflowError {
  constructor(message: string, context: ErrorContext = {}) {
    super('persistence', message, context);
    this.name = 'PersistenceError';
  }
}

export class InvalidStateError extends WorkflowError {
  constructor(message: string, context: ErrorContext = {}) {
    super('invalid_state', message, context);
    this.name = 'InvalidStateError';
  }
}

export class SessionNotFoundError extends WorkflowError {
  constructor(sessionId: string) {
    super('not_found', `Session ${sessionId} not found`, { sessionId });
    this.name = 'SessionNotFoundError';
  }
}

export class InvalidInputError extends WorkflowError {
  readonly errors: string[];

  constructor(errors: string[], context: ErrorContext = {}) {
    super('invalid_input', errors.join('; '), context);
    this.name = 'InvalidInputError';
    this.errors = errors;
  }
}

/** Raised inside a run once its session has been aborted; never recorded as a failure. */
export class SessionAbortedError extends WorkflowError {
  constructor(sessionId: string) {
    super('aborted', `Session ${sessionId} was aborted`, { sessionId });
    this.name = 'SessionAbortedError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
