import type { Collaborators } from '../../collaborators/types.js';
import type { Logger } from '../../logging/logger.js';
import type { NodeName, Session } from '../../sessions/types.js';

export interface NodeContext {
  collaborators: Collaborators;
  /** Aborted when the session is aborted. */
  signal: AbortSignal;
  logger: Logger;
  now: () => string;
}

/**
 * A processing step. Implementations return a new session value and never
 * mutate the one they are given.
 */
export interface WorkflowNode {
  readonly name: NodeName;
  execute(session: Session, context: NodeContext): Promise<Session>;
}
