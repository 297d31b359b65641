import { v4 as uuidv4 } from 'uuid';
import type { Collaborators } from '../collaborators/types.js';
import {
  InvalidInputError,
  InvalidStateError,
  SessionAbortedError,
  SessionNotFoundError,
  WorkflowError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { redact } from '../security/redaction.js';
import { validateSessionId } from '../sessions/checkpointStore.js';
import type { CheckpointStore } from '../sessions/checkpointStore.js';
import {
  isTerminal,
  type Checkpoint,
  type CheckpointSummary,
  type Decision,
  type NodeName,
  type Session,
  type SessionSummary,
  type WorkflowOptions,
} from '../sessions/types.js';
import { DEFAULT_NODES, type NodeContext, type WorkflowNode } from './nodes/index.js';
import { DEFAULT_WORKFLOW_OPTIONS, resolveWorkflowOptions } from './options.js';
import { STAGE_NODE, advance, applyDecision, canSynthesize } from './routing.js';
import { SessionGate } from './sessionGate.js';

export interface WorkflowEngineDeps {
  store: CheckpointStore;
  collaborators: Collaborators;
  logger: Logger;
  defaults?: WorkflowOptions;
  nodes?: Record<NodeName, WorkflowNode>;
  now?: () => string;
  generateId?: () => string;
}

export interface StartOptions {
  sessionId?: string;
  options?: Partial<WorkflowOptions>;
}

/** A run's commit found a newer checkpoint than the one its node started from. */
class StaleCheckpointError extends InvalidStateError {
  constructor(sessionId: string, expected: number, actual: number | null) {
    super(`Expected checkpoint ${expected} to be latest, found ${actual ?? 'none'}`, { sessionId, sequence: actual });
    this.name = 'StaleCheckpointError';
  }
}

export function createInitialSession(id: string, query: string, options: WorkflowOptions, now: string): Session {
  return {
    id,
    query,
    status: 'running',
    stage: 'planning',
    revision_count: 0,
    research_pass: 0,
    plan_steps: [],
    findings: {},
    review: null,
    human_feedback: [],
    final_answer: null,
    pending_decision: null,
    options,
    feedback_override_used: false,
    error: null,
    created_at: now,
    updated_at: now,
  };
}

/**
 * Drives sessions through plan → research → review → (research | approval |
 * write). Every node result is committed as a checkpoint before the next node
 * starts; the checkpoint log, not the call stack, carries a session across
 * suspensions, restarts and aborts.
 */
export class WorkflowEngine {
  private readonly store: CheckpointStore;
  private readonly collaborators: Collaborators;
  private readonly logger: Logger;
  private readonly defaults: WorkflowOptions;
  private readonly nodes: Record<NodeName, WorkflowNode>;
  private readonly now: () => string;
  private readonly generateId: () => string;
  private readonly gate = new SessionGate();

  constructor(deps: WorkflowEngineDeps) {
    this.store = deps.store;
    this.collaborators = deps.collaborators;
    this.logger = deps.logger.child({ component: 'engine' });
    this.defaults = deps.defaults ?? DEFAULT_WORKFLOW_OPTIONS;
    this.nodes = deps.nodes ?? DEFAULT_NODES;
    this.now = deps.now ?? (() => new Date().toISOString());
    this.generateId = deps.generateId ?? uuidv4;
  }

  /** Records checkpoint 0 for a new session without running it. */
  async create(query: string, start: StartOptions = {}): Promise<Session> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new InvalidInputError(['query is required']);
    }
    const sessionId = start.sessionId ?? this.generateId();
    validateSessionId(sessionId);
    const options = resolveWorkflowOptions(start.options, this.defaults);
    const session = createInitialSession(sessionId, trimmed, options, this.now());

    const checkpoint = await this.store.commit(sessionId, (latest) => {
      if (latest) {
        throw new InvalidStateError(`Session ${sessionId} already exists`, { sessionId, sequence: latest.sequence });
      }
      return { node: 'initial', session };
    });
    this.logger.info({ sessionId, options }, 'session created');
    return checkpoint.session;
  }

  /** Creates a session and runs it until it completes, fails or suspends. */
  async start(query: string, start: StartOptions = {}): Promise<string> {
    const session = await this.create(query, start);
    await this.run(session.id);
    return session.id;
  }

  /** Continues a session from its latest checkpoint until it suspends or terminates. */
  run(sessionId: string): Promise<Session> {
    const run = this.gate.run(sessionId, (signal) => this.drive(sessionId, signal));
    if (!run) {
      return Promise.reject(new InvalidStateError(`Session ${sessionId} is already running`, { sessionId }));
    }
    return run;
  }

  /** Starts `run` without waiting; failures are logged. */
  launch(sessionId: string): void {
    this.run(sessionId).catch((err: unknown) => {
      this.logger.error({ sessionId, err }, 'background run failed');
    });
  }

  async getStatus(sessionId: string): Promise<Session> {
    return (await this.requireLatest(sessionId)).session;
  }

  /** Applies an approval decision and runs on from it. */
  async resume(sessionId: string, decision: Decision): Promise<Session> {
    const session = await this.decide(sessionId, decision);
    if (session.status !== 'running') return session;
    return this.run(sessionId);
  }

  /**
   * Commits the checkpoint for an approval decision without running further.
   * Fails with `InvalidState`, writing nothing, unless the session is awaiting approval.
   */
  async decide(sessionId: string, decision: Decision): Promise<Session> {
    validateSessionId(sessionId);
    this.assertIdle(sessionId);
    const checkpoint = await this.store.commit(sessionId, (latest) => {
      if (!latest) throw new SessionNotFoundError(sessionId);
      if (latest.session.status !== 'awaiting_approval') {
        throw new InvalidStateError(`Session is not awaiting approval (status: ${latest.session.status})`, {
          sessionId,
          sequence: latest.sequence,
        });
      }
      return { node: 'decision', session: applyDecision(latest.session, decision, this.now()) };
    });
    this.logger.info({ sessionId, decision: decision.kind, sequence: checkpoint.sequence }, 'decision applied');
    return checkpoint.session;
  }

  /**
   * Records an `aborted` checkpoint and stops any in-flight run. Output the
   * run produces afterwards is discarded.
   */
  async abort(sessionId: string, reason = 'Aborted by request'): Promise<Session> {
    validateSessionId(sessionId);
    const checkpoint = await this.store.commit(sessionId, (latest) => {
      if (!latest) throw new SessionNotFoundError(sessionId);
      if (isTerminal(latest.session.status)) {
        throw new InvalidStateError(`Session already ${latest.session.status}`, { sessionId, sequence: latest.sequence });
      }
      return {
        node: 'abort',
        session: {
          ...latest.session,
          status: 'aborted',
          stage: 'aborted',
          pending_decision: null,
          error: { kind: 'aborted', message: reason, node: 'abort', sequence: latest.sequence },
          updated_at: this.now(),
        },
      };
    });
    const interrupted = this.gate.abort(sessionId);
    this.logger.warn({ sessionId, sequence: checkpoint.sequence, interrupted }, 'session aborted');
    return checkpoint.session;
  }

  async listCheckpoints(sessionId: string): Promise<CheckpointSummary[]> {
    const checkpoints = await this.store.list(sessionId);
    if (checkpoints.length === 0) throw new SessionNotFoundError(sessionId);
    return checkpoints;
  }

  /** Read-only view of a past checkpoint. */
  async restoreCheckpoint(sessionId: string, sequence: number): Promise<Checkpoint> {
    const checkpoint = await this.store.restore(sessionId, sequence);
    if (!checkpoint) {
      throw new WorkflowError('not_found', `Checkpoint ${sequence} not found for session ${sessionId}`, {
        sessionId,
        sequence,
      });
    }
    return checkpoint;
  }

  /**
   * Time travel: appends a copy of a past checkpoint as the newest one and
   * runs on from it. Later history is kept.
   */
  continueFrom(sessionId: string, sequence: number): Promise<Session> {
    return this.restoreAndRun(sessionId, sequence, () => undefined);
  }

  /**
   * `continueFrom` for callers that answer early: resolves with the restored
   * session once its copy is committed; the run goes on in the background.
   */
  rewind(sessionId: string, sequence: number): Promise<Session> {
    return new Promise<Session>((resolve, reject) => {
      let restored = false;
      this.restoreAndRun(sessionId, sequence, (session) => {
        restored = true;
        resolve(session);
      }).catch((err: unknown) => {
        if (!restored) {
          reject(err);
          return;
        }
        this.logger.error({ sessionId, err }, 'background run failed');
      });
    });
  }

  // The restore copy is committed while holding the session's run slot, so a
  // concurrent run or restore is refused before anything is written.
  private restoreAndRun(
    sessionId: string,
    sequence: number,
    onRestored: (session: Session) => void,
  ): Promise<Session> {
    const run = this.gate.run(sessionId, async (signal) => {
      const source = await this.restoreCheckpoint(sessionId, sequence);
      const checkpoint = await this.store.commit(sessionId, () => ({
        node: 'restore',
        restored_from: source.sequence,
        session: { ...source.session, updated_at: this.now() },
      }));
      this.logger.info({ sessionId, from: sequence, sequence: checkpoint.sequence }, 'session restored');
      onRestored(checkpoint.session);
      if (checkpoint.session.status !== 'running') return checkpoint.session;
      return this.drive(sessionId, signal);
    });
    if (!run) {
      return Promise.reject(new InvalidStateError(`Session ${sessionId} is running`, { sessionId }));
    }
    return run;
  }

  listSessions(): Promise<SessionSummary[]> {
    return this.store.listSessions();
  }

  /**
   * Relaunches sessions whose latest checkpoint is still `running`, e.g. after
   * a crash. The interrupted node is re-run from its input checkpoint.
   */
  async recoverInterrupted(): Promise<string[]> {
    const recovered: string[] = [];
    for (const summary of await this.store.listSessions()) {
      if (summary.status !== 'running' || this.gate.isActive(summary.session_id)) continue;
      recovered.push(summary.session_id);
      this.launch(summary.session_id);
    }
    if (recovered.length > 0) {
      this.logger.info({ sessions: recovered }, 'resuming interrupted sessions');
    }
    return recovered;
  }

  whenIdle(sessionId: string): Promise<void> {
    return this.gate.whenIdle(sessionId);
  }

  activeSessionIds(): string[] {
    return this.gate.activeSessionIds();
  }

  private assertIdle(sessionId: string): void {
    if (this.gate.isActive(sessionId)) {
      throw new InvalidStateError(`Session ${sessionId} is running`, { sessionId });
    }
  }

  private async requireLatest(sessionId: string): Promise<Checkpoint> {
    const latest = await this.store.latest(sessionId);
    if (!latest) throw new SessionNotFoundError(sessionId);
    return latest;
  }

  private async drive(sessionId: string, signal: AbortSignal): Promise<Session> {
    let current = await this.requireLatest(sessionId);
    const context: NodeContext = {
      collaborators: this.collaborators,
      signal,
      logger: this.logger,
      now: this.now,
    };

    for (;;) {
      if (signal.aborted) return this.latestSession(sessionId);

      const { session } = current;
      const nodeName = STAGE_NODE[session.stage];
      if (session.status !== 'running' || !nodeName) {
        if (session.status === 'awaiting_approval') {
          this.logger.info({ sessionId, sequence: current.sequence }, 'awaiting approval');
        }
        return session;
      }

      let produced: Session;
      try {
        if (nodeName === 'write' && !canSynthesize(session.review, session.revision_count, session.options)) {
          throw new InvalidStateError('Review gate not met; refusing to write', {
            sessionId,
            sequence: current.sequence,
          });
        }
        produced = await this.nodes[nodeName].execute(session, context);
      } catch (err) {
        if (signal.aborted || err instanceof SessionAbortedError) return this.latestSession(sessionId);
        current = await this.commitFailure(current, nodeName, err);
        continue;
      }

      if (signal.aborted) return this.latestSession(sessionId);

      try {
        current = await this.commitAfter(current, nodeName, advance(produced, nodeName, this.now()));
      } catch (err) {
        if (err instanceof StaleCheckpointError) return this.latestSession(sessionId);
        throw err;
      }
    }
  }

  private commitAfter(previous: Checkpoint, node: NodeName, session: Session): Promise<Checkpoint> {
    const sessionId = previous.session_id;
    return this.store
      .commit(sessionId, (latest) => {
        if (!latest || latest.sequence !== previous.sequence) {
          throw new StaleCheckpointError(sessionId, previous.sequence, latest?.sequence ?? null);
        }
        return { node, session };
      })
      .then((checkpoint) => {
        this.logger.debug(
          { sessionId, sequence: checkpoint.sequence, node, stage: checkpoint.session.stage },
          'checkpoint committed',
        );
        return checkpoint;
      });
  }

  private async commitFailure(previous: Checkpoint, node: NodeName, err: unknown): Promise<Checkpoint> {
    const kind = err instanceof WorkflowError ? err.kind : 'internal';
    const message = redact(errorMessage(err));
    this.logger.warn({ sessionId: previous.session_id, node, kind, err }, 'node failed');
    try {
      return await this.commitAfter(previous, node, {
        ...previous.session,
        status: 'failed',
        stage: 'failed',
        pending_decision: null,
        error: { kind, message, node, sequence: previous.sequence },
        updated_at: this.now(),
      });
    } catch (commitErr) {
      if (commitErr instanceof StaleCheckpointError) return this.requireLatest(previous.session_id);
      throw commitErr;
    }
  }

  private async latestSession(sessionId: string): Promise<Session> {
    return (await this.requireLatest(sessionId)).session;
  }
}
