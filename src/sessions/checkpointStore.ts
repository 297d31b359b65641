import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InvalidInputError, PersistenceError, errorMessage } from '../errors.js';
import type {
  Checkpoint,
  CheckpointDraft,
  CheckpointSummary,
  SessionSummary,
} from './types.js';

const SESSION_ID_PATTERN = /^[a-zA-Z0-9_-]{1,128}$/;
const CHECKPOINT_FILE_PATTERN = /^(\d{9})\.json$/;

export function validateSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new InvalidInputError([`Invalid session ID: must match ${SESSION_ID_PATTERN.source}`], { sessionId });
  }
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function checkpointFileName(sequence: number): string {
  return `${String(sequence).padStart(9, '0')}.json`;
}

/**
 * Builds the draft for the next checkpoint from the latest committed one.
 * Throwing aborts the write; nothing is persisted.
 */
export type CheckpointBuilder = (latest: Checkpoint | null) => CheckpointDraft;

export interface CheckpointStore {
  append(sessionId: string, draft: CheckpointDraft): Promise<Checkpoint>;
  commit(sessionId: string, build: CheckpointBuilder): Promise<Checkpoint>;
  latest(sessionId: string): Promise<Checkpoint | null>;
  list(sessionId: string): Promise<CheckpointSummary[]>;
  restore(sessionId: string, sequence: number): Promise<Checkpoint | null>;
  listSessions(): Promise<SessionSummary[]>;
}

/**
 * Append-only checkpoint log on the local filesystem, one JSON file per
 * checkpoint under `<baseDir>/<sessionId>/checkpoints/`. Writes for a session
 * are serialised; a checkpoint is visible only after its file is synced and
 * renamed into place.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly baseDir: string) {}

  private withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.locks.get(sessionId) ?? Promise.resolve();
    const next = prev.then(fn, fn);
    const cleanup = next.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(sessionId, cleanup);
    void cleanup.then(() => {
      if (this.locks.get(sessionId) === cleanup) {
        this.locks.delete(sessionId);
      }
    });
    return next;
  }

  private checkpointDir(sessionId: string): string {
    return path.join(this.baseDir, sessionId, 'checkpoints');
  }

  append(sessionId: string, draft: CheckpointDraft): Promise<Checkpoint> {
    return this.commit(sessionId, () => draft);
  }

  commit(sessionId: string, build: CheckpointBuilder): Promise<Checkpoint> {
    validateSessionId(sessionId);
    return this.withLock(sessionId, async () => {
      const latest = await this.readLatest(sessionId);
      const draft = build(latest);
      if (draft.session.id !== sessionId) {
        throw new PersistenceError(`Checkpoint session id ${draft.session.id} does not match ${sessionId}`, {
          sessionId,
        });
      }

      const checkpoint: Checkpoint = {
        session_id: sessionId,
        sequence: latest ? latest.sequence + 1 : 0,
        timestamp: new Date().toISOString(),
        node: draft.node,
        restored_from: draft.restored_from ?? null,
        session: draft.session,
      };
      await this.writeCheckpoint(checkpoint);
      return checkpoint;
    });
  }

  private async writeCheckpoint(checkpoint: Checkpoint): Promise<void> {
    const dir = this.checkpointDir(checkpoint.session_id);
    const filePath = path.join(dir, checkpointFileName(checkpoint.sequence));
    const tmpPath = `${filePath}.tmp`;
    try {
      await fs.mkdir(dir, { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(checkpoint, null, 2));
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch(() => undefined);
      throw new PersistenceError(`Failed to write checkpoint: ${errorMessage(err)}`, {
        sessionId: checkpoint.session_id,
        sequence: checkpoint.sequence,
        cause: err,
      });
    }
  }

  private async sequences(sessionId: string): Promise<number[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.checkpointDir(sessionId));
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw new PersistenceError(`Failed to list checkpoints: ${errorMessage(err)}`, { sessionId, cause: err });
    }

    const sequences: number[] = [];
    for (const entry of entries) {
      const match = CHECKPOINT_FILE_PATTERN.exec(entry);
      if (match) sequences.push(Number(match[1]));
    }
    return sequences.sort((a, b) => a - b);
  }

  private async readCheckpoint(sessionId: string, sequence: number): Promise<Checkpoint | null> {
    const filePath = path.join(this.checkpointDir(sessionId), checkpointFileName(sequence));
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return null;
      throw new PersistenceError(`Failed to read checkpoint: ${errorMessage(err)}`, { sessionId, sequence, cause: err });
    }
    try {
      return JSON.parse(data) as Checkpoint;
    } catch (err) {
      throw new PersistenceError(`Checkpoint ${sequence} is corrupt: ${errorMessage(err)}`, {
        sessionId,
        sequence,
        cause: err,
      });
    }
  }

  private async readLatest(sessionId: string): Promise<Checkpoint | null> {
    const sequences = await this.sequences(sessionId);
    const last = sequences.at(-1);
    return last === undefined ? null : this.readCheckpoint(sessionId, last);
  }

  async latest(sessionId: string): Promise<Checkpoint | null> {
    validateSessionId(sessionId);
    return this.readLatest(sessionId);
  }

  async list(sessionId: string): Promise<CheckpointSummary[]> {
    validateSessionId(sessionId);
    const summaries: CheckpointSummary[] = [];
    for (const sequence of await this.sequences(sessionId)) {
      const checkpoint = await this.readCheckpoint(sessionId, sequence);
      if (!checkpoint) continue;
      summaries.push({
        sequence: checkpoint.sequence,
        timestamp: checkpoint.timestamp,
        node: checkpoint.node,
        status: checkpoint.session.status,
        stage: checkpoint.session.stage,
        restored_from: checkpoint.restored_from,
      });
    }
    return summaries;
  }

  async restore(sessionId: string, sequence: number): Promise<Checkpoint | null> {
    validateSessionId(sessionId);
    if (!Number.isInteger(sequence) || sequence < 0) return null;
    return this.readCheckpoint(sessionId, sequence);
  }

  async listSessions(): Promise<SessionSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw new PersistenceError(`Failed to list sessions: ${errorMessage(err)}`, { cause: err });
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries.sort()) {
      if (!SESSION_ID_PATTERN.test(entry)) continue;
      const latest = await this.readLatest(entry);
      if (!latest) continue;
      summaries.push({
        session_id: latest.session_id,
        query: latest.session.query,
        status: latest.session.status,
        stage: latest.session.stage,
        revision_count: latest.session.revision_count,
        sequence: latest.sequence,
        updated_at: latest.timestamp,
      });
    }
    return summaries;
  }
}
