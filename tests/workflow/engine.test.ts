import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  InvalidInputError,
  InvalidStateError,
  PersistenceError,
  SessionNotFoundError,
  WorkflowError,
} from '../../src/errors.js';
import { FileCheckpointStore, type CheckpointBuilder, type CheckpointStore } from '../../src/sessions/checkpointStore.js';
import type { CheckpointDraft } from '../../src/sessions/types.js';
import { WorkflowEngine } from '../../src/workflow/engine.js';
import {
  ScriptedGenerator,
  StubSearch,
  hangingSearch,
  makeEngine,
  roleOf,
  silentLogger,
  steppingClock,
} from '../support/stubs.js';

/** Delegates to a file store but fails the Nth commit (1-based). */
class FlakyStore implements CheckpointStore {
  private commits = 0;

  constructor(
    private readonly inner: FileCheckpointStore,
    private readonly failOn: number,
  ) {}

  append(sessionId: string, draft: CheckpointDraft) {
    return this.commit(sessionId, () => draft);
  }

  commit(sessionId: string, build: CheckpointBuilder) {
    this.commits += 1;
    if (this.commits === this.failOn) {
      return Promise.reject(new PersistenceError('disk full', { sessionId }));
    }
    return this.inner.commit(sessionId, build);
  }

  latest(sessionId: string) {
    return this.inner.latest(sessionId);
  }

  list(sessionId: string) {
    return this.inner.list(sessionId);
  }

  restore(sessionId: string, sequence: number) {
    return this.inner.restore(sessionId, sequence);
  }

  listSessions() {
    return this.inner.listSessions();
  }
}

describe('WorkflowEngine', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rw-engine-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('happy path with approval', () => {
    it('suspends on a passing review and completes after approval', async () => {
      const { engine } = makeEngine(tmpDir, { generator: new ScriptedGenerator({ scores: [0.9] }) });

      const id = await engine.start('What is X?');
      const suspended = await engine.getStatus(id);
      expect(suspended.status).toBe('awaiting_approval');
      expect(suspended.pending_decision).toMatchObject({ reason: 'quality_met', score: 0.9, revision_count: 0 });
      expect(suspended.final_answer).toBeNull();

      const done = await engine.resume(id, { kind: 'approve' });
      expect(done.status).toBe('completed');
      expect(done.final_answer).toBe('Final answer [1]');
      expect(done.pending_decision).toBeNull();

      const nodes = (await engine.listCheckpoints(id)).map((c) => c.node);
      expect(nodes).toEqual(['initial', 'plan', 'research', 'review', 'decision', 'write']);
    });

    it('records plan steps and findings for every step', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.plan_steps.map((s) => [s.id, s.search_query, s.completed_pass])).toEqual([
        ['step-1', 'topic background', 0],
        ['step-2', 'topic recent results', 0],
      ]);
      expect(session.findings['step-1']?.snippets).toEqual([
        { title: 'topic background', url: 'https://example.com/topic%20background', content: 'About topic background', pass: 0 },
      ]);
      expect(session.findings['step-2']?.attempts).toBe(1);
    });
  });

  describe('self-correction loop', () => {
    it('proceeds to synthesis once the revision budget is spent', async () => {
      const generator = new ScriptedGenerator({ scores: [0.5] });
      const { engine } = makeEngine(tmpDir, { generator, defaults: { hitl_enabled: false } });

      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.status).toBe('completed');
      expect(session.revision_count).toBe(3);
      expect(generator.calls('review')).toBe(4);
      expect(generator.calls('write')).toBe(1);
    });

    it('terminates with an always-zero reviewer and never exceeds max_revisions', async () => {
      const generator = new ScriptedGenerator({ scores: [0] });
      const { engine } = makeEngine(tmpDir, { generator, defaults: { hitl_enabled: false, max_revisions: 2 } });

      const id = await engine.start('What is X?');
      const checkpoints = await engine.listCheckpoints(id);
      const revisions = await Promise.all(
        checkpoints.map(async (c) => (await engine.restoreCheckpoint(id, c.sequence)).session.revision_count),
      );

      expect((await engine.getStatus(id)).status).toBe('completed');
      expect(Math.max(...revisions)).toBe(2);
      expect(generator.calls('review')).toBe(3);
    });

    it('refines search queries on later passes', async () => {
      const search = new StubSearch();
      const { engine } = makeEngine(tmpDir, {
        generator: new ScriptedGenerator({ scores: [0.5, 0.9] }),
        search,
        defaults: { hitl_enabled: false },
      });

      await engine.start('What is X?');
      expect(search.queries).toEqual([
        'topic background',
        'topic recent results',
        'topic background add benchmarks',
        'topic recent results add benchmarks',
      ]);
    });

    it('stops early once a later review passes', async () => {
      const generator = new ScriptedGenerator({ scores: [0.5, 0.85] });
      const { engine } = makeEngine(tmpDir, { generator });

      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);
      expect(session.status).toBe('awaiting_approval');
      expect(session.revision_count).toBe(1);
      expect(session.research_pass).toBe(1);
    });
  });

  it('goes straight from review to writing when HITL is disabled', async () => {
    const { engine } = makeEngine(tmpDir, { defaults: { hitl_enabled: false } });

    const id = await engine.start('What is X?');
    const checkpoints = await engine.listCheckpoints(id);

    expect(checkpoints.map((c) => c.stage)).toEqual(['planning', 'researching', 'reviewing', 'writing', 'completed']);
    expect(checkpoints.some((c) => c.status === 'awaiting_approval')).toBe(false);
  });

  it('per-session options override the engine defaults', async () => {
    const { engine } = makeEngine(tmpDir);
    const id = await engine.start('What is X?', { options: { hitl_enabled: false } });
    const session = await engine.getStatus(id);
    expect(session.status).toBe('completed');
    expect(session.options).toEqual({ max_revisions: 3, quality_threshold: 0.8, hitl_enabled: false, timeout_ms: 5_000 });
  });

  describe('resume', () => {
    it('rejects a completed session without writing a checkpoint', async () => {
      const { engine } = makeEngine(tmpDir, { defaults: { hitl_enabled: false } });
      const id = await engine.start('What is X?');
      const before = await engine.listCheckpoints(id);
      const snapshot = await engine.getStatus(id);

      await expect(engine.resume(id, { kind: 'approve' })).rejects.toBeInstanceOf(InvalidStateError);

      expect(await engine.listCheckpoints(id)).toEqual(before);
      expect(await engine.getStatus(id)).toEqual(snapshot);
    });

    it('feedback runs another pass with the note merged into the review', async () => {
      const generator = new ScriptedGenerator({ scores: [0.9] });
      const { engine } = makeEngine(tmpDir, { generator });
      const id = await engine.start('What is X?');

      const session = await engine.resume(id, { kind: 'feedback', text: 'Cover pricing' });

      expect(session.status).toBe('awaiting_approval');
      expect(session.revision_count).toBe(1);
      expect(session.review?.feedback).toBe('Needs more depth');
      expect(generator.calls('review')).toBe(2);
      const decisionCheckpoint = await engine.restoreCheckpoint(id, 4);
      expect(decisionCheckpoint.node).toBe('decision');
      expect(decisionCheckpoint.session.review?.feedback).toBe('Needs more depth\n\nHuman feedback: Cover pricing');
    });

    it('steers later searches and the answer by the feedback text', async () => {
      const search = new StubSearch();
      const generator = new ScriptedGenerator({ scores: [0.9] });
      const { engine } = makeEngine(tmpDir, { generator, search });
      const id = await engine.start('What is X?');

      await engine.resume(id, { kind: 'feedback', text: 'Cover pricing' });
      const session = await engine.resume(id, { kind: 'approve' });

      expect(session.status).toBe('completed');
      expect(session.human_feedback).toEqual(['Cover pricing']);
      expect(search.queries.slice(2)).toEqual([
        'topic background Cover pricing; add benchmarks',
        'topic recent results Cover pricing; add benchmarks',
      ]);
      const reviews = generator.requests.filter((r) => roleOf(r) === 'review');
      expect(reviews[1]?.prompt).toContain('Human feedback:\n- Cover pricing\n');
      const write = generator.requests.find((r) => roleOf(r) === 'write');
      expect(write?.prompt).toContain('Human feedback:\n- Cover pricing\n');
    });

    it('allows exactly one feedback pass at the revision cap', async () => {
      const { engine } = makeEngine(tmpDir, {
        generator: new ScriptedGenerator({ scores: [0.9] }),
        defaults: { max_revisions: 0 },
      });
      const id = await engine.start('What is X?');

      const once = await engine.resume(id, { kind: 'feedback', text: 'More sources' });
      expect(once.status).toBe('awaiting_approval');
      expect(once.revision_count).toBe(0);
      expect(once.feedback_override_used).toBe(true);

      await expect(engine.resume(id, { kind: 'feedback', text: 'Again' })).rejects.toBeInstanceOf(InvalidStateError);
      expect((await engine.resume(id, { kind: 'approve' })).status).toBe('completed');
    });

    it('reject aborts the session', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');

      const session = await engine.resume(id, { kind: 'reject', reason: 'Wrong topic' });
      expect(session.status).toBe('aborted');
      expect(session.error?.message).toBe('Wrong topic');
    });

    it('fails with NotFound for an unknown session', async () => {
      const { engine } = makeEngine(tmpDir);
      await expect(engine.resume('nope', { kind: 'approve' })).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });

  describe('checkpoints', () => {
    it('numbers checkpoints from 0 without gaps', async () => {
      const { engine } = makeEngine(tmpDir, { generator: new ScriptedGenerator({ scores: [0.2, 0.9] }) });
      const id = await engine.start('What is X?');
      await engine.resume(id, { kind: 'approve' });

      const sequences = (await engine.listCheckpoints(id)).map((c) => c.sequence);
      expect(sequences).toEqual(sequences.map((_, i) => i));
    });

    it('getStatus is idempotent and writes nothing', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');
      const before = await engine.listCheckpoints(id);

      const a = await engine.getStatus(id);
      const b = await engine.getStatus(id);
      expect(a).toEqual(b);
      expect(await engine.listCheckpoints(id)).toEqual(before);
    });

    it('continueFrom appends a copy and runs on, keeping later history', async () => {
      const generator = new ScriptedGenerator({ scores: [0.9] });
      const { engine } = makeEngine(tmpDir, { generator });
      const id = await engine.start('What is X?');
      await engine.resume(id, { kind: 'approve' });

      const session = await engine.continueFrom(id, 2);

      const checkpoints = await engine.listCheckpoints(id);
      expect(checkpoints.map((c) => c.node)).toEqual([
        'initial',
        'plan',
        'research',
        'review',
        'decision',
        'write',
        'restore',
        'review',
      ]);
      expect(checkpoints[6]).toMatchObject({ sequence: 6, restored_from: 2, stage: 'reviewing' });
      expect(checkpoints[5]?.status).toBe('completed');
      expect(session.status).toBe('awaiting_approval');
      expect(generator.calls('plan')).toBe(1);
    });

    it('continueFrom a suspended checkpoint does not run', async () => {
      const { engine, generator } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');
      const calls = generator.requests.length;

      const session = await engine.continueFrom(id, 3);
      expect(session.status).toBe('awaiting_approval');
      expect(generator.requests.length).toBe(calls);
    });

    it('refuses a second restore while the first is running', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');

      const first = engine.continueFrom(id, 2);
      await expect(engine.continueFrom(id, 2)).rejects.toBeInstanceOf(InvalidStateError);
      await expect(engine.rewind(id, 1)).rejects.toBeInstanceOf(InvalidStateError);

      expect((await first).status).toBe('awaiting_approval');
      const nodes = (await engine.listCheckpoints(id)).map((c) => c.node);
      expect(nodes.filter((node) => node === 'restore')).toHaveLength(1);
    });

    it('rewind answers with the restored session and runs on', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');

      const restored = await engine.rewind(id, 2);
      expect(restored).toMatchObject({ status: 'running', stage: 'reviewing' });

      await engine.whenIdle(id);
      expect((await engine.getStatus(id)).status).toBe('awaiting_approval');
    });

    it('restoreCheckpoint fails for an unknown sequence', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');
      await expect(engine.restoreCheckpoint(id, 99)).rejects.toMatchObject({ kind: 'not_found', sequence: 99 });
    });

    it('listCheckpoints fails for an unknown session', async () => {
      const { engine } = makeEngine(tmpDir);
      await expect(engine.listCheckpoints('ghost')).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });

  describe('failures', () => {
    it('records a failed checkpoint when planning yields no steps', async () => {
      const { engine } = makeEngine(tmpDir, { generator: new ScriptedGenerator({ raw: { plan: '{"steps": []}' } }) });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.status).toBe('failed');
      expect(session.error).toEqual({ kind: 'planning_failed', message: 'planner returned no steps', node: 'plan', sequence: 0 });
    });

    it('records a malformed review', async () => {
      const { engine } = makeEngine(tmpDir, {
        generator: new ScriptedGenerator({ raw: { review: '{"score": 1.5, "feedback": "great"}' } }),
      });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.error?.kind).toBe('malformed_review');
      expect(session.error?.message).toBe('review score 1.5 is outside [0, 1]');
      expect(session.review).toBeNull();
    });

    it('keeps going when some searches fail', async () => {
      const search = new StubSearch(async (query) => {
        if (query.includes('recent')) throw new Error('boom');
        return [{ title: 'ok', url: 'https://example.com/ok', content: 'fine' }];
      });
      const { engine } = makeEngine(tmpDir, { search });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.status).toBe('awaiting_approval');
      expect(session.findings['step-2']).toMatchObject({ snippets: [], last_error: 'search for step-2 failed: boom' });
      expect(session.findings['step-1']?.last_error).toBeNull();
    });

    it('fails the session once every pass comes back empty and the budget is spent', async () => {
      const search = new StubSearch(async () => []);
      const { engine, generator } = makeEngine(tmpDir, { search });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.status).toBe('failed');
      expect(session.revision_count).toBe(3);
      expect(session.error).toMatchObject({ kind: 'collaborator', node: 'review', sequence: 8 });
      expect(search.queries).toHaveLength(8);
      expect(generator.calls('review')).toBe(0);
    });

    it('retries research after a search outage while budget remains', async () => {
      let calls = 0;
      const search = new StubSearch(async (query) => {
        calls += 1;
        if (calls <= 2) throw new Error('service unavailable');
        return [{ title: query, url: `https://example.com/${calls}`, content: `About ${query}` }];
      });
      const { engine, generator } = makeEngine(tmpDir, { search, defaults: { hitl_enabled: false } });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      expect(session.status).toBe('completed');
      expect(session.revision_count).toBe(1);
      expect(search.queries).toEqual([
        'topic background',
        'topic recent results',
        'topic background',
        'topic recent results',
      ]);
      expect(session.findings['step-1']).toMatchObject({ attempts: 2, last_error: null });
      expect(generator.calls('review')).toBe(1);
    });

    it('turns a collaborator timeout into a failed checkpoint', async () => {
      const generator = new ScriptedGenerator();
      const hanging = new StubSearch(hangingSearch);
      const { engine } = makeEngine(tmpDir, {
        generator,
        search: hanging,
        defaults: { timeout_ms: 1_000, max_revisions: 0 },
      });
      const id = await engine.start('What is X?');
      const session = await engine.getStatus(id);

      // Research records per-step timeouts; review then has nothing to work with.
      expect(session.findings['step-1']?.last_error).toBe('search for step-1 timed out after 1000ms');
      expect(session.status).toBe('failed');
    });

    it('refuses to write when the review gate does not hold', async () => {
      const { engine, store, generator } = makeEngine(tmpDir);
      const created = await engine.create('What is X?');
      await store.append(created.id, {
        node: 'review',
        session: {
          ...created,
          stage: 'writing',
          review: { score: 0.1, feedback: 'weak', suggestions: [], revision: 0 },
        },
      });

      const session = await engine.run(created.id);
      expect(session.error).toMatchObject({ kind: 'invalid_state', message: 'Review gate not met; refusing to write' });
      expect(generator.calls('write')).toBe(0);
    });

    it('propagates PersistenceError and leaves the last good checkpoint current', async () => {
      const inner = new FileCheckpointStore(tmpDir);
      const engine = new WorkflowEngine({
        store: new FlakyStore(inner, 2),
        collaborators: { generator: new ScriptedGenerator(), search: new StubSearch() },
        logger: silentLogger(),
        now: steppingClock(),
        generateId: () => 'flaky',
      });

      await expect(engine.start('What is X?')).rejects.toBeInstanceOf(PersistenceError);
      const latest = await inner.latest('flaky');
      expect(latest?.sequence).toBe(0);
      expect(latest?.session.stage).toBe('planning');
    });
  });

  describe('abort', () => {
    it('stops an in-flight run and discards its late output', async () => {
      const search = new StubSearch(hangingSearch);
      const { engine } = makeEngine(tmpDir, { search });
      const created = await engine.create('What is X?');
      const run = engine.run(created.id);

      await vi.waitFor(() => {
        expect(search.queries).toHaveLength(2);
      });
      const aborted = await engine.abort(created.id, 'User cancelled');
      expect(aborted.status).toBe('aborted');

      const final = await run;
      expect(final.status).toBe('aborted');
      expect(final.error?.message).toBe('User cancelled');
      const nodes = (await engine.listCheckpoints(created.id)).map((c) => c.node);
      expect(nodes).toEqual(['initial', 'plan', 'abort']);
    });

    it('aborts a suspended session, after which decisions are refused', async () => {
      const { engine } = makeEngine(tmpDir);
      const id = await engine.start('What is X?');

      expect((await engine.abort(id)).error?.message).toBe('Aborted by request');
      await expect(engine.resume(id, { kind: 'approve' })).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('refuses to abort a terminal session', async () => {
      const { engine } = makeEngine(tmpDir, { defaults: { hitl_enabled: false } });
      const id = await engine.start('What is X?');
      await expect(engine.abort(id)).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('sessions', () => {
    it('refuses a second concurrent run of the same session', async () => {
      const search = new StubSearch(hangingSearch);
      const { engine } = makeEngine(tmpDir, { search });
      const created = await engine.create('What is X?');
      const run = engine.run(created.id);

      await expect(engine.run(created.id)).rejects.toBeInstanceOf(InvalidStateError);
      expect(engine.activeSessionIds()).toEqual([created.id]);

      await engine.abort(created.id);
      await run;
      await engine.whenIdle(created.id);
      expect(engine.activeSessionIds()).toEqual([]);
    });

    it('rejects a duplicate session id', async () => {
      const { engine } = makeEngine(tmpDir);
      await engine.create('What is X?', { sessionId: 'mine' });
      await expect(engine.create('What is Y?', { sessionId: 'mine' })).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('rejects out-of-range options', async () => {
      const { engine } = makeEngine(tmpDir);
      await expect(engine.create('What is X?', { options: { quality_threshold: 2 } })).rejects.toBeInstanceOf(
        InvalidInputError,
      );
    });

    it('getStatus fails with NotFound for an unknown session', async () => {
      const { engine } = makeEngine(tmpDir);
      await expect(engine.getStatus('ghost')).rejects.toBeInstanceOf(WorkflowError);
      await expect(engine.getStatus('ghost')).rejects.toMatchObject({ kind: 'not_found' });
    });

    it('recoverInterrupted relaunches sessions left running', async () => {
      const { engine } = makeEngine(tmpDir);
      const created = await engine.create('What is X?');

      expect(await engine.recoverInterrupted()).toEqual([created.id]);
      await engine.whenIdle(created.id);
      expect((await engine.getStatus(created.id)).status).toBe('awaiting_approval');
      expect(await engine.recoverInterrupted()).toEqual([]);
    });

    it('lists session summaries', async () => {
      const { engine } = makeEngine(tmpDir, { defaults: { hitl_enabled: false } });
      const id = await engine.start('What is X?');
      const sessions = await engine.listSessions();
      expect(sessions).toHaveLength(1);
      expect(sessions[0]).toMatchObject({ session_id: id, query: 'What is X?', status: 'completed', sequence: 4 });
    });
  });
});
