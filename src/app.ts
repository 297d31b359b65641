import express from 'express';
import { InvalidInputError, WorkflowError } from './errors.js';
import type { Logger } from './logging/logger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import {
  parseSequence,
  readAbortReason,
  validateDecisionRequest,
  validateStartRequest,
} from './security/policy.js';
import type { Session } from './sessions/types.js';
import type { WorkflowEngine } from './workflow/engine.js';

export interface FindingSummary {
  step_id: string;
  task: string;
  snippets: number;
  sources: string[];
  last_error: string | null;
}

/** Session snapshot as served over HTTP: full state plus a per-step findings digest. */
export function presentSession(session: Session) {
  const findingsSummary: FindingSummary[] = session.plan_steps.map((step) => {
    const finding = session.findings[step.id];
    return {
      step_id: step.id,
      task: step.task,
      snippets: finding?.snippets.length ?? 0,
      sources: [...new Set((finding?.snippets ?? []).map((s) => s.url).filter(Boolean))],
      last_error: finding?.last_error ?? null,
    };
  });
  return { ...session, findings_summary: findingsSummary };
}

export function createApp(engine: WorkflowEngine, logger: Logger) {
  const app = express();
  const log = logger.child({ component: 'http' });

  app.use(express.json({ limit: '64kb' }));

  // --- POST /v1/research ---
  app.post('/v1/research', async (req, res) => {
    const validation = validateStartRequest(req.body);
    if (!validation.valid || !validation.sanitized) {
      throw new InvalidInputError(validation.errors);
    }
    const { query, session_id, options } = validation.sanitized;

    // Checkpoint 0 is committed before we answer; the run continues in the background.
    const session = await engine.create(query, { sessionId: session_id, options });
    engine.launch(session.id);

    res.status(202).json({ session_id: session.id, status: session.status });
  });

  // --- GET /v1/research ---
  app.get('/v1/research', async (_req, res) => {
    res.json(await engine.listSessions());
  });

  // --- GET /v1/research/:id ---
  app.get('/v1/research/:id', async (req, res) => {
    const session = await engine.getStatus(req.params.id);
    res.json(presentSession(session));
  });

  // --- POST /v1/research/:id/decision ---
  app.post('/v1/research/:id/decision', async (req, res) => {
    const validation = validateDecisionRequest(req.body);
    if (!validation.valid || !validation.sanitized) {
      throw new InvalidInputError(validation.errors, { sessionId: req.params.id });
    }

    const session = await engine.decide(req.params.id, validation.sanitized);
    if (session.status === 'running') {
      engine.launch(session.id);
    }
    res.status(202).json(presentSession(session));
  });

  // --- POST /v1/research/:id/abort ---
  app.post('/v1/research/:id/abort', async (req, res) => {
    const session = await engine.abort(req.params.id, readAbortReason(req.body));
    res.json(presentSession(session));
  });

  // --- GET /v1/research/:id/checkpoints ---
  app.get('/v1/research/:id/checkpoints', async (req, res) => {
    const checkpoints = await engine.listCheckpoints(req.params.id);
    res.json({ session_id: req.params.id, checkpoints });
  });

  // --- GET /v1/research/:id/checkpoints/:seq ---
  app.get('/v1/research/:id/checkpoints/:seq', async (req, res) => {
    const sequence = parseSequence(req.params.seq);
    if (sequence === null) {
      throw new InvalidInputError(['checkpoint sequence must be a non-negative integer'], { sessionId: req.params.id });
    }
    res.json(await engine.restoreCheckpoint(req.params.id, sequence));
  });

  // --- POST /v1/research/:id/checkpoints/:seq/restore ---
  app.post('/v1/research/:id/checkpoints/:seq/restore', async (req, res) => {
    const sequence = parseSequence(req.params.seq);
    if (sequence === null) {
      throw new InvalidInputError(['checkpoint sequence must be a non-negative integer'], { sessionId: req.params.id });
    }
    const session = await engine.rewind(req.params.id, sequence);
    res.status(202).json(presentSession(session));
  });

  // --- GET /v1/health ---
  app.get('/v1/health', (_req, res) => {
    res.json({
      status: 'ok',
      active_sessions: engine.activeSessionIds(),
    });
  });

  app.use((req, _res, next) => {
    next(new WorkflowError('not_found', `No route for ${req.method} ${req.path}`));
  });
  app.use(createErrorHandler(log));

  return app;
}
