import type { NextFunction, Request, Response } from 'express';
import { InvalidInputError, WorkflowError, type ErrorKind } from '../errors.js';
import type { Logger } from '../logging/logger.js';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  invalid_input: 400,
  not_found: 404,
  invalid_state: 409,
  aborted: 409,
  collaborator: 502,
  planning_failed: 502,
  malformed_review: 502,
  persistence: 500,
};

export function statusForError(err: unknown): number {
  return err instanceof WorkflowError ? STATUS_BY_KIND[err.kind] : 500;
}

/** Maps the workflow error taxonomy onto HTTP responses. */
export function createErrorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status = statusForError(err);
    if (status >= 500) {
      logger.error({ err, method: req.method, path: req.path }, 'request failed');
    }

    if (err instanceof InvalidInputError) {
      res.status(status).json({ ...err.toJSON(), errors: err.errors });
      return;
    }
    if (err instanceof WorkflowError) {
      res.status(status).json(err.toJSON());
      return;
    }
    // Body parser errors carry their own 4xx status.
    if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
      res.status(400).json({ error: 'invalid_input', message: 'Request body is not valid JSON' });
      return;
    }
    res.status(500).json({ error: 'internal', message: 'Internal server error' });
  };
}
