import type { Decision, WorkflowOptions } from '../sessions/types.js';

export interface SanitizedStartRequest {
  query: string;
  session_id?: string;
  options: Partial<WorkflowOptions>;
}

export interface ValidationResult<T> {
  valid: boolean;
  sanitized?: T;
  errors: string[];
}

export const MIN_QUERY_CHARS = 3;
export const MAX_QUERY_CHARS = 1000;
const MAX_FEEDBACK_CHARS = 4000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptions(raw: unknown, errors: string[]): Partial<WorkflowOptions> {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    errors.push('options must be an object');
    return {};
  }

  const options: Partial<WorkflowOptions> = {};
  const numberField = (key: 'max_revisions' | 'quality_threshold' | 'timeout_ms') => {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`options.${key} must be a number`);
      return;
    }
    options[key] = value;
  };
  numberField('max_revisions');
  numberField('quality_threshold');
  numberField('timeout_ms');

  if (raw.hitl_enabled !== undefined) {
    if (typeof raw.hitl_enabled !== 'boolean') {
      errors.push('options.hitl_enabled must be a boolean');
    } else {
      options.hitl_enabled = raw.hitl_enabled;
    }
  }
  return options;
}

/** Shape checks for a start request. Option ranges are checked by the engine. */
export function validateStartRequest(input: unknown): ValidationResult<SanitizedStartRequest> {
  const errors: string[] = [];
  const body = isRecord(input) ? input : {};

  const query = typeof body.query === 'string' ? body.query.trim() : '';
  if (!query) {
    errors.push('query is required');
  } else if (query.length < MIN_QUERY_CHARS || query.length > MAX_QUERY_CHARS) {
    errors.push(`query must be between ${MIN_QUERY_CHARS} and ${MAX_QUERY_CHARS} characters`);
  }

  let sessionId: string | undefined;
  if (body.session_id !== undefined && body.session_id !== null) {
    if (typeof body.session_id !== 'string' || !body.session_id.trim()) {
      errors.push('session_id must be a non-empty string');
    } else {
      sessionId = body.session_id.trim();
    }
  }

  const options = readOptions(body.options, errors);

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return {
    valid: true,
    sanitized: { query, ...(sessionId ? { session_id: sessionId } : {}), options },
    errors: [],
  };
}

export function validateDecisionRequest(input: unknown): ValidationResult<Decision> {
  const body = isRecord(input) ? input : {};

  switch (body.decision) {
    case 'approve':
      return { valid: true, sanitized: { kind: 'approve' }, errors: [] };
    case 'reject': {
      const reason = typeof body.reason === 'string' && body.reason.trim() ? body.reason.trim() : undefined;
      return { valid: true, sanitized: reason ? { kind: 'reject', reason } : { kind: 'reject' }, errors: [] };
    }
    case 'feedback': {
      const text = typeof body.feedback === 'string' ? body.feedback.trim() : '';
      if (!text) return { valid: false, errors: ['feedback is required when decision is feedback'] };
      if (text.length > MAX_FEEDBACK_CHARS) {
        return { valid: false, errors: [`feedback exceeds ${MAX_FEEDBACK_CHARS} characters`] };
      }
      return { valid: true, sanitized: { kind: 'feedback', text }, errors: [] };
    }
    default:
      return { valid: false, errors: ['decision must be one of approve, feedback, reject'] };
  }
}

/** Optional free-text reason on an abort request. */
export function readAbortReason(input: unknown): string | undefined {
  if (!isRecord(input) || typeof input.reason !== 'string') return undefined;
  const reason = input.reason.trim();
  return reason ? reason.slice(0, MAX_FEEDBACK_CHARS) : undefined;
}

/** Parses a checkpoint sequence route parameter; null when it is not a non-negative integer. */
export function parseSequence(raw: string): number | null {
  if (!/^\d{1,9}$/.test(raw)) return null;
  return Number(raw);
}
