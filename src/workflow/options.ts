import { InvalidInputError } from '../errors.js';
import type { WorkflowOptions } from '../sessions/types.js';

export const DEFAULT_WORKFLOW_OPTIONS: WorkflowOptions = {
  max_revisions: 3,
  quality_threshold: 0.8,
  hitl_enabled: true,
  timeout_ms: 60_000,
};

export const MAX_REVISIONS_CAP = 10;
export const TIMEOUT_MS_RANGE = { min: 1_000, max: 600_000 } as const;

/**
 * Merges per-session overrides over defaults. Out-of-range overrides are
 * rejected rather than coerced.
 */
export function resolveWorkflowOptions(
  overrides: Partial<WorkflowOptions> = {},
  defaults: WorkflowOptions = DEFAULT_WORKFLOW_OPTIONS,
): WorkflowOptions {
  const options: WorkflowOptions = { ...defaults, ...stripUndefined(overrides) };
  const errors: string[] = [];

  if (!Number.isInteger(options.max_revisions) || options.max_revisions < 0 || options.max_revisions > MAX_REVISIONS_CAP) {
    errors.push(`max_revisions must be an integer between 0 and ${MAX_REVISIONS_CAP}`);
  }
  if (!Number.isFinite(options.quality_threshold) || options.quality_threshold < 0 || options.quality_threshold > 1) {
    errors.push('quality_threshold must be between 0 and 1');
  }
  if (typeof options.hitl_enabled !== 'boolean') {
    errors.push('hitl_enabled must be a boolean');
  }
  if (
    !Number.isInteger(options.timeout_ms) ||
    options.timeout_ms < TIMEOUT_MS_RANGE.min ||
    options.timeout_ms > TIMEOUT_MS_RANGE.max
  ) {
    errors.push(`timeout_ms must be an integer between ${TIMEOUT_MS_RANGE.min} and ${TIMEOUT_MS_RANGE.max}`);
  }

  if (errors.length > 0) {
    throw new InvalidInputError(errors);
  }
  return options;
}

function stripUndefined(overrides: Partial<WorkflowOptions>): Partial<WorkflowOptions> {
  const result: Partial<WorkflowOptions> = {};
  if (overrides.max_revisions !== undefined) result.max_revisions = overrides.max_revisions;
  if (overrides.quality_threshold !== undefined) result.quality_threshold = overrides.quality_threshold;
  if (overrides.hitl_enabled !== undefined) result.hitl_enabled = overrides.hitl_enabled;
  if (overrides.timeout_ms !== undefined) result.timeout_ms = overrides.timeout_ms;
  return result;
}
