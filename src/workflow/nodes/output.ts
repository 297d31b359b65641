import { CollaboratorError } from '../../errors.js';

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/** Parses a JSON object from generator output, tolerating a markdown code fence. */
export function parseJsonOutput(raw: string, label: string, sessionId: string): unknown {
  const trimmed = raw.trim();
  const body = FENCE_PATTERN.exec(trimmed)?.[1] ?? trimmed;
  if (!body) {
    throw new CollaboratorError(`${label} returned empty output`, { sessionId });
  }
  try {
    return JSON.parse(body);
  } catch {
    throw new CollaboratorError(`${label} returned malformed JSON`, { sessionId });
  }
}
