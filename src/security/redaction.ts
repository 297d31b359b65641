// Collaborator errors can echo request headers or URLs carrying credentials,
// and their messages end up in checkpoints and logs.
const SECRET_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // OpenAI project/user keys
  { pattern: /sk-(?:proj-)?[A-Za-z0-9_-]{16,}/g, replacement: 'sk-***REDACTED***' },
  // Firecrawl keys
  { pattern: /fc-[A-Za-z0-9]{16,}/g, replacement: 'fc-***REDACTED***' },
  { pattern: /\bBearer\s+[A-Za-z0-9_.\-/+=]{16,}/g, replacement: 'Bearer <REDACTED>' },
  // ?api_key=... / &token=...
  { pattern: /([?&](?:api_key|apikey|key|token)=)[^&\s]+/gi, replacement: '$1<REDACTED>' },
  // OPENAI_API_KEY=... style
  { pattern: /\b([A-Z_]*(?:API_KEY|SECRET|TOKEN))=["']?[^"'\s]{6,}["']?/g, replacement: '$1=<REDACTED>' },
];

export const MAX_REDACTED_LENGTH = 500;

/** Strips credentials from a message and caps its length. */
export function redact(input: string): string {
  let result = input;
  for (const { pattern, replacement } of SECRET_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), replacement);
  }
  if (result.length > MAX_REDACTED_LENGTH) {
    result = `${result.slice(0, MAX_REDACTED_LENGTH)}…`;
  }
  return result;
}
