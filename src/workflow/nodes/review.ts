import { z } from 'zod';
import { invokeCollaborator } from '../../collaborators/timeout.js';
import { CollaboratorError, MalformedReviewError } from '../../errors.js';
import type { Review, Session } from '../../sessions/types.js';
import { REVIEWER_SYSTEM_PROMPT, buildReviewPrompt, renderTemplate } from '../prompts.js';
import { parseJsonOutput } from './output.js';
import type { NodeContext, WorkflowNode } from './types.js';

const ReviewOutputSchema = z.object({
  score: z.number().finite(),
  feedback: z.string().trim().min(1),
  suggestions: z.array(z.string()).default([]),
});

/** Validates reviewer output. Scores outside [0, 1] are rejected, never clamped. */
export function parseReview(payload: unknown, revision: number, sessionId: string): Review {
  const parsed = ReviewOutputSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new MalformedReviewError(
      `review output is invalid at ${issue?.path.join('.') || 'root'}: ${issue?.message ?? 'invalid'}`,
      { sessionId },
    );
  }
  const { score, feedback, suggestions } = parsed.data;
  if (score < 0 || score > 1) {
    throw new MalformedReviewError(`review score ${score} is outside [0, 1]`, { sessionId });
  }
  return {
    score,
    feedback,
    suggestions: suggestions.map((s) => s.trim()).filter(Boolean),
    revision,
  };
}

export function emptyReview(revision: number): Review {
  return { score: 0, feedback: 'No findings were gathered in this pass.', suggestions: [], revision };
}

export const reviewNode: WorkflowNode = {
  name: 'review',

  async execute(session: Session, context: NodeContext): Promise<Session> {
    const snippetCount = Object.values(session.findings).reduce((n, f) => n + f.snippets.length, 0);
    if (snippetCount === 0) {
      if (session.revision_count >= session.options.max_revisions) {
        throw new CollaboratorError('no findings to review: every search step came back empty', {
          sessionId: session.id,
        });
      }
      // Nothing to show the reviewer; a zero score sends the session back to research.
      context.logger.warn({ sessionId: session.id, revision: session.revision_count }, 'no findings to review');
      return { ...session, review: emptyReview(session.revision_count), updated_at: context.now() };
    }

    const raw = await invokeCollaborator(
      { label: 'reviewer', sessionId: session.id, timeoutMs: session.options.timeout_ms, signal: context.signal },
      (signal) =>
        context.collaborators.generator.generate(
          {
            system: renderTemplate(REVIEWER_SYSTEM_PROMPT, { threshold: session.options.quality_threshold }),
            prompt: buildReviewPrompt(
              session.query,
              session.plan_steps,
              session.findings,
              session.revision_count,
              session.options.max_revisions,
              session.human_feedback,
            ),
            format: 'json',
            temperature: 0.1,
          },
          { signal },
        ),
    );

    const review = parseReview(parseJsonOutput(raw, 'reviewer', session.id), session.revision_count, session.id);
    context.logger.info(
      { sessionId: session.id, score: review.score, revision: session.revision_count },
      'research reviewed',
    );
    return { ...session, review, updated_at: context.now() };
  },
};
