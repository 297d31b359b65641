import { invokeCollaborator } from '../../collaborators/timeout.js';
import type { SearchHit } from '../../collaborators/types.js';
import { SessionAbortedError, errorMessage } from '../../errors.js';
import type { Finding, PlanStep, Review, Session, Snippet } from '../../sessions/types.js';
import { pendingSteps } from '../routing.js';
import type { NodeContext, WorkflowNode } from './types.js';

export const MAX_QUERY_CHARS = 400;

type StepOutcome = { step: PlanStep; query: string; hits: SearchHit[] } | { step: PlanStep; query: string; error: string };

/**
 * Search query for a step. Later passes steer the step's query toward the
 * latest human feedback, then, for steps that already returned results, what
 * the last review asked for. A step with nothing yet is retried as planned.
 */
export function refineQuery(
  step: PlanStep,
  finding: Finding | undefined,
  review: Review | null,
  humanFeedback: string[],
  pass: number,
): string {
  if (pass === 0) return step.search_query;
  const focus: string[] = [];
  const latest = humanFeedback.at(-1);
  if (latest) focus.push(latest);
  if (review && finding && finding.snippets.length > 0) {
    if (review.suggestions.length > 0) focus.push(...review.suggestions.slice(0, 2));
    else focus.push(review.feedback);
  }
  if (focus.length === 0) return step.search_query;
  const query = `${step.search_query} ${focus.join('; ').replace(/\s+/g, ' ').trim()}`.trim();
  return query.slice(0, MAX_QUERY_CHARS);
}

function snippetKey(s: Pick<Snippet, 'url' | 'content'>): string {
  return s.url || s.content;
}

/** Adds a pass's hits to a step's finding; earlier snippets are kept, duplicates skipped. */
export function mergeFinding(
  previous: Finding | undefined,
  stepId: string,
  query: string,
  pass: number,
  outcome: { hits: SearchHit[] } | { error: string },
): Finding {
  const base: Finding = previous ?? { step_id: stepId, queries: [], snippets: [], attempts: 0, last_error: null };
  const snippets = [...base.snippets];

  if ('hits' in outcome) {
    const seen = new Set(snippets.map(snippetKey));
    for (const hit of outcome.hits) {
      const key = snippetKey(hit);
      if (!key || seen.has(key)) continue;
      seen.add(key);
      snippets.push({ title: hit.title, url: hit.url, content: hit.content, pass });
    }
  }

  return {
    step_id: stepId,
    queries: base.queries.includes(query) ? base.queries : [...base.queries, query],
    snippets,
    attempts: base.attempts + 1,
    last_error: 'error' in outcome ? outcome.error : null,
  };
}

export const researchNode: WorkflowNode = {
  name: 'research',

  async execute(session: Session, context: NodeContext): Promise<Session> {
    const pass = session.research_pass;
    const steps = pendingSteps(session);

    // Searches run concurrently; a failed step is recorded, not fatal.
    const outcomes = await Promise.all(
      steps.map(async (step): Promise<StepOutcome> => {
        const query = refineQuery(step, session.findings[step.id], session.review, session.human_feedback, pass);
        try {
          const hits = await invokeCollaborator(
            {
              label: `search for ${step.id}`,
              sessionId: session.id,
              timeoutMs: session.options.timeout_ms,
              signal: context.signal,
            },
            (signal) => context.collaborators.search.search(query, { signal }),
          );
          return { step, query, hits };
        } catch (err) {
          if (err instanceof SessionAbortedError) throw err;
          context.logger.warn({ sessionId: session.id, stepId: step.id, err }, 'search step failed');
          return { step, query, error: errorMessage(err) };
        }
      }),
    );

    // Merge in plan order regardless of completion order.
    const findings: Record<string, Finding> = { ...session.findings };
    const attempted = new Set<string>();
    for (const outcome of outcomes) {
      findings[outcome.step.id] = mergeFinding(findings[outcome.step.id], outcome.step.id, outcome.query, pass, outcome);
      attempted.add(outcome.step.id);
    }

    return {
      ...session,
      findings,
      plan_steps: session.plan_steps.map((step) =>
        attempted.has(step.id) ? { ...step, completed_pass: pass } : step,
      ),
      updated_at: context.now(),
    };
  },
};
