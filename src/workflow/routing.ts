import { InvalidInputError, InvalidStateError } from '../errors.js';
import type {
  Decision,
  NodeName,
  PendingDecision,
  PlanStep,
  Review,
  Session,
  SessionStatus,
  WorkflowOptions,
  WorkflowStage,
} from '../sessions/types.js';

/** The state fields routing depends on; nothing else is consulted. */
export interface RoutingFacts {
  planStepCount: number;
  pendingStepCount: number;
  review: Pick<Review, 'score'> | null;
  revisionCount: number;
  hasFinalAnswer: boolean;
}

export interface RouteDecision {
  stage: WorkflowStage;
  revisionCount: number;
  /** True when the route opens a new research pass. */
  newPass: boolean;
}

export const STAGE_STATUS: Record<WorkflowStage, SessionStatus> = {
  planning: 'running',
  researching: 'running',
  reviewing: 'running',
  writing: 'running',
  awaiting_approval: 'awaiting_approval',
  completed: 'completed',
  aborted: 'aborted',
  failed: 'failed',
};

export const STAGE_NODE: Partial<Record<WorkflowStage, NodeName>> = {
  planning: 'plan',
  researching: 'research',
  reviewing: 'review',
  writing: 'write',
};

export function pendingSteps(session: Pick<Session, 'plan_steps' | 'research_pass'>): PlanStep[] {
  return session.plan_steps.filter((step) => step.completed_pass !== session.research_pass);
}

export function routingFacts(session: Session): RoutingFacts {
  return {
    planStepCount: session.plan_steps.length,
    pendingStepCount: pendingSteps(session).length,
    review: session.review,
    revisionCount: session.revision_count,
    hasFinalAnswer: Boolean(session.final_answer?.trim()),
  };
}

/** Review gate: Write may only run once quality is met or the revision budget is spent. */
export function canSynthesize(
  review: Pick<Review, 'score'> | null,
  revisionCount: number,
  policy: Pick<WorkflowOptions, 'quality_threshold' | 'max_revisions'>,
): boolean {
  if (revisionCount >= policy.max_revisions) return true;
  return review !== null && review.score >= policy.quality_threshold;
}

/**
 * Decision table evaluated after each node. Pure: no collaborator, clock or
 * store access.
 */
export function decideNextStage(
  completed: NodeName,
  facts: RoutingFacts,
  policy: Pick<WorkflowOptions, 'quality_threshold' | 'max_revisions' | 'hitl_enabled'>,
): RouteDecision {
  const stay = (stage: WorkflowStage): RouteDecision => ({
    stage,
    revisionCount: facts.revisionCount,
    newPass: false,
  });

  switch (completed) {
    case 'plan':
      return stay(facts.planStepCount > 0 ? 'researching' : 'failed');
    case 'research':
      return stay(facts.pendingStepCount === 0 ? 'reviewing' : 'researching');
    case 'review':
      if (canSynthesize(facts.review, facts.revisionCount, policy)) {
        return stay(policy.hitl_enabled ? 'awaiting_approval' : 'writing');
      }
      return { stage: 'researching', revisionCount: facts.revisionCount + 1, newPass: true };
    case 'write':
      return stay(facts.hasFinalAnswer ? 'completed' : 'failed');
  }
}

function pendingDecisionFor(session: Session, now: string): PendingDecision {
  const score = session.review?.score ?? 0;
  return {
    requested_at: now,
    reason: score >= session.options.quality_threshold ? 'quality_met' : 'revision_budget_spent',
    score,
    revision_count: session.revision_count,
    allowed: ['approve', 'feedback', 'reject'],
  };
}

/** Applies a route to the session a node just produced. */
export function advance(session: Session, completed: NodeName, now: string): Session {
  const route = decideNextStage(completed, routingFacts(session), {
    quality_threshold: session.options.quality_threshold,
    max_revisions: session.options.max_revisions,
    hitl_enabled: session.options.hitl_enabled,
  });
  const next: Session = {
    ...session,
    stage: route.stage,
    status: STAGE_STATUS[route.stage],
    revision_count: route.revisionCount,
    research_pass: route.newPass ? session.research_pass + 1 : session.research_pass,
    pending_decision: null,
    updated_at: now,
  };
  if (route.stage === 'awaiting_approval') {
    next.pending_decision = pendingDecisionFor(next, now);
  }
  if (route.stage === 'failed') {
    next.error = {
      kind: 'invalid_state',
      message: `${completed} produced no usable output`,
      node: completed,
      sequence: null,
    };
  }
  return next;
}

export function mergeFeedback(existing: string, feedback: string): string {
  const note = `Human feedback: ${feedback}`;
  return existing.trim() ? `${existing.trim()}\n\n${note}` : note;
}

/**
 * Folds an external decision into a session that is awaiting approval.
 *
 * Feedback forces one more research/review pass. Below the revision cap it
 * counts as a revision; at the cap the count stays put and the session's
 * single override is spent instead, so a second feedback at the cap is refused.
 */
export function applyDecision(session: Session, decision: Decision, now: string): Session {
  if (session.status !== 'awaiting_approval') {
    throw new InvalidStateError(`Session is not awaiting approval (status: ${session.status})`, {
      sessionId: session.id,
    });
  }

  const base: Session = { ...session, pending_decision: null, updated_at: now };

  switch (decision.kind) {
    case 'approve':
      return { ...base, stage: 'writing', status: 'running' };

    case 'reject':
      return {
        ...base,
        stage: 'aborted',
        status: 'aborted',
        error: {
          kind: 'aborted',
          message: decision.reason?.trim() || 'Rejected during review',
          node: 'decision',
          sequence: null,
        },
      };

    case 'feedback': {
      const text = decision.text.trim();
      if (!text) {
        throw new InvalidInputError(['feedback text is required'], { sessionId: session.id });
      }
      const atCap = session.revision_count >= session.options.max_revisions;
      if (atCap && session.feedback_override_used) {
        throw new InvalidStateError('Revision budget is spent; approve or reject the session', {
          sessionId: session.id,
        });
      }
      const review: Review = session.review
        ? { ...session.review, feedback: mergeFeedback(session.review.feedback, text) }
        : { score: 0, feedback: mergeFeedback('', text), suggestions: [], revision: session.revision_count };
      const revisionCount = atCap ? session.revision_count : session.revision_count + 1;

      return {
        ...base,
        stage: 'researching',
        status: 'running',
        review,
        human_feedback: [...session.human_feedback, text],
        revision_count: revisionCount,
        research_pass: session.research_pass + 1,
        feedback_override_used: session.feedback_override_used || atCap,
      };
    }
  }
}
