import { z } from 'zod';
import { invokeCollaborator } from '../../collaborators/timeout.js';
import { CollaboratorError, PlanningFailedError } from '../../errors.js';
import type { PlanStep, Session } from '../../sessions/types.js';
import { PLANNER_SYSTEM_PROMPT, buildPlanPrompt } from '../prompts.js';
import { parseJsonOutput } from './output.js';
import type { NodeContext, WorkflowNode } from './types.js';

export const MAX_PLAN_STEPS = 8;

const PlanOutputSchema = z.object({
  steps: z.array(
    z.object({
      task: z.string(),
      search_query: z.string().optional(),
    }),
  ),
});

export const planNode: WorkflowNode = {
  name: 'plan',

  async execute(session: Session, context: NodeContext): Promise<Session> {
    const raw = await invokeCollaborator(
      { label: 'planner', sessionId: session.id, timeoutMs: session.options.timeout_ms, signal: context.signal },
      (signal) =>
        context.collaborators.generator.generate(
          { system: PLANNER_SYSTEM_PROMPT, prompt: buildPlanPrompt(session.query), format: 'json', temperature: 0.2 },
          { signal },
        ),
    );

    const parsed = PlanOutputSchema.safeParse(parseJsonOutput(raw, 'planner', session.id));
    if (!parsed.success) {
      throw new CollaboratorError(`planner output is missing steps: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        sessionId: session.id,
      });
    }

    const steps: PlanStep[] = parsed.data.steps
      .map((step) => ({ task: step.task.trim(), query: step.search_query?.trim() ?? '' }))
      .filter((step) => step.task.length > 0)
      .slice(0, MAX_PLAN_STEPS)
      .map((step, i) => ({
        id: `step-${i + 1}`,
        task: step.task,
        search_query: step.query || step.task,
        completed_pass: null,
      }));

    if (steps.length === 0) {
      throw new PlanningFailedError('planner returned no steps', { sessionId: session.id });
    }

    context.logger.debug({ sessionId: session.id, steps: steps.length }, 'plan created');
    return { ...session, plan_steps: steps, updated_at: context.now() };
  },
};
