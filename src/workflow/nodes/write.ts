import { invokeCollaborator } from '../../collaborators/timeout.js';
import { CollaboratorError } from '../../errors.js';
import type { Session } from '../../sessions/types.js';
import { WRITER_SYSTEM_PROMPT, buildWritePrompt } from '../prompts.js';
import type { NodeContext, WorkflowNode } from './types.js';

export const writeNode: WorkflowNode = {
  name: 'write',

  async execute(session: Session, context: NodeContext): Promise<Session> {
    const answer = await invokeCollaborator(
      { label: 'writer', sessionId: session.id, timeoutMs: session.options.timeout_ms, signal: context.signal },
      (signal) =>
        context.collaborators.generator.generate(
          {
            system: WRITER_SYSTEM_PROMPT,
            prompt: buildWritePrompt(
              session.query,
              session.plan_steps,
              session.findings,
              session.review,
              session.human_feedback,
            ),
            format: 'text',
            temperature: 0.3,
          },
          { signal },
        ),
    );

    const finalAnswer = answer.trim();
    if (!finalAnswer) {
      throw new CollaboratorError('writer returned an empty answer', { sessionId: session.id });
    }
    return { ...session, final_answer: finalAnswer, updated_at: context.now() };
  },
};
