import type { NodeName } from '../../sessions/types.js';
import { planNode } from './plan.js';
import { researchNode } from './research.js';
import { reviewNode } from './review.js';
import type { WorkflowNode } from './types.js';
import { writeNode } from './write.js';

export const DEFAULT_NODES: Record<NodeName, WorkflowNode> = {
  plan: planNode,
  research: researchNode,
  review: reviewNode,
  write: writeNode,
};

export type { NodeContext, WorkflowNode } from './types.js';
