export type SessionStatus = 'running' | 'awaiting_approval' | 'completed' | 'aborted' | 'failed';

export type WorkflowStage =
  | 'planning'
  | 'researching'
  | 'reviewing'
  | 'awaiting_approval'
  | 'writing'
  | 'completed'
  | 'aborted'
  | 'failed';

export type NodeName = 'plan' | 'research' | 'review' | 'write';

/** What produced a checkpoint: a node, the initial record, or an engine-side transition. */
export type CheckpointOrigin = NodeName | 'initial' | 'decision' | 'abort' | 'restore';

export interface WorkflowOptions {
  max_revisions: number;
  quality_threshold: number;
  hitl_enabled: boolean;
  timeout_ms: number;
}

export interface PlanStep {
  id: string;
  task: string;
  search_query: string;
  /** Research pass in which the step was last attempted; complete when equal to the session's research_pass. */
  completed_pass: number | null;
}

export interface Snippet {
  title: string;
  url: string;
  content: string;
  pass: number;
}

export interface Finding {
  step_id: string;
  queries: string[];
  snippets: Snippet[];
  attempts: number;
  last_error: string | null;
}

export interface Review {
  score: number;
  feedback: string;
  suggestions: string[];
  revision: number;
}

export type DecisionKind = 'approve' | 'feedback' | 'reject';

export type Decision =
  | { kind: 'approve' }
  | { kind: 'feedback'; text: string }
  | { kind: 'reject'; reason?: string };

export interface PendingDecision {
  requested_at: string;
  reason: 'quality_met' | 'revision_budget_spent';
  score: number;
  revision_count: number;
  allowed: DecisionKind[];
}

export interface SessionError {
  kind: string;
  message: string;
  node: CheckpointOrigin | null;
  sequence: number | null;
}

export interface Session {
  id: string;
  query: string;
  status: SessionStatus;
  stage: WorkflowStage;
  revision_count: number;
  /** Incremented each time the workflow re-enters research after a review or decision. */
  research_pass: number;
  plan_steps: PlanStep[];
  findings: Record<string, Finding>;
  review: Review | null;
  /** Feedback texts from human decisions, oldest first. */
  human_feedback: string[];
  final_answer: string | null;
  pending_decision: PendingDecision | null;
  options: WorkflowOptions;
  feedback_override_used: boolean;
  error: SessionError | null;
  created_at: string;
  updated_at: string;
}

export interface Checkpoint {
  session_id: string;
  sequence: number;
  timestamp: string;
  node: CheckpointOrigin;
  restored_from: number | null;
  session: Session;
}

export interface CheckpointDraft {
  node: CheckpointOrigin;
  session: Session;
  restored_from?: number | null;
}

export interface CheckpointSummary {
  sequence: number;
  timestamp: string;
  node: CheckpointOrigin;
  status: SessionStatus;
  stage: WorkflowStage;
  restored_from: number | null;
}

export interface SessionSummary {
  session_id: string;
  query: string;
  status: SessionStatus;
  stage: WorkflowStage;
  revision_count: number;
  sequence: number;
  updated_at: string;
}

export const TERMINAL_STATUSES: readonly SessionStatus[] = ['completed', 'aborted', 'failed'];

export function isTerminal(status: SessionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}
