import type { Finding, PlanStep, Review } from '../sessions/types.js';

export const PLANNER_SYSTEM_PROMPT = `You are a research planning expert. Break the user's research query into clear, actionable sub-tasks.

For each sub-task provide:
- "task": what needs to be researched
- "search_query": a query optimised for web search

Respond with a single JSON object of the form:
{"steps": [{"task": "...", "search_query": "..."}]}

Use 3-5 steps depending on complexity. Each step should build on the previous ones.`;

export const REVIEWER_SYSTEM_PROMPT = `You are a research quality evaluator. Assess whether the gathered research adequately answers the user's query.

Evaluate:
- RELEVANCE: do the results address the query?
- COMPLETENESS: are all aspects covered?
- QUALITY: are the sources credible?
- DEPTH: is there enough detail for a comprehensive answer?

Respond with a single JSON object:
{"score": <number between 0.0 and 1.0>, "feedback": "<assessment>", "suggestions": ["<improvement>", ...]}

A score of {{threshold}} or higher means the research is sufficient.`;

export const WRITER_SYSTEM_PROMPT = `You are an expert research synthesizer. Write a comprehensive, well-structured answer based only on the gathered research.

- Start with a brief executive summary.
- Organise the key findings by topic under clear headings.
- Reference sources as [N] using the numbered source list.
- Incorporate the reviewer and human feedback where it applies.
- End with a conclusion and the list of sources.`;

const PLAN_TEMPLATE = `Research query: {{query}}`;

const REVIEW_TEMPLATE = `Original query: {{query}}

Gathered research:
{{research}}

Human feedback:
{{humanFeedback}}

Revision: {{revision}}/{{maxRevisions}}

Evaluate whether this research adequately answers the original query.`;

const WRITE_TEMPLATE = `Original query: {{query}}

Gathered research:
{{research}}

Sources:
{{sources}}

Reviewer feedback:
{{feedback}}

Human feedback:
{{humanFeedback}}

Synthesize a comprehensive response that fully addresses the original query.`;

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}

/** Replaces every `{{name}}`; a placeholder without a value is an error. */
export function renderTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new PromptTemplateError(`Missing value for placeholder {{${name}}}`);
    }
    return String(value);
  });
}

const REVIEW_FINDINGS_PER_STEP = 3;
const REVIEW_SNIPPET_CHARS = 500;

function orderedFindings(steps: PlanStep[], findings: Record<string, Finding>): Array<[PlanStep, Finding | undefined]> {
  return steps.map((step) => [step, findings[step.id]]);
}

function formatHumanFeedback(humanFeedback: string[]): string {
  return humanFeedback.length > 0 ? humanFeedback.map((text) => `- ${text}`).join('\n') : '(none)';
}

export function buildPlanPrompt(query: string): string {
  return renderTemplate(PLAN_TEMPLATE, { query });
}

export function buildReviewPrompt(
  query: string,
  steps: PlanStep[],
  findings: Record<string, Finding>,
  revision: number,
  maxRevisions: number,
  humanFeedback: string[] = [],
): string {
  const lines: string[] = [];
  for (const [step, finding] of orderedFindings(steps, findings)) {
    lines.push(`### ${step.id}: ${step.task}`);
    const snippets = finding?.snippets ?? [];
    if (snippets.length === 0) {
      lines.push('No findings.');
      continue;
    }
    snippets.slice(-REVIEW_FINDINGS_PER_STEP).forEach((snippet, i) => {
      lines.push(`${i + 1}. ${snippet.content.slice(0, REVIEW_SNIPPET_CHARS)}`);
    });
    const urls = snippets.map((s) => s.url).filter(Boolean).slice(0, 3);
    if (urls.length > 0) lines.push(`Sources: ${urls.join(', ')}`);
  }

  return renderTemplate(REVIEW_TEMPLATE, {
    query,
    research: lines.join('\n'),
    humanFeedback: formatHumanFeedback(humanFeedback),
    revision,
    maxRevisions,
  });
}

/** Deduplicated source URLs in step order, numbered from 1 in the write prompt. */
export function collectSources(steps: PlanStep[], findings: Record<string, Finding>): string[] {
  const seen = new Set<string>();
  for (const [, finding] of orderedFindings(steps, findings)) {
    for (const snippet of finding?.snippets ?? []) {
      if (snippet.url) seen.add(snippet.url);
    }
  }
  return [...seen];
}

export function buildWritePrompt(
  query: string,
  steps: PlanStep[],
  findings: Record<string, Finding>,
  review: Review | null,
  humanFeedback: string[] = [],
): string {
  const sections: string[] = [];
  for (const [step, finding] of orderedFindings(steps, findings)) {
    const snippets = finding?.snippets ?? [];
    if (snippets.length === 0) continue;
    sections.push(`## ${step.task}\n${snippets.map((s, i) => `${i + 1}. ${s.content}`).join('\n')}`);
  }
  const sources = collectSources(steps, findings).map((url, i) => `[${i + 1}] ${url}`);

  return renderTemplate(WRITE_TEMPLATE, {
    query,
    research: sections.join('\n\n'),
    sources: sources.length > 0 ? sources.join('\n') : '(none)',
    feedback: review?.feedback ?? '(none)',
    humanFeedback: formatHumanFeedback(humanFeedback),
  });
}
