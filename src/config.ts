import { parseLogLevel, type LogLevel } from './logging/logger.js';
import type { WorkflowOptions } from './sessions/types.js';
import { DEFAULT_WORKFLOW_OPTIONS, resolveWorkflowOptions } from './workflow/options.js';

export interface Config {
  port: number;
  bind: string;
  dataDir: string;
  logLevel: LogLevel;
  openaiApiKey: string;
  openaiModel: string;
  openaiBaseUrl: string | undefined;
  firecrawlApiKey: string;
  firecrawlApiUrl: string | undefined;
  searchLimit: number;
  workflow: WorkflowOptions;
  resumeOnStartup: boolean;
}

function required(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new Error(`${name} is required but not set`);
  }
  return value;
}

function optional(name: string): string | undefined {
  return process.env[name]?.trim() || undefined;
}

function intOr(name: string, fallback: number): number {
  const value = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(value) ? value : fallback;
}

function floatOr(name: string, fallback: number): number {
  const value = parseFloat(process.env[name] ?? '');
  return Number.isFinite(value) ? value : fallback;
}

function boolOr(name: string, fallback: boolean): boolean {
  const value = process.env[name]?.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  return fallback;
}

export function loadConfig(): Config {
  const openaiApiKey = required('OPENAI_API_KEY');
  const firecrawlApiKey = required('FIRECRAWL_API_KEY');

  const port = intOr('RA_PORT', 8000);
  const searchLimit = intOr('RA_SEARCH_LIMIT', 5);

  // Defaults for sessions that do not override them; invalid values fail fast.
  const workflow = resolveWorkflowOptions({
    max_revisions: intOr('RA_MAX_REVISIONS', DEFAULT_WORKFLOW_OPTIONS.max_revisions),
    quality_threshold: floatOr('RA_QUALITY_THRESHOLD', DEFAULT_WORKFLOW_OPTIONS.quality_threshold),
    hitl_enabled: boolOr('RA_HITL_ENABLED', DEFAULT_WORKFLOW_OPTIONS.hitl_enabled),
    timeout_ms: intOr('RA_COLLABORATOR_TIMEOUT_MS', DEFAULT_WORKFLOW_OPTIONS.timeout_ms),
  });

  return {
    port: port >= 1 && port <= 65535 ? port : 8000,
    bind: optional('RA_BIND') ?? '127.0.0.1',
    dataDir: optional('RA_DATA_DIR') ?? './data/research',
    logLevel: parseLogLevel(process.env.RA_LOG_LEVEL),
    openaiApiKey,
    openaiModel: optional('OPENAI_MODEL') ?? 'gpt-4o-mini',
    openaiBaseUrl: optional('OPENAI_BASE_URL'),
    firecrawlApiKey,
    firecrawlApiUrl: optional('FIRECRAWL_API_URL'),
    searchLimit: searchLimit >= 1 && searchLimit <= 20 ? searchLimit : 5,
    workflow,
    resumeOnStartup: boolOr('RA_RESUME_ON_STARTUP', true),
  };
}
