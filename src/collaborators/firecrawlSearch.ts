import FirecrawlApp from '@mendable/firecrawl-js';
import { z } from 'zod';
import type { CallOptions, SearchHit, SearchProvider } from './types.js';

const SearchDocumentSchema = z.object({
  url: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  markdown: z.string().optional(),
});

const SearchResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(SearchDocumentSchema).default([]),
  error: z.string().optional(),
});

const MAX_CONTENT_CHARS = 2000;

export interface FirecrawlSearchOptions {
  apiKey: string;
  apiUrl?: string;
  limit: number;
}

/** Maps a raw search payload to hits, dropping documents that carry no text. */
export function toSearchHits(payload: unknown): SearchHit[] {
  const parsed = SearchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
  }
  if (!parsed.data.success) {
    throw new Error(`Search failed: ${parsed.data.error ?? 'unknown error'}`);
  }

  const hits: SearchHit[] = [];
  for (const doc of parsed.data.data) {
    const content = (doc.markdown || doc.description || '').trim();
    if (!content) continue;
    hits.push({
      title: doc.title?.trim() || 'Untitled result',
      url: doc.url ?? '',
      content: content.slice(0, MAX_CONTENT_CHARS),
    });
  }
  return hits;
}

/** Web search through the Firecrawl search endpoint. */
export class FirecrawlSearch implements SearchProvider {
  private readonly client: FirecrawlApp;

  constructor(private readonly options: FirecrawlSearchOptions) {
    this.client = new FirecrawlApp({ apiKey: options.apiKey, apiUrl: options.apiUrl });
  }

  // The SDK takes no abort signal; the engine drops the result on timeout or abort.
  async search(query: string, _options: CallOptions): Promise<SearchHit[]> {
    const response: unknown = await this.client.search(query, { limit: this.options.limit });
    return toSearchHits(response);
  }
}
