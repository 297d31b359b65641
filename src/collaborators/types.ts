export interface CallOptions {
  signal: AbortSignal;
}

export interface GenerationRequest {
  system: string;
  prompt: string;
  /** `json` asks the service for a single JSON object. */
  format: 'text' | 'json';
  temperature?: number;
}

export interface TextGenerator {
  generate(request: GenerationRequest, options: CallOptions): Promise<string>;
}

export interface SearchHit {
  title: string;
  url: string;
  content: string;
}

export interface SearchProvider {
  search(query: string, options: CallOptions): Promise<SearchHit[]>;
}

export interface Collaborators {
  generator: TextGenerator;
  search: SearchProvider;
}
