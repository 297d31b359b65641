import OpenAI from 'openai';
import type { CallOptions, GenerationRequest, TextGenerator } from './types.js';

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
}

/** Text generation through the OpenAI chat completions API. */
export class OpenAIGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAIGeneratorOptions) {
    // Retries would stretch a call past the engine's own timeout.
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
  }

  async generate(request: GenerationRequest, { signal }: CallOptions): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.options.model,
        temperature: request.temperature ?? 0.2,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        response_format: request.format === 'json' ? { type: 'json_object' } : undefined,
      },
      { signal },
    );
    return completion.choices[0]?.message?.content ?? '';
  }
}
