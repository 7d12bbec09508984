/**
 * Chat completion client for OpenAI-compatible endpoints
 */

import OpenAI from 'openai';
import { ConfigError } from '../utils/errors.js';

export interface CompletionRequest {
  system: string;
  user: string;
  signal?: AbortSignal;
}

export interface ChatCompletionClient {
  readonly model: string;
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAiChatClientOptions {
  apiKey: string | undefined;
  apiBase: string;
  model: string;
  temperature: number;
}

export class OpenAiChatClient implements ChatCompletionClient {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly temperature: number;

  constructor(options: OpenAiChatClientOptions) {
    if (!options.apiKey) {
      throw new ConfigError('LLM_API_KEY is not configured');
    }
    this.model = options.model;
    this.temperature = options.temperature;
    // Retries are handled per document by the classifier
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.apiBase, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
      },
      { signal: request.signal }
    );

    return (response.choices[0]?.message?.content ?? '').trim();
  }
}
