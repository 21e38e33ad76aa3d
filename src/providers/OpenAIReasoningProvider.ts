/**
 * OpenAI reasoning provider.
 * Chat completions with JSON response format; low temperature keeps
 * determinations consistent between runs.
 */

import OpenAI from 'openai';
import type {
  IReasoningProvider,
  ReasoningCallOptions,
  ReasoningRequest,
} from './IReasoningProvider.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_MAX_TOKENS = 4000;
const DEFAULT_TEMPERATURE = 0.1;

export class OpenAIReasoningProvider implements IReasoningProvider {
  private client: OpenAI;
  readonly model: string;
  private maxTokens: number;
  private temperature: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    maxTokens?: number;
    temperature?: number;
    client?: OpenAI;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
        maxRetries: 0,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = opts?.temperature ?? DEFAULT_TEMPERATURE;
  }

  async complete(
    request: ReasoningRequest,
    options?: ReasoningCallOptions
  ): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: 'json_object' },
      },
      { signal: options?.signal }
    );

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }
    return content;
  }
}
