/**
 * Anthropic reasoning provider.
 * Calls the Messages API directly with native fetch; the system instruction
 * travels separately from the user turn.
 */

import { z } from 'zod';
import type {
  IReasoningProvider,
  ReasoningCallOptions,
  ReasoningRequest,
} from './IReasoningProvider.js';

const API_URL = 'https://api.anthropic.com/v1/messages';
const API_VERSION = '2023-06-01';
const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';
const DEFAULT_MAX_TOKENS = 4000;

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

export class AnthropicReasoningProvider implements IReasoningProvider {
  private apiKey: string;
  readonly model: string;
  private maxTokens: number;

  constructor(opts?: { apiKey?: string; model?: string; maxTokens?: number }) {
    this.apiKey = opts?.apiKey ?? process.env.ANTHROPIC_API_KEY ?? '';
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.maxTokens = opts?.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async complete(
    request: ReasoningRequest,
    options?: ReasoningCallOptions
  ): Promise<string> {
    const res = await fetch(API_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': API_VERSION,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0.1,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      }),
      signal: options?.signal,
    });

    if (!res.ok) {
      const errorBody = await res.text().catch(() => '');
      throw new Error(
        `Anthropic API error (${res.status}): ${errorBody.substring(0, 500)}`
      );
    }

    const parsed = messagesResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`Anthropic API returned an unexpected payload: ${parsed.error.message}`);
    }

    return parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
  }
}
