/**
 * Mock reasoning provider for testing.
 * Replays queued responses (or errors) in order and records every request.
 */

import type {
  IReasoningProvider,
  ReasoningCallOptions,
  ReasoningRequest,
} from '../../src/providers/IReasoningProvider.js';

type Reply = { text: string } | { error: Error } | { hang: true };

export class MockReasoningProvider implements IReasoningProvider {
  readonly model: string;
  public requests: ReasoningRequest[] = [];

  private replies: Reply[] = [];

  constructor(model = 'mock-reasoner') {
    this.model = model;
  }

  async complete(
    request: ReasoningRequest,
    options?: ReasoningCallOptions
  ): Promise<string> {
    this.requests.push(request);

    const reply = this.replies.shift();
    if (!reply) throw new Error('MockReasoningProvider: no reply queued');
    if ('error' in reply) throw reply.error;
    if ('hang' in reply) return waitForAbort(options?.signal);
    return reply.text;
  }

  // ── Test Helpers ──

  reply(text: string): this {
    this.replies.push({ text });
    return this;
  }

  /** Queue a well-formed JSON determination. */
  replyJson(body: Record<string, unknown>): this {
    return this.reply(JSON.stringify(body));
  }

  fail(error: Error): this {
    this.replies.push({ error });
    return this;
  }

  /** The next call never answers; it rejects once its signal aborts. */
  hang(): this {
    this.replies.push({ hang: true });
    return this;
  }

  get callCount(): number {
    return this.requests.length;
  }
}

function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('request aborted')), {
      once: true,
    });
  });
}
