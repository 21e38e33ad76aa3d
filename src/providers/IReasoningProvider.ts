/**
 * Reasoning service interface.
 * Wraps the language model that turns an assembled analysis request into a
 * structured JSON determination.
 */

export interface ReasoningRequest {
  /** Standing instructions: role, output contract. */
  system: string;
  /** The rendered analysis request. */
  prompt: string;
}

export interface ReasoningCallOptions {
  signal?: AbortSignal;
}

export interface IReasoningProvider {
  /** Model identifier recorded on every finding this provider produces. */
  readonly model: string;

  /** Returns the raw response text; parsing belongs to the caller. */
  complete(
    request: ReasoningRequest,
    options?: ReasoningCallOptions
  ): Promise<string>;
}
