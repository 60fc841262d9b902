/**
 * Provider-agnostic text-generation port.
 *
 * Every LLM-backed step of the assistant talks to a TextGenerator. Adapters
 * (Anthropic, OpenAI, fixtures) implement it; tests pass in-process fakes.
 */

export type LLMProviderName = "anthropic" | "openai" | "fixtures";

/**
 * Call options for request tracking and cancellation.
 */
export interface GenerateOpts {
  /** Correlates provider logs with the turn that issued the call */
  requestId?: string;
  /** Short label for telemetry, e.g. "classify_intent" */
  operation?: string;
  abortSignal?: AbortSignal;
}

export interface TextGenerator {
  /**
   * Provider name for telemetry.
   */
  readonly name: LLMProviderName;

  readonly model: string;

  /**
   * Send a single-turn prompt and return the generated text.
   *
   * Implementations never retry; callers treat every failure as final for
   * the turn.
   *
   * @throws GenerationError, UpstreamTimeoutError or UpstreamHTTPError
   */
  generate(prompt: string, opts?: GenerateOpts): Promise<string>;
}
