import Anthropic from "@anthropic-ai/sdk";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { GenerateOpts, TextGenerator } from "./types.js";
import { GenerationError, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-sonnet-20241022";

export interface AnthropicGeneratorOptions {
  apiKey?: string;
  model?: string;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Text generation through the Anthropic Messages API.
 *
 * The client is created lazily so the service can start (and tests can run)
 * without an API key until the first call.
 */
export class AnthropicTextGenerator implements TextGenerator {
  readonly name = "anthropic" as const;
  readonly model: string;
  private client: Anthropic | null = null;

  constructor(private readonly options: AnthropicGeneratorOptions) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  }

  private getClient(): Anthropic {
    if (!this.options.apiKey) {
      throw new GenerationError("ANTHROPIC_API_KEY environment variable is required but not set", this.name);
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async generate(prompt: string, opts: GenerateOpts = {}): Promise<string> {
    const operation = opts.operation ?? "generate";
    const startTime = Date.now();
    const apiClient = this.getClient();

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), this.options.timeoutMs);
    const onCallerAbort = () => abortController.abort();
    opts.abortSignal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await apiClient.messages.create(
        {
          model: this.model,
          max_tokens: this.options.maxTokens,
          messages: [{ role: "user", content: prompt }],
        },
        { signal: abortController.signal }
      );

      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");

      emit(TelemetryEvents.LlmCallCompleted, {
        provider: this.name,
        model: this.model,
        operation,
        request_id: opts.requestId,
        latency_ms: Date.now() - startTime,
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
      });

      return text;
    } catch (error) {
      const elapsedMs = Date.now() - startTime;
      emit(TelemetryEvents.LlmCallFailed, { provider: this.name, operation, request_id: opts.requestId, elapsed_ms: elapsedMs });

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: this.options.timeoutMs, elapsed_ms: elapsedMs, operation }, "Anthropic call timed out and was aborted");
        throw new UpstreamTimeoutError(`Anthropic ${operation} timed out`, this.name, operation, elapsedMs, error);
      }

      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        log.error({ status: error.status, elapsed_ms: elapsedMs, operation }, "Anthropic API returned non-2xx status");
        throw new UpstreamHTTPError(
          `Anthropic ${operation} failed: ${error.message || "unknown error"}`,
          this.name,
          error.status,
          elapsedMs,
          error
        );
      }

      log.error({ error, operation }, "Anthropic call failed");
      throw new GenerationError(
        `Anthropic ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        error
      );
    } finally {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
