import OpenAI from "openai";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { GenerateOpts, TextGenerator } from "./types.js";
import { GenerationError, UpstreamHTTPError, UpstreamTimeoutError } from "./errors.js";

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  model?: string;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Text generation through OpenAI chat completions.
 */
export class OpenAITextGenerator implements TextGenerator {
  readonly name = "openai" as const;
  readonly model: string;
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAIGeneratorOptions) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
  }

  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new GenerationError("OPENAI_API_KEY environment variable is required but not set", this.name);
    }
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.options.apiKey });
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
      const response = await apiClient.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          max_tokens: this.options.maxTokens,
        },
        { signal: abortController.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        log.error({ operation, finish_reason: response.choices[0]?.finish_reason }, "OpenAI returned empty content");
        throw new GenerationError(`OpenAI ${operation} returned empty content`, this.name);
      }

      emit(TelemetryEvents.LlmCallCompleted, {
        provider: this.name,
        model: this.model,
        operation,
        request_id: opts.requestId,
        latency_ms: Date.now() - startTime,
        input_tokens: response.usage?.prompt_tokens,
        output_tokens: response.usage?.completion_tokens,
      });

      return content;
    } catch (error) {
      if (error instanceof GenerationError) throw error;

      const elapsedMs = Date.now() - startTime;
      emit(TelemetryEvents.LlmCallFailed, { provider: this.name, operation, request_id: opts.requestId, elapsed_ms: elapsedMs });

      if (abortController.signal.aborted) {
        log.error({ timeout_ms: this.options.timeoutMs, elapsed_ms: elapsedMs, operation }, "OpenAI call timed out and was aborted");
        throw new UpstreamTimeoutError(`OpenAI ${operation} timed out`, this.name, operation, elapsedMs, error);
      }

      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        log.error({ status: error.status, elapsed_ms: elapsedMs, operation }, "OpenAI API returned non-2xx status");
        throw new UpstreamHTTPError(
          `OpenAI ${operation} failed: ${error.message || "unknown error"}`,
          this.name,
          error.status,
          elapsedMs,
          error
        );
      }

      log.error({ error, operation }, "OpenAI call failed");
      throw new GenerationError(
        `OpenAI ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        error
      );
    } finally {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
