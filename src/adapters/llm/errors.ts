/**
 * Shared error types for text-generation adapter failures
 */

import { AppError } from "../../utils/errors.js";

/**
 * Generic backend failure: empty or unusable response, missing credentials,
 * network failure without an HTTP status.
 */
export class GenerationError extends AppError {
  constructor(
    message: string,
    public readonly provider: string,
    cause?: unknown
  ) {
    super(message, "GENERATION_ERROR", cause);
    this.name = "GenerationError";
  }
}

/**
 * Upstream timeout error - thrown when an LLM API call exceeds its budget
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when an LLM API returns a non-2xx status
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}
