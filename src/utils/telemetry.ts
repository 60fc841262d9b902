import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * to ensure both Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;
export type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests.
 * Only used when NODE_ENV=test or VITEST is set.
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  // Direct env check: config/index.ts imports this module
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names.
 * DO NOT rename without updating dashboards.
 */
export const TelemetryEvents = {
  TurnStarted: "assistant.turn.started",
  TurnCompleted: "assistant.turn.completed",
  StepFailed: "assistant.step.failed",
  IntentClassified: "assistant.intent.classified",
  DraftGenerated: "assistant.draft.generated",
  DraftRefined: "assistant.draft.refined",
  DraftSaved: "assistant.draft.saved",
  SessionCreated: "assistant.session.created",
  SessionReset: "assistant.session.reset",
  LlmCallCompleted: "llm.call.completed",
  LlmCallFailed: "llm.call.failed",
  JsonExtractionRequired: "llm.json_extraction.required",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "email_assistant.",
    globalTags: {
      service: env.DD_SERVICE || "email-reply-assistant",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  // Always log to pino
  log.info({ event, ...eventData });

  if (!datadogClient) return;

  switch (event) {
    case TelemetryEvents.TurnCompleted: {
      if (typeof eventData.latency_ms === "number") {
        datadogClient.histogram("turn.latency_ms", eventData.latency_ms, {
          intent: String(eventData.intent ?? "none"),
        });
      }
      datadogClient.increment("turn.completed", 1, {
        terminal_step: String(eventData.terminal_step ?? "unknown"),
      });
      break;
    }
    case TelemetryEvents.StepFailed: {
      datadogClient.increment("step.failed", 1, { step: String(eventData.step ?? "unknown") });
      break;
    }
    case TelemetryEvents.LlmCallCompleted: {
      if (typeof eventData.latency_ms === "number") {
        datadogClient.histogram("llm.latency_ms", eventData.latency_ms, {
          provider: String(eventData.provider ?? "unknown"),
        });
      }
      break;
    }
    case TelemetryEvents.LlmCallFailed: {
      datadogClient.increment("llm.failed", 1, { provider: String(eventData.provider ?? "unknown") });
      break;
    }
    default:
      datadogClient.increment(event, 1);
  }
}
