/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: Email bodies and drafts are user content. They must never be
 * logged verbatim; log lengths and identifiers instead. Update this file when
 * adding new secret headers or PII fields.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",
  "*.serviceRoleKey",
  "*.anthropicApiKey",
  "*.openaiApiKey",

  // Common header names
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",

  // Conversation content
  "*.originalEmail",
  "*.userInput",
  "*.userFeedback",
  "*.content",

  // PII fields
  "*.email",
  "*.phone",
  "*.senderContact",
  "*.receiverContact",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
