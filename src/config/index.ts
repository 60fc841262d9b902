/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Parsed lazily on first access so tests can stub the environment first.
 */

import { z } from "zod";
import { DEFAULT_LLM_TIMEOUT_MS } from "./timeouts.js";

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["anthropic", "openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

/**
 * Optional string that treats empty as undefined
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Configuration Schema
 */
const ConfigSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
    bodyLimitBytes: z.coerce.number().int().positive().default(1024 * 1024),
    allowedOrigins: z
      .string()
      .default("http://localhost:5173,http://localhost:3000")
      .transform((raw) => raw.split(",").map((o) => o.trim()).filter((o) => o.length > 0)),
    globalRateLimitRpm: z.coerce.number().int().positive().default(120),
  }),

  llm: z.object({
    provider: LLMProvider.default("anthropic"),
    model: optionalString,
    anthropicApiKey: optionalString,
    openaiApiKey: optionalString,
    maxTokens: z.coerce.number().int().positive().default(1024),
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS),
  }),

  storage: z.object({
    localDir: z.string().min(1).default("drafts"),
    remoteBucket: optionalString,
    supabaseUrl: optionalString,
    supabaseServiceRoleKey: optionalString,
  }),

  assistant: z.object({
    defaultTone: z.string().min(1).default("professional"),
    summaryMaxEntries: z.coerce.number().int().positive().default(20),
    summaryEntryMaxChars: z.coerce.number().int().positive().default(500),
    sessionTtlMs: z.coerce.number().int().positive().default(60 * 60 * 1000),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      allowedOrigins: env.ALLOWED_ORIGINS,
      globalRateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      openaiApiKey: env.OPENAI_API_KEY,
      maxTokens: env.LLM_MAX_TOKENS,
      timeoutMs: env.LLM_TIMEOUT_MS,
    },
    storage: {
      localDir: env.DRAFTS_DIR,
      remoteBucket: env.DRAFTS_BUCKET,
      supabaseUrl: env.SUPABASE_URL,
      supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    },
    assistant: {
      defaultTone: env.ASSISTANT_DEFAULT_TONE,
      summaryMaxEntries: env.ASSISTANT_SUMMARY_MAX_ENTRIES,
      summaryEntryMaxChars: env.ASSISTANT_SUMMARY_ENTRY_MAX_CHARS,
      sessionTtlMs: env.ASSISTANT_SESSION_TTL_MS,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing the environment on first access.
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return getConfig().server.nodeEnv === "production";
}
