import { env } from "node:process";

const MIN_TIMEOUT_MS = 5_000; // 5s
const MAX_TIMEOUT_MS = 5 * 60_000; // 5m

function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/** Default budget for a single text-generation call (LLM_TIMEOUT_MS overrides via config). */
export const DEFAULT_LLM_TIMEOUT_MS = 30_000;

/** Fastify connection/request timeout; covers a full turn of up to four LLM calls. */
export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 150_000),
);
