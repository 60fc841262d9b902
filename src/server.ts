// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { getConfig, isProduction } from "./config/index.js";
import { ROUTE_TIMEOUT_MS } from "./config/timeouts.js";
import { createAssistantServices, SessionStore, type AssistantServices } from "./orchestrator/index.js";
import { assistantRoutesV1 } from "./orchestrator/route.js";
import { SERVICE_VERSION } from "./version.js";
import { getOrGenerateRequestId, getRequestId, REQUEST_ID_HEADER } from "./utils/request-id.js";
import { getStatusCodeForErrorCode, RateLimitedError, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";

const SESSION_PRUNE_INTERVAL_MS = 60_000;

export interface BuildOptions {
  /** Replaces the configured ports (tests pass in-process fakes) */
  services?: AssistantServices;
  sessions?: SessionStore;
}

/**
 * Build and configure Fastify server instance
 * (Can be imported for testing or run directly)
 */
export async function build(options: BuildOptions = {}) {
  const config = getConfig();

  if (isProduction() && config.server.allowedOrigins.includes("*")) {
    throw new Error("FATAL: ALLOWED_ORIGINS cannot contain '*' in production");
  }

  const services = options.services ?? createAssistantServices(config);
  const sessions =
    options.sessions ??
    new SessionStore({ ttlMs: config.assistant.sessionTtlMs, defaultTone: config.assistant.defaultTone });

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    connectionTimeout: ROUTE_TIMEOUT_MS,
    requestTimeout: ROUTE_TIMEOUT_MS,
    genReqId: getOrGenerateRequestId,
  });

  await app.register(cors, {
    origin: config.server.allowedOrigins,
  });

  // Pure JSON API: CSP and cross-origin isolation headers do not apply
  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
    crossOriginOpenerPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(rateLimit, {
    global: true,
    max: config.server.globalRateLimitRpm,
    timeWindow: "1 minute",
    errorResponseBuilder: (req, context) => {
      app.log.warn({ max: context.max, request_id: getRequestId(req) }, "Rate limit exceeded");
      return new RateLimitedError(Math.max(1, Math.ceil(context.ttl / 1000)));
    },
  });

  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error({ error, request_id: errorV1.request_id }, `[${errorV1.code}] ${errorV1.message}`);
    } else {
      request.log.warn({ request_id: errorV1.request_id, code: errorV1.code }, `[${errorV1.code}] ${errorV1.message}`);
    }

    const retryAfter = errorV1.details?.retry_after_seconds;
    if (errorV1.code === "RATE_LIMITED" && typeof retryAfter === "number") {
      reply.header("Retry-After", retryAfter);
    }

    return reply.status(statusCode).send(errorV1);
  });

  app.get("/healthz", async () => ({
    status: "ok",
    version: SERVICE_VERSION,
  }));

  await app.register(assistantRoutesV1, { services, sessions });

  const pruneTimer = setInterval(() => sessions.prune(), SESSION_PRUNE_INTERVAL_MS);
  pruneTimer.unref();
  app.addHook("onClose", async () => {
    clearInterval(pruneTimer);
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      const config = getConfig();
      app.log.info(
        {
          service: "email-reply-assistant",
          version: SERVICE_VERSION,
          provider: config.llm.provider,
          body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
          cors_origins: config.server.allowedOrigins,
          route_timeout_ms: ROUTE_TIMEOUT_MS,
        },
        "Email reply assistant starting"
      );
      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      console.error("Failed to start server:", err);
      process.exit(1);
    });
}
