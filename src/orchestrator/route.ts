/**
 * Assistant HTTP routes
 *
 * Session-backed turns:
 *   POST   /assistant/v1/sessions
 *   GET    /assistant/v1/sessions/:id
 *   POST   /assistant/v1/sessions/:id/turns
 *   DELETE /assistant/v1/sessions/:id
 *
 * Stateless turn (the client holds the state):
 *   POST   /assistant/v1/turn
 *
 * Validates bodies with Zod; failures return a 400 error.v1 envelope. Unknown
 * sessions surface as SessionNotFoundError and are mapped by the server's
 * error handler.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { SessionNotFoundError, zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { log } from "../utils/telemetry.js";
import { BufferedOutputChannel, FixedToneSource } from "./channels.js";
import { createAssistantGraph } from "./graph.js";
import type { AssistantServices } from "./index.js";
import type { SessionStore } from "./session-store.js";
import { ConversationStateSchema, type AssistantMessage, type ConversationState, type StepName } from "./types.js";

// ============================================================================
// Request Validation Schemas
// ============================================================================

const MAX_MESSAGE_CHARS = 100_000;

const TurnBodySchema = z.object({
  message: z.string().max(MAX_MESSAGE_CHARS),
  tone: z.string().max(100).optional(),
});

const StatelessTurnBodySchema = TurnBodySchema.extend({
  state: ConversationStateSchema,
});

const SessionParamsSchema = z.object({
  id: z.string().min(1).max(200),
});

// ============================================================================
// Turn execution
// ============================================================================

interface TurnOutcome {
  state: ConversationState;
  messages: AssistantMessage[];
  visited: StepName[];
}

async function executeTurn(
  services: AssistantServices,
  state: ConversationState,
  message: string,
  tone: string | undefined,
  requestId: string
): Promise<TurnOutcome> {
  const output = new BufferedOutputChannel();
  const graph = createAssistantGraph({
    ...services,
    output,
    tone: new FixedToneSource(tone),
    requestId,
  });
  const { state: next, visited } = await graph.run(state, message);
  return { state: next, messages: output.messages, visited };
}

// ============================================================================
// Route Registration
// ============================================================================

export interface AssistantRouteOptions {
  services: AssistantServices;
  sessions: SessionStore;
}

export async function assistantRoutesV1(app: FastifyInstance, opts: AssistantRouteOptions): Promise<void> {
  const { services, sessions } = opts;

  app.post("/assistant/v1/sessions", async (_req, reply) => {
    const state = sessions.create();
    reply.code(201);
    return { session_id: state.sessionId, state };
  });

  app.get("/assistant/v1/sessions/:id", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, getRequestId(req)));
    }
    return { session_id: params.data.id, state: sessions.get(params.data.id) };
  });

  app.post("/assistant/v1/sessions/:id/turns", async (req, reply) => {
    const requestId = getRequestId(req);
    const params = SessionParamsSchema.safeParse(req.params);
    const body = TurnBodySchema.safeParse(req.body);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }
    if (!body.success) {
      log.warn({ request_id: requestId, errors: body.error.flatten() }, "Turn request validation failed");
      return reply.code(400).send(zodErrorToErrorV1(body.error, requestId));
    }

    const startTime = Date.now();
    const outcome = await sessions.runExclusive(params.data.id, async (state) => {
      const result = await executeTurn(services, state, body.data.message, body.data.tone, requestId);
      return { state: result.state, result };
    });

    log.info(
      { request_id: requestId, elapsed_ms: Date.now() - startTime, visited: outcome.visited },
      "Assistant turn completed"
    );

    return {
      session_id: params.data.id,
      state: outcome.state,
      messages: outcome.messages,
      visited: outcome.visited,
    };
  });

  app.delete("/assistant/v1/sessions/:id", async (req, reply) => {
    const params = SessionParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, getRequestId(req)));
    }
    if (!sessions.delete(params.data.id)) {
      throw new SessionNotFoundError(params.data.id);
    }
    return reply.code(204).send();
  });

  app.post("/assistant/v1/turn", async (req, reply) => {
    const requestId = getRequestId(req);
    const body = StatelessTurnBodySchema.safeParse(req.body);
    if (!body.success) {
      log.warn({ request_id: requestId, errors: body.error.flatten() }, "Stateless turn validation failed");
      return reply.code(400).send(zodErrorToErrorV1(body.error, requestId));
    }

    const outcome = await executeTurn(services, body.data.state, body.data.message, body.data.tone, requestId);
    return { session_id: outcome.state.sessionId, ...outcome };
  });
}
