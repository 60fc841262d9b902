/**
 * In-memory session store for the HTTP service.
 *
 * Holds one ConversationState per session and serializes turns per session:
 * runExclusive chains each turn onto the previous one, so two requests for
 * the same session never run the graph concurrently. Nothing survives a
 * process restart.
 */

import { randomUUID } from "node:crypto";
import { SessionNotFoundError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { createConversationState } from "./state.js";
import type { ConversationState } from "./types.js";

// ============================================================================
// Types
// ============================================================================

interface SessionEntry {
  state: ConversationState;
  lastActiveAt: number;
  /** Tail of the per-session turn chain */
  tail: Promise<void>;
}

export interface SessionStoreOptions {
  ttlMs: number;
  defaultTone?: string;
  now?: () => number;
}

// ============================================================================
// Store
// ============================================================================

export class SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): ConversationState {
    const state = createConversationState(randomUUID(), this.options.defaultTone);
    this.sessions.set(state.sessionId, { state, lastActiveAt: this.now(), tail: Promise.resolve() });
    emit(TelemetryEvents.SessionCreated, { sessions: this.sessions.size });
    return state;
  }

  /**
   * @throws SessionNotFoundError
   */
  get(sessionId: string): ConversationState {
    return this.require(sessionId).state;
  }

  /**
   * Run `fn` with the session's current state once every earlier turn for the
   * session has settled, and store the state it resolves with.
   *
   * @throws SessionNotFoundError
   */
  async runExclusive<T>(
    sessionId: string,
    fn: (state: ConversationState) => Promise<{ state: ConversationState; result: T }>
  ): Promise<T> {
    const entry = this.require(sessionId);

    const turn = entry.tail.then(async () => {
      const outcome = await fn(entry.state);
      entry.state = outcome.state;
      entry.lastActiveAt = this.now();
      return outcome.result;
    });

    // The chain only orders turns; each caller sees its own failure through `turn`.
    entry.tail = turn.then(
      () => undefined,
      (error: unknown) => {
        log.debug({ error, session_id: sessionId }, "Session turn failed");
      }
    );

    return turn;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Drop sessions idle for longer than the TTL. Returns the number removed.
   */
  prune(now: number = this.now()): number {
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (now - entry.lastActiveAt > this.options.ttlMs) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      log.info({ removed, remaining: this.sessions.size }, "Pruned idle sessions");
    }
    return removed;
  }

  private require(sessionId: string): SessionEntry {
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      throw new SessionNotFoundError(sessionId);
    }
    return entry;
  }
}
