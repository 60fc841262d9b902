/**
 * Email Assistant Orchestrator Types
 *
 * Conversation state, intents, step names and the ports every step is given.
 */

import { z } from "zod";
import type { TextGenerator } from "../adapters/llm/types.js";
import type { ContentExtractor } from "../adapters/extraction/types.js";
import type { DraftStore, SaveTarget } from "../adapters/storage/types.js";

export type { SaveTarget } from "../adapters/storage/types.js";

// ============================================================================
// Intents
// ============================================================================

export const INTENTS = [
  "process_new_email",
  "refine_draft",
  "show_info",
  "save_draft",
  "reset_session",
  "handle_idle_chat",
  "unclear",
] as const;

export type Intent = (typeof INTENTS)[number];

export function isIntent(value: unknown): value is Intent {
  return typeof value === "string" && INTENTS.some((intent) => intent === value);
}

// ============================================================================
// Conversation State
// ============================================================================

export const DEFAULT_TONE = "professional";

const nullableString = z.string().nullable();

export const KeyInfoSchema = z.object({
  senderName: nullableString,
  senderContact: nullableString,
  receiverName: nullableString,
  receiverContact: nullableString,
  subject: nullableString,
});

export const DraftSchema = z.object({
  content: z.string(),
  tone: z.string(),
});

/**
 * Validates a state held outside the process (stateless HTTP turns).
 */
export const ConversationStateSchema = z.object({
  sessionId: z.string().min(1),
  userInput: nullableString,
  intent: z.enum(INTENTS).nullable(),
  originalEmail: nullableString,
  emailPath: nullableString,
  keyInfo: KeyInfoSchema.nullable(),
  summary: nullableString,
  draftHistory: z.array(DraftSchema),
  currentTone: z.string().min(1),
  userFeedback: nullableString,
  errorMessage: nullableString,
  saveTarget: z.enum(["local", "remote"]).nullable(),
  conversationSummary: z.string(),
});

export type KeyInfo = z.infer<typeof KeyInfoSchema>;
export type Draft = z.infer<typeof DraftSchema>;
export type ConversationState = z.infer<typeof ConversationStateSchema>;

// ============================================================================
// Steps
// ============================================================================

export type StepName =
  | "Router"
  | "ParseInput"
  | "ExtractAndSummarize"
  | "AskForTone"
  | "GenerateInitialDraft"
  | "RefineDraft"
  | "ShowInfo"
  | "SaveDraft"
  | "ResetSession"
  | "HandleUnclear"
  | "HandleIdleChat"
  | "HandleError";

export const END = "END" as const;
export type NextStep = StepName | typeof END;

// ============================================================================
// Ports
// ============================================================================

export type AssistantMessageKind = "info" | "help" | "error" | "draft" | "notice";

export interface AssistantMessage {
  kind: AssistantMessageKind;
  text: string;
}

export interface OutputChannel {
  emit(message: AssistantMessage): void;
}

export interface ToneRequest {
  keyInfo: KeyInfo | null;
  summary: string | null;
}

/**
 * Asks the user for a tone. Rejects with ToneRequestCancelledError on abort.
 */
export interface ToneSource {
  requestTone(request: ToneRequest): Promise<string>;
}

export interface Clock {
  now(): Date;
}

export interface AssistantSettings {
  /** Tone used when the user gives none, and after a reset */
  defaultTone: string;
  /** Bucket passed to the draft store for remote saves */
  remoteBucket?: string;
  summaryMaxEntries: number;
  summaryEntryMaxChars: number;
}

/**
 * Everything a step may touch besides the state it is given.
 */
export interface AssistantDeps {
  generator: TextGenerator;
  extractor: ContentExtractor;
  store: DraftStore;
  tone: ToneSource;
  output: OutputChannel;
  clock: Clock;
  settings: AssistantSettings;
  /** Correlates LLM calls with the request that triggered the turn */
  requestId?: string;
}

export type Step = (state: ConversationState, deps: AssistantDeps) => Promise<ConversationState>;

export interface TurnResult {
  state: ConversationState;
  visited: StepName[];
}
