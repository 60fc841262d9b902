import { describeError, InvariantViolationError } from "../../utils/errors.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { latestDraft, resetConversationState } from "../state.js";
import type { KeyInfo, Step } from "../types.js";

// ============================================================================
// ShowInfo
// ============================================================================

function describeParty(name: string | null, contact: string | null): string {
  if (name && contact) return `${name} (${contact})`;
  return name ?? contact ?? "unknown";
}

export function formatExtractedInfo(keyInfo: KeyInfo | null, summary: string | null): string | null {
  if (!keyInfo && !summary) return null;
  const lines = [
    `Sender: ${describeParty(keyInfo?.senderName ?? null, keyInfo?.senderContact ?? null)}`,
    `Receiver: ${describeParty(keyInfo?.receiverName ?? null, keyInfo?.receiverContact ?? null)}`,
    `Subject: ${keyInfo?.subject ?? "unknown"}`,
    `Summary: ${summary ?? "none"}`,
  ];
  return lines.join("\n");
}

export const showInfo: Step = async (state, deps) => {
  const text = formatExtractedInfo(state.keyInfo, state.summary);
  deps.output.emit({ kind: "info", text: text ?? "No information extracted yet." });
  return state;
};

// ============================================================================
// SaveDraft
// ============================================================================

const pad = (value: number) => String(value).padStart(2, "0");

/** `draft_YYYYMMDD_HHMMSS.txt`, in UTC */
export function draftFilename(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `draft_${date}_${time}.txt`;
}

export const saveDraft: Step = async (state, deps) => {
  const current = latestDraft(state);
  if (!current) {
    return { ...state, errorMessage: "No draft to save." };
  }

  const filename = draftFilename(deps.clock.now());
  const target = state.saveTarget ?? "local";
  const bucket = target === "remote" ? deps.settings.remoteBucket : undefined;

  try {
    await deps.store.store(current.content, filename, target, bucket);
  } catch (error) {
    log.warn({ error, target, request_id: deps.requestId }, "Draft save failed");
    return { ...state, errorMessage: `Failed to save draft: ${describeError(error)}` };
  }

  emit(TelemetryEvents.DraftSaved, { target, request_id: deps.requestId });
  deps.output.emit({ kind: "notice", text: `Draft saved successfully to ${target} storage as ${filename}.` });
  return state;
};

// ============================================================================
// ResetSession
// ============================================================================

export const resetSession: Step = async (state, deps) => {
  if (!state.sessionId) {
    throw new InvariantViolationError("Cannot reset a conversation without a session id");
  }
  emit(TelemetryEvents.SessionReset, { request_id: deps.requestId });
  deps.output.emit({ kind: "notice", text: "Starting a new session." });
  return resetConversationState(state, deps.settings.defaultTone);
};
