import { DEFAULT_TONE, type ConversationState, type Draft } from "./types.js";

export function createConversationState(sessionId: string, defaultTone: string = DEFAULT_TONE): ConversationState {
  return {
    sessionId,
    userInput: null,
    intent: null,
    originalEmail: null,
    emailPath: null,
    keyInfo: null,
    summary: null,
    draftHistory: [],
    currentTone: defaultTone,
    userFeedback: null,
    errorMessage: null,
    saveTarget: null,
    conversationSummary: "",
  };
}

/**
 * Fresh state for the same session; everything but the id is discarded.
 */
export function resetConversationState(state: ConversationState, defaultTone?: string): ConversationState {
  return createConversationState(state.sessionId, defaultTone);
}

export function latestDraft(state: ConversationState): Draft | undefined {
  return state.draftHistory[state.draftHistory.length - 1];
}

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

export interface SummaryBounds {
  maxEntries: number;
  entryMaxChars: number;
}

function singleLine(text: string, maxChars: number): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  return collapsed.length > maxChars ? `${collapsed.slice(0, maxChars)}...` : collapsed;
}

/**
 * Append one classification entry to the running summary, keeping only the
 * newest `maxEntries` entries. Input and label are both collapsed to a single
 * line so the summary stays one entry per line.
 */
export function appendConversationSummary(
  summary: string,
  userInput: string,
  intentLabel: string,
  bounds: SummaryBounds
): string {
  const input = singleLine(userInput, bounds.entryMaxChars);
  const label = singleLine(intentLabel, bounds.entryMaxChars);
  const entry = `User said: '${input}' -> AI classified intent as: '${label}'`;
  const entries = summary === "" ? [entry] : [...summary.split("\n"), entry];
  return entries.slice(-bounds.maxEntries).join("\n");
}
