/**
 * Prompt Assembly for the Email Assistant
 *
 * One builder per LLM-backed step. Each prompt is a single user message; the
 * JSON-returning prompts spell out the exact object shape they expect back.
 */

import { INTENTS, type ConversationState, type KeyInfo } from "./types.js";
import { latestDraft } from "./state.js";

// ============================================================================
// Intent Classification
// ============================================================================

const INTENT_GUIDE: Record<(typeof INTENTS)[number], string> = {
  process_new_email: "the user pastes a new email, or gives a file path / `load <path>` command for one",
  refine_draft: "the user asks to change the current draft (tone, length, content)",
  show_info: "the user asks what was extracted from the email (sender, subject, summary)",
  save_draft: "the user asks to save the current draft, locally or to remote/cloud/s3 storage",
  reset_session: "the user wants to start over or begin a new session",
  handle_idle_chat: "greetings and small talk unrelated to an email",
  unclear: "anything else",
};

export function buildIntentPrompt(state: ConversationState, userInput: string): string {
  const current = latestDraft(state);
  const intentLines = INTENTS.map((intent) => `- ${intent}: ${INTENT_GUIDE[intent]}`).join("\n");

  return [
    "You classify the latest message of a user working with an email reply assistant.",
    "",
    "Valid intents:",
    intentLines,
    "",
    `Conversation so far:\n${state.conversationSummary || "(none)"}`,
    "",
    `A draft exists: ${current ? "yes" : "no"}`,
    current ? `Current draft:\n"""${current.content}"""` : "",
    "",
    `User message: """${userInput}"""`,
    "",
    'Respond with a single JSON object: {"intent": "<one valid intent>"}.',
    'For save_draft add "save_target": "local" or "remote" when the user names a destination.',
  ]
    .filter((line, index, lines) => !(line === "" && lines[index - 1] === ""))
    .join("\n");
}

// ============================================================================
// Extraction & Summary
// ============================================================================

export function buildExtractionPrompt(email: string): string {
  return [
    "Extract the key information from the email below and summarize it in one paragraph.",
    "Return one minified JSON object with exactly these keys:",
    '{"senderName":string|null,"senderContact":string|null,"receiverName":string|null,"receiverContact":string|null,"subject":string|null,"summary":string}',
    "Use null for anything the email does not state. Return only the JSON.",
    "",
    `Email:\n"""${email}"""`,
  ].join("\n");
}

// ============================================================================
// Drafting
// ============================================================================

function describeParty(name: string | null, contact: string | null): string {
  if (name && contact) return `${name} <${contact}>`;
  return name ?? contact ?? "unknown";
}

export function buildDraftPrompt(summary: string, keyInfo: KeyInfo, tone: string): string {
  return [
    "Write a reply to the email summarized below.",
    "",
    `Summary: ${summary}`,
    `Original sender (the person you are replying to): ${describeParty(keyInfo.senderName, keyInfo.senderContact)}`,
    `Original receiver (the person replying): ${describeParty(keyInfo.receiverName, keyInfo.receiverContact)}`,
    `Subject: ${keyInfo.subject ?? "unknown"}`,
    `Tone: ${tone}`,
    "",
    "Return only the body of the reply.",
  ].join("\n");
}

export function buildRefinePrompt(draft: string, feedback: string, tone: string): string {
  return [
    "Revise the email draft below according to the user's feedback.",
    "",
    `Draft:\n"""${draft}"""`,
    "",
    `Feedback: ${feedback}`,
    `Keep the tone ${tone} unless the feedback asks otherwise.`,
    "",
    "Return only the revised draft.",
  ].join("\n");
}
