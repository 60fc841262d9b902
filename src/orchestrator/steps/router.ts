/**
 * Router step: classifies the turn's input into one intent.
 *
 * A failed classification still completes the turn: the intent becomes
 * "unclear" and the error is reported by HandleError.
 */

import { z } from "zod";
import { describeError } from "../../utils/errors.js";
import { extractJson } from "../../utils/json-extractor.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { buildIntentPrompt } from "../prompt-assembly.js";
import { appendConversationSummary, isBlank } from "../state.js";
import { isIntent, type ConversationState, type SaveTarget, type Step } from "../types.js";

const IntentResponseSchema = z.object({
  intent: z.string(),
  save_target: z.string().nullish().catch(null),
});

const SAVE_TARGET_ALIASES: Record<string, SaveTarget> = {
  local: "local",
  remote: "remote",
  s3: "remote",
  cloud: "remote",
};

export function normaliseSaveTarget(raw: string | null | undefined): SaveTarget | null {
  if (!raw) return null;
  return SAVE_TARGET_ALIASES[raw.trim().toLowerCase()] ?? null;
}

export const routeIntent: Step = async (state, deps) => {
  const userInput = state.userInput ?? "";

  if (isBlank(userInput)) {
    return { ...state, intent: "unclear" };
  }

  let label: string;
  let rawSaveTarget: string | null | undefined;
  try {
    const raw = await deps.generator.generate(buildIntentPrompt(state, userInput), {
      operation: "classify_intent",
      requestId: deps.requestId,
    });
    const parsed = IntentResponseSchema.safeParse(extractJson(raw, { task: "classify_intent" }));
    if (!parsed.success) {
      throw new Error("response did not contain an intent label");
    }
    label = parsed.data.intent.trim();
    rawSaveTarget = parsed.data.save_target;
  } catch (error) {
    log.warn({ error, request_id: deps.requestId }, "Intent classification failed");
    return {
      ...state,
      intent: "unclear",
      errorMessage: `Failed to classify intent: ${describeError(error)}`,
    };
  }

  const intent = isIntent(label) ? label : null;
  emit(TelemetryEvents.IntentClassified, { intent: intent ?? "unknown", request_id: deps.requestId });

  const next: ConversationState = {
    ...state,
    intent,
    conversationSummary: appendConversationSummary(state.conversationSummary, userInput, label, {
      maxEntries: deps.settings.summaryMaxEntries,
      entryMaxChars: deps.settings.summaryEntryMaxChars,
    }),
  };

  switch (intent) {
    case "process_new_email":
      return { ...next, originalEmail: userInput };
    case "refine_draft":
      return { ...next, userFeedback: userInput };
    case "save_draft":
      return { ...next, saveTarget: normaliseSaveTarget(rawSaveTarget) };
    default:
      return next;
  }
};
