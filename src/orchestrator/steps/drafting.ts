/**
 * Draft generation and refinement.
 *
 * Both steps append to draftHistory and print the new draft; neither ever
 * rewrites an existing entry.
 */

import { describeError } from "../../utils/errors.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { buildDraftPrompt, buildRefinePrompt } from "../prompt-assembly.js";
import { isBlank, latestDraft } from "../state.js";
import type { AssistantDeps, Step } from "../types.js";

async function generateText(prompt: string, operation: string, deps: AssistantDeps): Promise<string> {
  const text = (await deps.generator.generate(prompt, { operation, requestId: deps.requestId })).trim();
  if (!text) {
    throw new Error("model returned an empty draft");
  }
  return text;
}

export const generateInitialDraft: Step = async (state, deps) => {
  const { summary, keyInfo } = state;
  if (summary === null || isBlank(summary) || keyInfo === null) {
    return { ...state, errorMessage: "Missing summary or entities to generate a draft." };
  }

  let content: string;
  try {
    content = await generateText(buildDraftPrompt(summary, keyInfo, state.currentTone), "generate_draft", deps);
  } catch (error) {
    log.warn({ error, request_id: deps.requestId }, "Draft generation failed");
    return { ...state, errorMessage: `Failed to generate draft: ${describeError(error)}` };
  }

  deps.output.emit({ kind: "draft", text: content });
  emit(TelemetryEvents.DraftGenerated, {
    tone: state.currentTone,
    draft_chars: content.length,
    request_id: deps.requestId,
  });

  return {
    ...state,
    draftHistory: [...state.draftHistory, { content, tone: state.currentTone }],
  };
};

export const refineDraft: Step = async (state, deps) => {
  const current = latestDraft(state);
  if (!current) {
    return { ...state, errorMessage: "No draft to refine." };
  }
  const feedback = state.userFeedback;
  if (feedback === null || isBlank(feedback)) {
    return { ...state, errorMessage: "No user feedback provided to refine the draft." };
  }

  let content: string;
  try {
    content = await generateText(buildRefinePrompt(current.content, feedback, state.currentTone), "refine_draft", deps);
  } catch (error) {
    log.warn({ error, request_id: deps.requestId }, "Draft refinement failed");
    return { ...state, errorMessage: `Failed to refine draft: ${describeError(error)}` };
  }

  deps.output.emit({ kind: "draft", text: content });
  emit(TelemetryEvents.DraftRefined, {
    tone: state.currentTone,
    draft_chars: content.length,
    revision: state.draftHistory.length + 1,
    request_id: deps.requestId,
  });

  return {
    ...state,
    draftHistory: [...state.draftHistory, { content, tone: state.currentTone }],
    userFeedback: null,
  };
};
