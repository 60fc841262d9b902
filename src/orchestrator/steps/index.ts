import type { Step, StepName } from "../types.js";
import { routeIntent } from "./router.js";
import { parseInput } from "./parse-input.js";
import { extractAndSummarize } from "./extract-and-summarize.js";
import { askForTone } from "./ask-for-tone.js";
import { generateInitialDraft, refineDraft } from "./drafting.js";
import { resetSession, saveDraft, showInfo } from "./session.js";
import { handleError, handleIdleChat, handleUnclear } from "./handlers.js";

export const STEPS: Readonly<Record<StepName, Step>> = {
  Router: routeIntent,
  ParseInput: parseInput,
  ExtractAndSummarize: extractAndSummarize,
  AskForTone: askForTone,
  GenerateInitialDraft: generateInitialDraft,
  RefineDraft: refineDraft,
  ShowInfo: showInfo,
  SaveDraft: saveDraft,
  ResetSession: resetSession,
  HandleUnclear: handleUnclear,
  HandleIdleChat: handleIdleChat,
  HandleError: handleError,
};
