import { describeError, ToneRequestCancelledError } from "../../utils/errors.js";
import type { Step } from "../types.js";

export const askForTone: Step = async (state, deps) => {
  const fallback = deps.settings.defaultTone;
  try {
    const tone = await deps.tone.requestTone({ keyInfo: state.keyInfo, summary: state.summary });
    return { ...state, currentTone: tone.trim() || fallback };
  } catch (error) {
    if (error instanceof ToneRequestCancelledError) {
      return { ...state, currentTone: fallback, errorMessage: "User cancelled the operation." };
    }
    return { ...state, currentTone: fallback, errorMessage: `Failed to read tone: ${describeError(error)}` };
  }
};
