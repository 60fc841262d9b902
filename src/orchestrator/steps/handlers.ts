import type { Step } from "../types.js";

export const HELP_MESSAGE = [
  "I'm not sure what you mean. Here is what I can do:",
  "- Draft a reply: paste an email, give a PDF path, or type `load <path>`",
  "- Refine the draft: tell me what to change",
  "- Show the extracted information",
  "- Save the draft locally or to remote storage",
  "- Start a new session",
].join("\n");

export const IDLE_CHAT_MESSAGE = "Hello! How can I help you with your email?";

export const handleUnclear: Step = async (state, deps) => {
  deps.output.emit({ kind: "help", text: HELP_MESSAGE });
  return { ...state, intent: "unclear" };
};

export const handleIdleChat: Step = async (state, deps) => {
  deps.output.emit({ kind: "info", text: IDLE_CHAT_MESSAGE });
  return state;
};

export const handleError: Step = async (state, deps) => {
  if (state.errorMessage === null) return state;
  deps.output.emit({ kind: "error", text: `An error occurred: ${state.errorMessage}` });
  return { ...state, errorMessage: null };
};
