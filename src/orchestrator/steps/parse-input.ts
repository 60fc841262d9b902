import { describeError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";
import { isLikelyFilePath, isPdfPath, parseLoadCommand } from "../input-detection.js";
import type { Step } from "../types.js";

/**
 * Resolves the turn's email source: a PDF path, an explicit `load <path>` of
 * an existing file, or pasted text.
 */
export const parseInput: Step = async (state, deps) => {
  const text = (state.originalEmail ?? "").trim();
  if (!text) {
    return { ...state, errorMessage: "Input email cannot be empty" };
  }

  const { candidate, explicit } = parseLoadCommand(text);

  if (isLikelyFilePath(candidate)) {
    try {
      if (isPdfPath(candidate)) {
        if (!(await deps.extractor.exists(candidate))) {
          return { ...state, errorMessage: `File not found: ${candidate}` };
        }
        const content = await deps.extractor.extractPlainText(candidate);
        return { ...state, originalEmail: content, emailPath: candidate };
      }

      if (explicit && (await deps.extractor.exists(candidate))) {
        const content = await deps.extractor.extractPlainText(candidate);
        return { ...state, originalEmail: content, emailPath: candidate };
      }
    } catch (error) {
      log.warn({ error, request_id: deps.requestId }, "Email file could not be extracted");
      return { ...state, errorMessage: describeError(error) };
    }
  }

  return { ...state, originalEmail: text, emailPath: null };
};
