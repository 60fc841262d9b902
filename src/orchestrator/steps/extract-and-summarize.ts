import { z } from "zod";
import { describeError } from "../../utils/errors.js";
import { extractJson } from "../../utils/json-extractor.js";
import { log } from "../../utils/telemetry.js";
import { buildExtractionPrompt } from "../prompt-assembly.js";
import { isBlank } from "../state.js";
import type { Step } from "../types.js";

// Non-string values degrade to null rather than failing the whole extraction.
const field = z.string().nullish().catch(null);

/**
 * Model output for extraction. Both camelCase and snake_case keys are seen in
 * practice; camelCase wins when both are present.
 */
const ExtractionResponseSchema = z.object({
  senderName: field,
  senderContact: field,
  receiverName: field,
  receiverContact: field,
  subject: field,
  summary: field,
  sender_name: field,
  sender_contact: field,
  receiver_name: field,
  receiver_contact: field,
});

export const PARSE_FAILURE_MESSAGE = "Failed to parse LLM response as JSON.";

export const extractAndSummarize: Step = async (state, deps) => {
  const email = state.originalEmail;
  if (email === null || isBlank(email)) {
    return { ...state, errorMessage: "No email content to process." };
  }

  let raw: string;
  try {
    raw = await deps.generator.generate(buildExtractionPrompt(email), {
      operation: "extract_and_summarize",
      requestId: deps.requestId,
    });
  } catch (error) {
    log.warn({ error, request_id: deps.requestId }, "Extraction call failed");
    return { ...state, errorMessage: `An unexpected error occurred: ${describeError(error)}` };
  }

  let json: unknown;
  try {
    json = extractJson(raw, { task: "extract_and_summarize" });
  } catch (error) {
    log.warn({ error, request_id: deps.requestId }, "Extraction response was not JSON");
    return { ...state, errorMessage: PARSE_FAILURE_MESSAGE };
  }

  const parsed = ExtractionResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { ...state, errorMessage: PARSE_FAILURE_MESSAGE };
  }

  const data = parsed.data;
  return {
    ...state,
    keyInfo: {
      senderName: data.senderName ?? data.sender_name ?? null,
      senderContact: data.senderContact ?? data.sender_contact ?? null,
      receiverName: data.receiverName ?? data.receiver_name ?? null,
      receiverContact: data.receiverContact ?? data.receiver_contact ?? null,
      subject: data.subject ?? null,
    },
    summary: data.summary ?? null,
  };
};
