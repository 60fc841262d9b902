/**
 * JSON Extractor Utility
 *
 * Extracts valid JSON from LLM responses that may contain conversational
 * preamble, suffix text, or markdown code blocks, even when the prompt asked
 * for JSON only.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";

export type ExtractionMethod = "fast_path" | "code_block" | "boundary" | "bracket_matching";

export interface JsonExtractionResult {
  /** The extracted and parsed JSON */
  json: unknown;
  /** Whether extraction was needed (true if raw content wasn't valid JSON) */
  wasExtracted: boolean;
  extractionMethod: ExtractionMethod;
  /** Characters of preamble text that was stripped */
  preambleLength: number;
  /** Characters of suffix text that was stripped */
  suffixLength: number;
}

export interface JsonExtractionOptions {
  /** Task name for telemetry (e.g., "classify_intent") */
  task?: string;
  /** Whether to log warnings when extraction is needed */
  logWarnings?: boolean;
}

/**
 * Thrown when no JSON value can be recovered from a response.
 */
export class JsonExtractionError extends Error {
  readonly name = "JsonExtractionError";

  constructor(message: string) {
    super(message);
  }
}

/**
 * Extract JSON from an LLM response.
 *
 * Strategy (in order):
 * 1. Parse the trimmed content as-is
 * 2. Parse the first markdown code block (```json ... ```) holding valid JSON
 * 3. Bracket-match from each `{` or `[` until a valid JSON value is found
 *
 * @throws JsonExtractionError if no valid JSON can be extracted
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {}
): JsonExtractionResult {
  const { task, logWarnings = true } = options;
  const trimmed = content.trim();

  const report = (result: JsonExtractionResult): JsonExtractionResult => {
    if (result.wasExtracted) {
      if (logWarnings) {
        log.warn(
          {
            task,
            extraction_method: result.extractionMethod,
            preamble_length: result.preambleLength,
            suffix_length: result.suffixLength,
          },
          "JSON extraction required - model returned text around the JSON"
        );
      }
      emit(TelemetryEvents.JsonExtractionRequired, {
        task,
        extraction_method: result.extractionMethod,
        preamble_length: result.preambleLength,
        suffix_length: result.suffixLength,
      });
    }
    return result;
  };

  // === Fast path: already valid JSON ===
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    try {
      return {
        json: JSON.parse(trimmed),
        wasExtracted: false,
        extractionMethod: "fast_path",
        preambleLength: 0,
        suffixLength: 0,
      };
    } catch {
      // Trailing text after valid JSON is the common case here
      const early = extractJsonWithBracketMatching(trimmed, 0);
      if (early) {
        return report({
          json: early.json,
          wasExtracted: true,
          extractionMethod: "boundary",
          preambleLength: 0,
          suffixLength: trimmed.length - early.content.length,
        });
      }
    }
  }

  // === Markdown code blocks ===
  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  let codeBlockMatch: RegExpExecArray | null;
  while ((codeBlockMatch = codeBlockRegex.exec(trimmed)) !== null) {
    const blockContent = (codeBlockMatch[1] ?? "").trim();
    try {
      const json: unknown = JSON.parse(blockContent);
      const blockEnd = codeBlockMatch.index + codeBlockMatch[0].length;
      return report({
        json,
        wasExtracted: true,
        extractionMethod: "code_block",
        preambleLength: codeBlockMatch.index,
        suffixLength: trimmed.length - blockEnd,
      });
    } catch {
      // Not JSON, try the next block
      continue;
    }
  }

  // === Bracket matching from each candidate start ===
  const candidates: number[] = [];
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === "{" || trimmed[i] === "[") {
      candidates.push(i);
    }
  }

  if (candidates.length === 0) {
    throw new JsonExtractionError("No JSON structure found in response: missing opening delimiter");
  }

  for (const index of candidates) {
    const bracketResult = extractJsonWithBracketMatching(trimmed, index);
    if (bracketResult) {
      const suffixLength = trimmed.length - (index + bracketResult.content.length);
      return report({
        json: bracketResult.json,
        wasExtracted: index > 0 || suffixLength > 0,
        extractionMethod: index === candidates[0] ? "boundary" : "bracket_matching",
        preambleLength: index,
        suffixLength,
      });
    }
  }

  throw new JsonExtractionError(
    `Failed to extract valid JSON from response: tried ${candidates.length} candidate position(s)`
  );
}

/**
 * Scan from a starting bracket, counting depth outside of strings, and parse
 * the first balanced structure.
 */
function extractJsonWithBracketMatching(
  content: string,
  startIndex: number
): { json: unknown; content: string } | null {
  const openBracket = content[startIndex];
  if (openBracket !== "{" && openBracket !== "[") {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === "\\") {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      try {
        return { json: JSON.parse(jsonStr), content: jsonStr };
      } catch {
        return null;
      }
    }
  }

  // Unbalanced brackets
  return null;
}

/**
 * Convenience function that returns just the parsed JSON.
 *
 * @throws JsonExtractionError if no valid JSON can be extracted
 */
export function extractJson(content: string, options?: JsonExtractionOptions): unknown {
  return extractJsonFromResponse(content, options).json;
}
