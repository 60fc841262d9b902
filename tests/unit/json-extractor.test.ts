/**
 * JSON Extractor Unit Tests
 *
 * LLM responses often wrap the requested JSON in prose or markdown fences.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { extractJsonFromResponse, extractJson, JsonExtractionError } from "../../src/utils/json-extractor.js";
import { emit } from "../../src/utils/telemetry.js";

// Mock telemetry to prevent actual emissions during tests
vi.mock("../../src/utils/telemetry.js", () => ({
  log: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  emit: vi.fn(),
  TelemetryEvents: {
    JsonExtractionRequired: "llm.json_extraction.required",
  },
}));

describe("extractJsonFromResponse", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("fast path - clean JSON", () => {
    it("parses an object without extraction", () => {
      const result = extractJsonFromResponse('  {"intent": "show_info"}\n');

      expect(result.wasExtracted).toBe(false);
      expect(result.extractionMethod).toBe("fast_path");
      expect(result.json).toEqual({ intent: "show_info" });
      expect(emit).not.toHaveBeenCalled();
    });

    it("recovers JSON followed by trailing text", () => {
      const result = extractJsonFromResponse('{"intent": "refine_draft"} I hope this helps!');

      expect(result.json).toEqual({ intent: "refine_draft" });
      expect(result.extractionMethod).toBe("boundary");
      expect(result.suffixLength).toBe(" I hope this helps!".length);
    });
  });

  describe("markdown code blocks", () => {
    it("extracts from a json fence", () => {
      const content = 'Sure, here it is:\n```json\n{"intent": "save_draft", "save_target": "local"}\n```';
      const result = extractJsonFromResponse(content, { task: "classify_intent" });

      expect(result.extractionMethod).toBe("code_block");
      expect(result.json).toEqual({ intent: "save_draft", save_target: "local" });
      expect(result.preambleLength).toBe("Sure, here it is:\n".length);
      expect(emit).toHaveBeenCalledWith("llm.json_extraction.required", {
        task: "classify_intent",
        extraction_method: "code_block",
        preamble_length: 18,
        suffix_length: 0,
      });
    });

    it("skips fences that do not hold JSON", () => {
      const content = "```\nnot json\n```\nthen ```json\n{\"ok\": true}\n```";
      expect(extractJson(content)).toEqual({ ok: true });
    });
  });

  describe("bracket matching", () => {
    it("finds JSON inside prose and ignores braces in strings", () => {
      const content = 'The details are {"subject": "Re: {draft}", "summary": "ok"} as requested.';
      const result = extractJsonFromResponse(content);

      expect(result.json).toEqual({ subject: "Re: {draft}", summary: "ok" });
      expect(result.wasExtracted).toBe(true);
      expect(result.preambleLength).toBe("The details are ".length);
    });

    it("moves past a candidate that is not valid JSON", () => {
      const result = extractJsonFromResponse('Options {a, b} and then {"intent": "unclear"}');

      expect(result.json).toEqual({ intent: "unclear" });
      expect(result.extractionMethod).toBe("bracket_matching");
    });
  });

  describe("failures", () => {
    it("throws when there is no JSON at all", () => {
      expect(() => extractJsonFromResponse("I could not classify that.")).toThrow(JsonExtractionError);
      expect(() => extractJsonFromResponse("I could not classify that.")).toThrow(/missing opening delimiter/);
    });

    it("throws when every candidate is broken", () => {
      expect(() => extractJsonFromResponse('{"intent": ')).toThrow("tried 1 candidate position(s)");
    });
  });
});
