/**
 * Provider selection for text generation.
 *
 * LLM_PROVIDER picks the adapter; LLM_MODEL overrides the adapter's default
 * model. The fixtures provider needs no credentials.
 */

import { log } from "../../utils/telemetry.js";
import type { Config } from "../../config/index.js";
import type { TextGenerator } from "./types.js";
import { AnthropicTextGenerator } from "./anthropic.js";
import { OpenAITextGenerator } from "./openai.js";
import { FixturesTextGenerator } from "./fixtures.js";

function buildGenerator(llm: Config["llm"]): TextGenerator {
  const { model, maxTokens, timeoutMs } = llm;
  switch (llm.provider) {
    case "anthropic":
      return new AnthropicTextGenerator({ apiKey: llm.anthropicApiKey, model, maxTokens, timeoutMs });
    case "openai":
      return new OpenAITextGenerator({ apiKey: llm.openaiApiKey, model, maxTokens, timeoutMs });
    case "fixtures":
      return new FixturesTextGenerator();
  }
}

export function createTextGenerator(config: Config): TextGenerator {
  const generator = buildGenerator(config.llm);
  log.info({ provider: generator.name, model: generator.model }, "Text generator selected");
  return generator;
}
