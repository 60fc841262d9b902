import type { Config } from "../config/index.js";
import { createTextGenerator } from "../adapters/llm/router.js";
import { FileContentExtractor } from "../adapters/extraction/file-extractor.js";
import { createDraftStorage } from "../adapters/storage/index.js";
import type { AssistantDeps } from "./types.js";

export { createAssistantGraph, type AssistantGraph } from "./graph.js";
export { createConversationState, resetConversationState } from "./state.js";
export { SessionStore } from "./session-store.js";
export * from "./types.js";

/**
 * The ports that live as long as the process. Output channel, tone source
 * and request id are supplied per turn by the HTTP route or the shell.
 */
export type AssistantServices = Omit<AssistantDeps, "output" | "tone" | "requestId">;

export function createAssistantServices(config: Config): AssistantServices {
  return {
    generator: createTextGenerator(config),
    extractor: new FileContentExtractor(),
    store: createDraftStorage(config),
    clock: { now: () => new Date() },
    settings: {
      defaultTone: config.assistant.defaultTone,
      remoteBucket: config.storage.remoteBucket,
      summaryMaxEntries: config.assistant.summaryMaxEntries,
      summaryEntryMaxChars: config.assistant.summaryEntryMaxChars,
    },
  };
}
