import type { AssistantMessage, OutputChannel, ToneSource } from "./types.js";

/**
 * Collects a turn's messages so they can be returned in one response.
 */
export class BufferedOutputChannel implements OutputChannel {
  readonly messages: AssistantMessage[] = [];

  emit(message: AssistantMessage): void {
    this.messages.push(message);
  }
}

/**
 * Answers every tone request with a tone supplied up front (HTTP turns carry
 * it in the request body). Blank means "use the default".
 */
export class FixedToneSource implements ToneSource {
  constructor(private readonly tone: string | undefined) {}

  async requestTone(): Promise<string> {
    return this.tone ?? "";
  }
}
