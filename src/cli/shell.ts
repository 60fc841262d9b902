/**
 * Interactive shell
 *
 * Reads one message per line (a trailing `\` continues the message on the
 * next line), runs it through the conversation graph and prints whatever the
 * steps emit. `exit`, `quit` or end of input leave the shell. Ctrl-C at the
 * tone prompt cancels the draft; anywhere else it leaves the shell.
 */

import { randomUUID } from "node:crypto";
import { createInterface } from "node:readline";
import { ToneRequestCancelledError } from "../utils/errors.js";
import { SERVICE_VERSION } from "../version.js";
import {
  createAssistantGraph,
  createConversationState,
  type AssistantMessage,
  type AssistantServices,
  type ConversationState,
  type OutputChannel,
  type ToneRequest,
  type ToneSource,
} from "../orchestrator/index.js";
import { formatExtractedInfo } from "../orchestrator/steps/session.js";
import { LineReader } from "./line-reader.js";

const EXIT_COMMANDS = new Set(["exit", "quit"]);

export interface ShellOptions {
  services: AssistantServices;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  sessionId?: string;
}

// ============================================================================
// Console ports
// ============================================================================

export function formatMessage(message: AssistantMessage): string {
  if (message.kind === "draft") {
    return `\n--- Draft ---\n${message.text}\n-------------`;
  }
  return message.text;
}

class StreamOutputChannel implements OutputChannel {
  constructor(private readonly output: NodeJS.WritableStream) {}

  emit(message: AssistantMessage): void {
    this.output.write(`${formatMessage(message)}\n`);
  }
}

class PromptToneSource implements ToneSource {
  /** Controller of the tone prompt currently waiting for input, if any */
  active: AbortController | null = null;

  constructor(
    private readonly reader: LineReader,
    private readonly output: NodeJS.WritableStream,
    private readonly defaultTone: string
  ) {}

  async requestTone(request: ToneRequest): Promise<string> {
    const info = formatExtractedInfo(request.keyInfo, request.summary);
    if (info) {
      this.output.write(`${info}\n`);
    }
    this.output.write(`Which tone should the reply use? [${this.defaultTone}] `);

    const controller = new AbortController();
    this.active = controller;
    try {
      const result = await this.reader.read(controller.signal);
      if (result.type !== "line") {
        this.output.write("\n");
        throw new ToneRequestCancelledError();
      }
      return result.value;
    } finally {
      this.active = null;
    }
  }
}

// ============================================================================
// Shell loop
// ============================================================================

export async function runShell(options: ShellOptions): Promise<ConversationState> {
  const { services, input, output } = options;
  // terminal mode (line editing, SIGINT events) follows output.isTTY
  const rl = createInterface({ input, output });
  // Created before any await so no line is emitted without a consumer
  const reader = new LineReader(rl[Symbol.asyncIterator]());
  const tone = new PromptToneSource(reader, output, services.settings.defaultTone);

  rl.on("SIGINT", () => {
    if (tone.active) {
      tone.active.abort();
    } else {
      rl.close();
    }
  });

  const graph = createAssistantGraph({
    ...services,
    output: new StreamOutputChannel(output),
    tone,
  });

  async function readMessage(): Promise<string | null> {
    const parts: string[] = [];
    let prompt = "> ";
    for (;;) {
      output.write(prompt);
      const result = await reader.read();
      if (result.type !== "line") {
        output.write("\n");
        return parts.length > 0 ? parts.join("\n") : null;
      }
      if (result.value.endsWith("\\")) {
        parts.push(result.value.slice(0, -1));
        prompt = "... ";
        continue;
      }
      parts.push(result.value);
      return parts.join("\n");
    }
  }

  output.write(
    `Email reply assistant ${SERVICE_VERSION}\n` +
      "Paste an email (end a line with \\ to continue it), give a PDF path or type `load <path>`.\n" +
      "Type 'exit' or 'quit' to leave.\n"
  );

  let state = createConversationState(options.sessionId ?? randomUUID(), services.settings.defaultTone);
  try {
    for (;;) {
      const message = await readMessage();
      if (message === null || EXIT_COMMANDS.has(message.trim().toLowerCase())) break;
      state = await graph.invoke(state, message);
    }
  } finally {
    rl.close();
  }

  output.write("Goodbye!\n");
  return state;
}
