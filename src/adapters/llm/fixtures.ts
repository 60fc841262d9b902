import type { GenerateOpts, TextGenerator } from "./types.js";

/**
 * Canned, deterministic responses for running the assistant without API keys.
 * Classification is a keyword match on the user's message, which is enough to
 * walk every branch of the graph by hand.
 */
export class FixturesTextGenerator implements TextGenerator {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async generate(prompt: string, opts: GenerateOpts = {}): Promise<string> {
    switch (opts.operation) {
      case "classify_intent":
        return JSON.stringify(classifyByKeyword(extractUserMessage(prompt)));
      case "extract_and_summarize":
        return JSON.stringify({
          senderName: "Sample Sender",
          senderContact: "sender@example.com",
          receiverName: "Sample Receiver",
          receiverContact: "receiver@example.com",
          subject: "Sample subject",
          summary: "The sender asks for a reply about the sample subject.",
        });
      case "refine_draft":
        return "Hello,\n\nThank you for your message. This is the revised fixture reply.\n\nBest regards";
      default:
        return "Hello,\n\nThank you for your message. This is a fixture reply.\n\nBest regards";
    }
  }
}

const USER_MESSAGE_PATTERN = /User message:\s*"""([\s\S]*?)"""/;

function extractUserMessage(prompt: string): string {
  return USER_MESSAGE_PATTERN.exec(prompt)?.[1]?.trim() ?? "";
}

function classifyByKeyword(message: string): { intent: string; save_target?: string } {
  const text = message.toLowerCase();
  if (/^(hi|hello|hey)\b/.test(text)) return { intent: "handle_idle_chat" };
  if (/\b(reset|start over|new session)\b/.test(text)) return { intent: "reset_session" };
  if (/\bsave\b/.test(text)) {
    return /\b(s3|cloud|remote)\b/.test(text) ? { intent: "save_draft", save_target: "remote" } : { intent: "save_draft", save_target: "local" };
  }
  if (/\b(show|info|details)\b/.test(text)) return { intent: "show_info" };
  if (/\b(make it|shorter|longer|more|less|change|rewrite)\b/.test(text)) return { intent: "refine_draft" };
  if (text.length > 0) return { intent: "process_new_email" };
  return { intent: "unclear" };
}
