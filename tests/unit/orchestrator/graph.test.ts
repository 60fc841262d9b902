import { describe, it, expect, afterEach } from "vitest";
import { createAssistantGraph, nextStep } from "../../../src/orchestrator/graph.js";
import { createConversationState } from "../../../src/orchestrator/state.js";
import type { ConversationState } from "../../../src/orchestrator/types.js";
import { InvariantViolationError, ToneRequestCancelledError } from "../../../src/utils/errors.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../../src/utils/telemetry.js";
import { createHarness, EXTRACTION_JSON, intentJson } from "../../helpers/assistant-fakes.js";

const PASTED_EMAIL = "Hi Bob,\nCan we meet Friday?\nAlice";

function stateWithDraft(): ConversationState {
  return {
    ...createConversationState("session-1"),
    originalEmail: PASTED_EMAIL,
    keyInfo: {
      senderName: "Alice Example",
      senderContact: "alice@example.com",
      receiverName: "Bob Example",
      receiverContact: "bob@example.com",
      subject: "Quarterly meeting",
    },
    summary: "Alice asks Bob to confirm the quarterly meeting on Friday.",
    draftHistory: [{ content: "Dear Alice, Friday works.", tone: "friendly" }],
    currentTone: "friendly",
  };
}

describe("nextStep", () => {
  it("diverts to HandleError whenever an error is pending", () => {
    const failing = { ...createConversationState("s"), errorMessage: "boom", intent: "show_info" as const };
    expect(nextStep("Router", failing)).toBe("HandleError");
    expect(nextStep("SaveDraft", failing)).toBe("HandleError");
    expect(nextStep("HandleError", failing)).toBe("END");
  });

  it("sends a null intent to HandleUnclear", () => {
    expect(nextStep("Router", createConversationState("s"))).toBe("HandleUnclear");
  });

  it("follows the drafting chain", () => {
    const state = createConversationState("s");
    expect(nextStep("ParseInput", state)).toBe("ExtractAndSummarize");
    expect(nextStep("ExtractAndSummarize", state)).toBe("AskForTone");
    expect(nextStep("AskForTone", state)).toBe("GenerateInitialDraft");
    expect(nextStep("GenerateInitialDraft", state)).toBe("END");
  });
});

describe("assistant graph", () => {
  afterEach(() => {
    setTestSink(null);
  });

  it("drafts from a pasted email, then refines it on the next turn", async () => {
    const h = createHarness({ tones: ["friendly"] });
    h.generator
      .on("classify_intent", intentJson("process_new_email"), intentJson("refine_draft"))
      .on("extract_and_summarize", EXTRACTION_JSON)
      .on("generate_draft", "Dear Alice, Friday works.")
      .on("refine_draft", "Friday works.");
    const graph = createAssistantGraph(h.deps);

    const first = await graph.run(createConversationState("session-1"), PASTED_EMAIL);

    expect(first.visited).toEqual(["Router", "ParseInput", "ExtractAndSummarize", "AskForTone", "GenerateInitialDraft"]);
    expect(first.state.originalEmail).toBe(PASTED_EMAIL);
    expect(first.state.emailPath).toBeNull();
    expect(first.state.keyInfo?.senderName).toBe("Alice Example");
    expect(first.state.currentTone).toBe("friendly");
    expect(first.state.draftHistory).toEqual([{ content: "Dear Alice, Friday works.", tone: "friendly" }]);
    expect(first.state.conversationSummary).toBe(
      "User said: 'Hi Bob, Can we meet Friday? Alice' -> AI classified intent as: 'process_new_email'"
    );
    expect(h.output.messages).toEqual([{ kind: "draft", text: "Dear Alice, Friday works." }]);

    const second = await graph.run(first.state, "Make it shorter");

    expect(second.visited).toEqual(["Router", "RefineDraft"]);
    expect(second.state.draftHistory).toEqual([
      { content: "Dear Alice, Friday works.", tone: "friendly" },
      { content: "Friday works.", tone: "friendly" },
    ]);
    expect(second.state.userFeedback).toBeNull();
    expect(second.state.errorMessage).toBeNull();
    expect(second.state.conversationSummary.split("\n")).toHaveLength(2);
    expect(h.generator.callsFor("refine_draft")[0]).toContain("Feedback: Make it shorter");
  });

  it("treats blank input as unclear without calling the model", async () => {
    const h = createHarness();
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), "   ");

    expect(visited).toEqual(["Router", "HandleUnclear"]);
    expect(state.intent).toBe("unclear");
    expect(state.conversationSummary).toBe("");
    expect(h.generator.calls).toHaveLength(0);
    expect(h.output.messages[0]?.kind).toBe("help");
    expect(h.output.messages[0]?.text.startsWith("I'm not sure what you mean.")).toBe(true);
  });

  it("routes a label outside the intent set to HandleUnclear", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("order_pizza"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), "get me a pizza");

    expect(visited).toEqual(["Router", "HandleUnclear"]);
    expect(state.intent).toBe("unclear");
    expect(state.conversationSummary).toBe("User said: 'get me a pizza' -> AI classified intent as: 'order_pizza'");
  });

  it("reports and clears a classification failure within the turn", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", new Error("upstream down"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), "hello there");

    expect(visited).toEqual(["Router", "HandleError"]);
    expect(state.intent).toBe("unclear");
    expect(state.errorMessage).toBeNull();
    expect(h.output.messages).toEqual([
      { kind: "error", text: "An error occurred: Failed to classify intent: upstream down" },
    ]);
  });

  it("ends the drafting chain at HandleError when extraction output is not JSON", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("process_new_email")).on("extract_and_summarize", "I cannot help");
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), PASTED_EMAIL);

    expect(visited).toEqual(["Router", "ParseInput", "ExtractAndSummarize", "HandleError"]);
    expect(state.errorMessage).toBeNull();
    expect(state.draftHistory).toEqual([]);
    expect(h.output.messages).toEqual([
      { kind: "error", text: "An error occurred: Failed to parse LLM response as JSON." },
    ]);
  });

  it("stops before drafting when the tone prompt is cancelled", async () => {
    const h = createHarness({ tones: [new ToneRequestCancelledError()] });
    h.generator.on("classify_intent", intentJson("process_new_email")).on("extract_and_summarize", EXTRACTION_JSON);
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), PASTED_EMAIL);

    expect(visited).toEqual(["Router", "ParseInput", "ExtractAndSummarize", "AskForTone", "HandleError"]);
    expect(state.currentTone).toBe("professional");
    expect(state.draftHistory).toEqual([]);
    expect(h.generator.callsFor("generate_draft")).toHaveLength(0);
    expect(h.output.messages).toEqual([{ kind: "error", text: "An error occurred: User cancelled the operation." }]);
  });

  it("loads a PDF named in the message", async () => {
    const h = createHarness({ files: { "inbox/offer.pdf": "Offer letter text" } });
    h.generator
      .on("classify_intent", intentJson("process_new_email"))
      .on("extract_and_summarize", EXTRACTION_JSON)
      .on("generate_draft", "Thanks for the offer.");
    const graph = createAssistantGraph(h.deps);

    const { state } = await graph.run(createConversationState("s"), "inbox/offer.pdf");

    expect(state.originalEmail).toBe("Offer letter text");
    expect(state.emailPath).toBe("inbox/offer.pdf");
    expect(h.generator.callsFor("extract_and_summarize")[0]).toContain('"""Offer letter text"""');
  });

  it("reports a missing PDF", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("process_new_email"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), "missing.pdf");

    expect(visited).toEqual(["Router", "ParseInput", "HandleError"]);
    expect(state.errorMessage).toBeNull();
    expect(h.output.messages).toEqual([{ kind: "error", text: "An error occurred: File not found: missing.pdf" }]);
  });

  it("saves the latest draft to the remote bucket when asked for cloud storage", async () => {
    const h = createHarness({ remoteBucket: "reply-drafts" });
    h.generator.on("classify_intent", intentJson("save_draft", "cloud"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(stateWithDraft(), "save it to the cloud");

    expect(visited).toEqual(["Router", "SaveDraft"]);
    expect(state.saveTarget).toBe("remote");
    expect(h.store.saved).toEqual([
      {
        content: "Dear Alice, Friday works.",
        locator: "draft_20240305_070809.txt",
        target: "remote",
        bucket: "reply-drafts",
      },
    ]);
    expect(h.output.messages).toEqual([
      { kind: "notice", text: "Draft saved successfully to remote storage as draft_20240305_070809.txt." },
    ]);
  });

  it("reports a save with no draft", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("save_draft"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run(createConversationState("s"), "save");

    expect(visited).toEqual(["Router", "SaveDraft", "HandleError"]);
    expect(state.errorMessage).toBeNull();
    expect(h.store.saved).toEqual([]);
    expect(h.output.messages).toEqual([{ kind: "error", text: "An error occurred: No draft to save." }]);
  });

  it("resets everything but the session id", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("reset_session"));
    const graph = createAssistantGraph(h.deps);

    const state = await graph.invoke(stateWithDraft(), "start over");

    expect(state).toEqual(createConversationState("session-1"));
    expect(h.output.messages).toEqual([{ kind: "notice", text: "Starting a new session." }]);
  });

  it("shows extracted info without changing it", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("show_info"), intentJson("show_info"));
    const graph = createAssistantGraph(h.deps);
    const before = stateWithDraft();

    const once = await graph.invoke(before, "what did you find?");
    const twice = await graph.invoke(once, "what did you find?");

    expect(twice.keyInfo).toEqual(before.keyInfo);
    expect(twice.summary).toBe(before.summary);
    expect(twice.draftHistory).toEqual(before.draftHistory);
    expect(h.output.messages).toHaveLength(2);
    expect(h.output.messages[0]).toEqual(h.output.messages[1]);
    expect(h.output.messages[0]?.text).toBe(
      "Sender: Alice Example (alice@example.com)\n" +
        "Receiver: Bob Example (bob@example.com)\n" +
        "Subject: Quarterly meeting\n" +
        "Summary: Alice asks Bob to confirm the quarterly meeting on Friday."
    );
  });

  it("greets on idle chat and clears a stale error from a previous client", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("handle_idle_chat"));
    const graph = createAssistantGraph(h.deps);

    const { state, visited } = await graph.run({ ...stateWithDraft(), errorMessage: "stale" }, "hi!");

    expect(visited).toEqual(["Router", "HandleIdleChat"]);
    expect(state.errorMessage).toBeNull();
    expect(h.output.messages).toEqual([{ kind: "info", text: "Hello! How can I help you with your email?" }]);
  });

  it("fails a reset of a state without a session id instead of reporting it", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("reset_session"));
    const graph = createAssistantGraph(h.deps);

    await expect(graph.run(createConversationState(""), "start over")).rejects.toBeInstanceOf(InvariantViolationError);
    expect(h.output.messages).toEqual([]);
  });

  it("runs other turns for a state without a session id", async () => {
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("handle_idle_chat"));

    const { visited } = await createAssistantGraph(h.deps).run(createConversationState(""), "hello");

    expect(visited).toEqual(["Router", "HandleIdleChat"]);
  });

  it("emits turn telemetry with the terminal step", async () => {
    const events: Array<{ name: string; data: TelemetryShape }> = [];
    setTestSink((name, data) => events.push({ name, data }));
    const h = createHarness();
    h.generator.on("classify_intent", intentJson("handle_idle_chat"));

    await createAssistantGraph(h.deps).run(createConversationState("s"), "hello");

    const completed = events.find((event) => event.name === TelemetryEvents.TurnCompleted);
    expect(completed?.data.terminal_step).toBe("HandleIdleChat");
    expect(completed?.data.intent).toBe("handle_idle_chat");
    expect(completed?.data.steps).toBe(2);
  });
});
