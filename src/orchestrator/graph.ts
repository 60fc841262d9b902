/**
 * Conversation Graph Controller
 *
 * One traversal per turn: Router → (intent branch) → END.
 *
 * | Intent            | First step      | Chain                                                      |
 * |-------------------|-----------------|------------------------------------------------------------|
 * | process_new_email | ParseInput      | ParseInput → ExtractAndSummarize → AskForTone → GenerateInitialDraft |
 * | refine_draft      | RefineDraft     | RefineDraft                                                |
 * | show_info         | ShowInfo        | ShowInfo                                                   |
 * | save_draft        | SaveDraft       | SaveDraft                                                  |
 * | reset_session     | ResetSession    | ResetSession                                               |
 * | handle_idle_chat  | HandleIdleChat  | HandleIdleChat                                             |
 * | unclear / null    | HandleUnclear   | HandleUnclear                                              |
 *
 * After every step except HandleError, a set errorMessage diverts the turn
 * to HandleError, which clears it. The controller holds no state between
 * invocations.
 */

import { describeError, InvariantViolationError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { STEPS } from "./steps/index.js";
import {
  END,
  type AssistantDeps,
  type ConversationState,
  type Intent,
  type NextStep,
  type StepName,
  type TurnResult,
} from "./types.js";

// ============================================================================
// Transition Table
// ============================================================================

export const INTENT_ROUTES: Readonly<Record<Intent, StepName>> = {
  process_new_email: "ParseInput",
  refine_draft: "RefineDraft",
  show_info: "ShowInfo",
  save_draft: "SaveDraft",
  reset_session: "ResetSession",
  handle_idle_chat: "HandleIdleChat",
  unclear: "HandleUnclear",
};

const STATIC_EDGES: Readonly<Record<Exclude<StepName, "Router">, NextStep>> = {
  ParseInput: "ExtractAndSummarize",
  ExtractAndSummarize: "AskForTone",
  AskForTone: "GenerateInitialDraft",
  GenerateInitialDraft: END,
  RefineDraft: END,
  ShowInfo: END,
  SaveDraft: END,
  ResetSession: END,
  HandleUnclear: END,
  HandleIdleChat: END,
  HandleError: END,
};

/** Longest possible path is Router + four-step chain + HandleError. */
const MAX_STEPS_PER_TURN = 6;

export function nextStep(current: StepName, state: ConversationState): NextStep {
  if (current !== "HandleError" && state.errorMessage !== null) {
    return "HandleError";
  }
  if (current === "Router") {
    return state.intent === null ? "HandleUnclear" : INTENT_ROUTES[state.intent];
  }
  return STATIC_EDGES[current];
}

// ============================================================================
// Controller
// ============================================================================

export interface AssistantGraph {
  /** Run one turn and report the steps it visited. */
  run(state: ConversationState, userInput: string): Promise<TurnResult>;
  /** Run one turn and return only the next state. */
  invoke(state: ConversationState, userInput: string): Promise<ConversationState>;
}

export function createAssistantGraph(deps: AssistantDeps): AssistantGraph {
  async function run(state: ConversationState, userInput: string): Promise<TurnResult> {
    const startTime = Date.now();
    emit(TelemetryEvents.TurnStarted, { request_id: deps.requestId, input_chars: userInput.length });

    let current: ConversationState = { ...state, userInput, errorMessage: null };
    const visited: StepName[] = [];
    let step: NextStep = "Router";

    while (step !== END) {
      if (visited.length >= MAX_STEPS_PER_TURN) {
        throw new InvariantViolationError(`Turn exceeded ${MAX_STEPS_PER_TURN} steps: ${visited.join(" → ")}`);
      }
      visited.push(step);
      current = await runStep(step, current);
      step = nextStep(step, current);
    }

    const terminal = visited[visited.length - 1];
    emit(TelemetryEvents.TurnCompleted, {
      request_id: deps.requestId,
      intent: current.intent ?? "none",
      terminal_step: terminal,
      steps: visited.length,
      latency_ms: Date.now() - startTime,
    });

    return { state: current, visited };
  }

  /**
   * Unexpected step failures become turn errors; invariant violations do not.
   */
  async function runStep(name: StepName, state: ConversationState): Promise<ConversationState> {
    let next: ConversationState;
    try {
      next = await STEPS[name](state, deps);
    } catch (error) {
      if (error instanceof InvariantViolationError) throw error;
      log.error({ error, step: name, request_id: deps.requestId }, "Step threw unexpectedly");
      next = { ...state, errorMessage: `An unexpected error occurred: ${describeError(error)}` };
    }

    if (name !== "HandleError" && next.errorMessage !== null) {
      emit(TelemetryEvents.StepFailed, { step: name, request_id: deps.requestId });
    }
    return next;
  }

  return {
    run,
    async invoke(state, userInput) {
      return (await run(state, userInput)).state;
    },
  };
}
