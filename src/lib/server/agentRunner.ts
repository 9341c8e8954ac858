import {
  BackendError,
  toErrorMessage,
  type ContentBlock,
  type ConversationTurn,
  type ModelBackend,
  type ModelResponse,
  type ToolInvocationRequest,
} from "@/lib/server/model";
import {
  CONTINUE_NUDGE,
  SEED_INSTRUCTION,
  SUBMISSION_NUDGE,
  buildBudgetWarning,
} from "@/lib/server/prompts";
import type { ToolDispatcher } from "@/lib/server/toolDispatcher";
import type { ToolDeclaration } from "@/lib/server/tools";
import { extractVerdictFromText, type SubmittedVerdict } from "@/lib/server/verdict";

export const DEFAULT_MAX_TOOL_CALLS = 25;
export const DEFAULT_MAX_OUTPUT_TOKENS = 4096;
export const DEFAULT_BUDGET_WARNING_THRESHOLDS: readonly number[] = [5, 2];
export const OUTPUT_PREVIEW_CHARS = 500;
export const SUBMISSION_ACKNOWLEDGEMENT = "Verdict recorded.";
export const SKIPPED_CALL_MESSAGE =
  "Error: Tool call budget exhausted; this call was not executed.";

export type AgentState = "AWAITING_MODEL" | "DISPATCHING_TOOLS" | "DONE";

export type RunTermination =
  | "verdict_submitted"
  | "verdict_salvaged"
  | "budget_exhausted"
  | "backend_error"
  | "unexpected_stop"
  | "nudge_limit";

export type VerdictSource = "submitted" | "salvaged";

export interface InvocationLogEntry {
  callNumber: number;
  requestId: string;
  tool: string;
  input: Record<string, unknown>;
  outputPreview: string;
  isError: boolean;
  isFinalAnswer: boolean;
}

export interface TokenUsage {
  input: number;
  output: number;
}

export interface RunRecord {
  readonly taskId: string;
  readonly provider: string;
  readonly model: string;
  readonly verdict: SubmittedVerdict | null;
  readonly verdictSource: VerdictSource | null;
  readonly termination: RunTermination;
  readonly transcript: readonly ConversationTurn[];
  readonly invocations: readonly InvocationLogEntry[];
  /** Every dispatched action, the submission included. */
  readonly toolCallCount: number;
  readonly modelTurns: number;
  readonly tokens: TokenUsage;
  readonly turnTokens: readonly TokenUsage[];
  readonly budgetExhausted: boolean;
  readonly malformedOutputCount: number;
  readonly lastStopReason: string | null;
  readonly error: string | null;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly wallTimeSeconds: number;
}

export type AgentRunProgressEvent =
  | {
      type: "started";
      data: { taskId: string; provider: string; model: string; maxToolCalls: number };
    }
  | {
      type: "model_response";
      data: {
        turn: number;
        stopCondition: string;
        rawStopReason: string;
        toolRequests: number;
        inputTokens: number;
        outputTokens: number;
      };
    }
  | {
      type: "tool_call";
      data: { callNumber: number; tool: string; input: Record<string, unknown> };
    }
  | {
      type: "tool_result";
      data: { callNumber: number; tool: string; isError: boolean; outputPreview: string };
    }
  | {
      type: "budget_warning";
      data: { remaining: number; message: string };
    }
  | {
      type: "nudge";
      data: { reason: "malformed_output" | "length_limit"; count: number };
    }
  | {
      type: "verdict";
      data: { source: VerdictSource; verdict: SubmittedVerdict };
    }
  | {
      type: "backend_error";
      data: { provider: string; message: string; status?: number };
    }
  | {
      type: "finished";
      data: {
        termination: RunTermination;
        toolCallCount: number;
        budgetExhausted: boolean;
        malformedOutputCount: number;
        wallTimeSeconds: number;
      };
    };

export interface AgentRunHooks {
  onEvent?: (event: AgentRunProgressEvent) => void;
}

export interface AgentRunOptions {
  taskId: string;
  backend: ModelBackend;
  dispatcher: ToolDispatcher;
  systemPrompt: string;
  maxToolCalls?: number;
  maxOutputTokens?: number;
  budgetWarningThresholds?: readonly number[];
  /** Corrective nudges allowed before the run gives up; defaults to the tool-call budget. */
  maxNudges?: number;
  /** Overrides the dispatcher's declarations, e.g. a format-filtered subset. */
  toolDeclarations?: readonly ToolDeclaration[];
}

interface RunContext {
  readonly backend: ModelBackend;
  readonly dispatcher: ToolDispatcher;
  readonly hooks?: AgentRunHooks;
  readonly systemPrompt: string;
  readonly tools: readonly ToolDeclaration[];
  readonly maxToolCalls: number;
  readonly maxOutputTokens: number;
  readonly maxNudges: number;
  readonly thresholds: ReadonlySet<number>;
  readonly firedThresholds: Set<number>;
  readonly transcript: ConversationTurn[];
  readonly invocations: InvocationLogEntry[];
  readonly turnTokens: TokenUsage[];
  pendingRequests: ToolInvocationRequest[];
  toolCallCount: number;
  malformedOutputCount: number;
  nudgeCount: number;
  verdict: SubmittedVerdict | null;
  verdictSource: VerdictSource | null;
  termination: RunTermination;
  budgetExhausted: boolean;
  lastStopReason: string | null;
  error: string | null;
}

function emit(hooks: AgentRunHooks | undefined, event: AgentRunProgressEvent) {
  hooks?.onEvent?.(event);
}

function toPositiveInteger(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.max(1, Math.floor(value));
}

function preview(output: string): string {
  return output.length > OUTPUT_PREVIEW_CHARS ? output.slice(0, OUTPUT_PREVIEW_CHARS) : output;
}

function finish(ctx: RunContext, termination: RunTermination): AgentState {
  ctx.termination = termination;
  return "DONE";
}

function acceptVerdict(ctx: RunContext, verdict: SubmittedVerdict, source: VerdictSource) {
  ctx.verdict = verdict;
  ctx.verdictSource = source;
  emit(ctx.hooks, { type: "verdict", data: { source, verdict } });
}

function appendAssistantText(ctx: RunContext, text: string) {
  if (text.trim().length > 0) {
    ctx.transcript.push({ role: "assistant", content: text });
  }
}

function nudge(
  ctx: RunContext,
  reason: "malformed_output" | "length_limit",
  message: string
): AgentState {
  ctx.nudgeCount += 1;
  if (ctx.nudgeCount > ctx.maxNudges) {
    return finish(ctx, "nudge_limit");
  }
  ctx.transcript.push({ role: "user", content: message });
  emit(ctx.hooks, { type: "nudge", data: { reason, count: ctx.nudgeCount } });
  return "AWAITING_MODEL";
}

function handleFreeText(ctx: RunContext, text: string): AgentState {
  appendAssistantText(ctx, text);
  const salvaged = extractVerdictFromText(text);
  if (salvaged) {
    acceptVerdict(ctx, salvaged, "salvaged");
    return finish(ctx, "verdict_salvaged");
  }
  ctx.malformedOutputCount += 1;
  return nudge(ctx, "malformed_output", SUBMISSION_NUDGE);
}

async function awaitModel(ctx: RunContext): Promise<AgentState> {
  let response: ModelResponse;
  try {
    response = await ctx.backend.send({
      system: ctx.systemPrompt,
      conversation: [...ctx.transcript],
      tools: ctx.tools,
      maxOutputTokens: ctx.maxOutputTokens,
    });
  } catch (err) {
    const message = toErrorMessage(err, "Model backend request failed");
    ctx.error = message;
    emit(ctx.hooks, {
      type: "backend_error",
      data:
        err instanceof BackendError
          ? { provider: err.provider, message, status: err.status }
          : { provider: ctx.backend.provider, message },
    });
    return finish(ctx, "backend_error");
  }

  ctx.turnTokens.push({ input: response.inputTokens, output: response.outputTokens });
  ctx.lastStopReason = response.rawStopReason;
  emit(ctx.hooks, {
    type: "model_response",
    data: {
      turn: ctx.turnTokens.length,
      stopCondition: response.stopCondition,
      rawStopReason: response.rawStopReason,
      toolRequests: response.toolRequests.length,
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
    },
  });

  switch (response.stopCondition) {
    case "tool_request": {
      if (response.toolRequests.length === 0) {
        return handleFreeText(ctx, response.text);
      }
      const content: ContentBlock[] = [];
      if (response.text.trim().length > 0) {
        content.push({ type: "text", text: response.text });
      }
      for (const request of response.toolRequests) {
        content.push({ type: "tool_use", id: request.id, name: request.name, input: request.input });
      }
      ctx.transcript.push({ role: "assistant", content });
      ctx.pendingRequests = response.toolRequests;
      return "DISPATCHING_TOOLS";
    }
    case "normal_stop":
      return handleFreeText(ctx, response.text);
    case "length_limit":
      appendAssistantText(ctx, response.text);
      return nudge(ctx, "length_limit", CONTINUE_NUDGE);
    default:
      appendAssistantText(ctx, response.text);
      return finish(ctx, "unexpected_stop");
  }
}

async function dispatchTools(ctx: RunContext): Promise<AgentState> {
  const requests = ctx.pendingRequests;
  ctx.pendingRequests = [];
  const results: ContentBlock[] = [];
  const warnings: number[] = [];

  for (const request of requests) {
    const isSubmission = ctx.dispatcher.isSubmission(request.name);
    if (!isSubmission && ctx.toolCallCount >= ctx.maxToolCalls) {
      // Every tool_use still needs a matching result for the transcript to stay valid.
      results.push({
        type: "tool_result",
        toolUseId: request.id,
        content: SKIPPED_CALL_MESSAGE,
        isError: true,
      });
      continue;
    }

    ctx.toolCallCount += 1;
    const callNumber = ctx.toolCallCount;
    emit(ctx.hooks, {
      type: "tool_call",
      data: { callNumber, tool: request.name, input: request.input },
    });

    const outcome = await ctx.dispatcher.dispatch(request.name, request.input);
    if (outcome.kind === "verdict") {
      ctx.invocations.push({
        callNumber,
        requestId: request.id,
        tool: request.name,
        input: request.input,
        outputPreview: "",
        isError: false,
        isFinalAnswer: true,
      });
      results.push({
        type: "tool_result",
        toolUseId: request.id,
        content: SUBMISSION_ACKNOWLEDGEMENT,
        isError: false,
      });
      ctx.transcript.push({ role: "user", content: results });
      acceptVerdict(ctx, outcome.verdict, "submitted");
      return finish(ctx, "verdict_submitted");
    }

    const outputPreview = preview(outcome.output);
    ctx.invocations.push({
      callNumber,
      requestId: request.id,
      tool: request.name,
      input: request.input,
      outputPreview,
      isError: outcome.isError,
      isFinalAnswer: false,
    });
    emit(ctx.hooks, {
      type: "tool_result",
      data: { callNumber, tool: request.name, isError: outcome.isError, outputPreview },
    });
    results.push({
      type: "tool_result",
      toolUseId: request.id,
      content: outcome.output,
      isError: outcome.isError,
    });

    const remaining = ctx.maxToolCalls - ctx.toolCallCount;
    if (remaining > 0 && ctx.thresholds.has(remaining) && !ctx.firedThresholds.has(remaining)) {
      ctx.firedThresholds.add(remaining);
      warnings.push(remaining);
    }
  }

  ctx.transcript.push({ role: "user", content: results });

  if (ctx.toolCallCount >= ctx.maxToolCalls) {
    ctx.budgetExhausted = true;
    return finish(ctx, "budget_exhausted");
  }

  for (const remaining of warnings) {
    const message = buildBudgetWarning(remaining);
    ctx.transcript.push({ role: "user", content: message });
    emit(ctx.hooks, { type: "budget_warning", data: { remaining, message } });
  }
  return "AWAITING_MODEL";
}

/**
 * Drives one bounded investigation: model turns alternate with in-order tool
 * dispatch until a verdict is submitted or salvaged, the budget runs out, the
 * backend fails, or the model stops in a way the loop cannot recover from.
 */
export async function runAnalysisAgent(
  options: AgentRunOptions,
  hooks?: AgentRunHooks
): Promise<RunRecord> {
  const startedAtMs = Date.now();
  const maxToolCalls = toPositiveInteger(options.maxToolCalls, DEFAULT_MAX_TOOL_CALLS);

  const ctx: RunContext = {
    backend: options.backend,
    dispatcher: options.dispatcher,
    hooks,
    systemPrompt: options.systemPrompt,
    tools: options.toolDeclarations ?? options.dispatcher.declarations,
    maxToolCalls,
    maxOutputTokens: toPositiveInteger(options.maxOutputTokens, DEFAULT_MAX_OUTPUT_TOKENS),
    maxNudges: toPositiveInteger(options.maxNudges, maxToolCalls),
    thresholds: new Set(options.budgetWarningThresholds ?? DEFAULT_BUDGET_WARNING_THRESHOLDS),
    firedThresholds: new Set(),
    transcript: [{ role: "user", content: SEED_INSTRUCTION }],
    invocations: [],
    turnTokens: [],
    pendingRequests: [],
    toolCallCount: 0,
    malformedOutputCount: 0,
    nudgeCount: 0,
    verdict: null,
    verdictSource: null,
    termination: "unexpected_stop",
    budgetExhausted: false,
    lastStopReason: null,
    error: null,
  };

  emit(hooks, {
    type: "started",
    data: {
      taskId: options.taskId,
      provider: options.backend.provider,
      model: options.backend.model,
      maxToolCalls,
    },
  });

  let state: AgentState = "AWAITING_MODEL";
  while (state !== "DONE") {
    state = state === "AWAITING_MODEL" ? await awaitModel(ctx) : await dispatchTools(ctx);
  }

  const finishedAtMs = Date.now();
  const wallTimeSeconds = (finishedAtMs - startedAtMs) / 1000;
  const tokens = ctx.turnTokens.reduce<TokenUsage>(
    (total, turn) => ({ input: total.input + turn.input, output: total.output + turn.output }),
    { input: 0, output: 0 }
  );

  emit(hooks, {
    type: "finished",
    data: {
      termination: ctx.termination,
      toolCallCount: ctx.toolCallCount,
      budgetExhausted: ctx.budgetExhausted,
      malformedOutputCount: ctx.malformedOutputCount,
      wallTimeSeconds,
    },
  });

  return Object.freeze({
    taskId: options.taskId,
    provider: options.backend.provider,
    model: options.backend.model,
    verdict: ctx.verdict,
    verdictSource: ctx.verdictSource,
    termination: ctx.termination,
    transcript: Object.freeze([...ctx.transcript]),
    invocations: Object.freeze([...ctx.invocations]),
    toolCallCount: ctx.toolCallCount,
    modelTurns: ctx.turnTokens.length,
    tokens: Object.freeze(tokens),
    turnTokens: Object.freeze([...ctx.turnTokens]),
    budgetExhausted: ctx.budgetExhausted,
    malformedOutputCount: ctx.malformedOutputCount,
    lastStopReason: ctx.lastStopReason,
    error: ctx.error,
    startedAt: new Date(startedAtMs).toISOString(),
    finishedAt: new Date(finishedAtMs).toISOString(),
    wallTimeSeconds,
  });
}
