import type { InvocationLogEntry, RunRecord, RunTermination } from "@/lib/server/agentRunner";
import type { ScoreRecord, ScoreTier } from "@/lib/server/scorer";
import { isPlainObject } from "@/lib/server/verdict";

export interface InvocationSummary {
  callsByTool: Record<string, number>;
  /** Calls repeating an earlier call's tool and arguments exactly. */
  redundantCalls: number;
  invalidCalls: number;
}

export interface TaskMetrics {
  taskId: string;
  score: number;
  tier: ScoreTier;
  fieldScores: Record<string, number>;
  toolCallsTotal: number;
  toolCallsByType: Record<string, number>;
  redundantToolCalls: number;
  invalidToolCalls: number;
  malformedOutputCount: number;
  budgetExhausted: boolean;
  hasValidAnswer: boolean;
  termination: RunTermination | "task_failed";
  hallucinatedTechniques: string[];
  hallucinationCount: number;
  missingTechniques: string[];
  wallTimeSeconds: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  error: string | null;
}

export interface AggregateMetrics {
  tasksRun: number;
  tasksWithAnswer: number;
  successRate: number;
  /** Mean score over standard-tier tasks. */
  mainScore: number;
  bonusScore: number;
  totalScore: number;
  avgToolCallsPerTask: number;
  avgToolCallsPerSuccess: number;
  toolUsageDistribution: Record<string, number>;
  avgHallucinationRate: number;
  episodeLengthMin: number;
  episodeLengthMax: number;
  episodeLengthMean: number;
  episodeLengthMedian: number;
  totalWallTime: number;
  totalTokens: number;
  budgetExhaustedCount: number;
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])])
    );
  }
  return value;
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

export function summarizeInvocations(log: readonly InvocationLogEntry[]): InvocationSummary {
  const callsByTool: Record<string, number> = {};
  const seen = new Set<string>();
  let redundantCalls = 0;
  let invalidCalls = 0;

  for (const entry of log) {
    callsByTool[entry.tool] = (callsByTool[entry.tool] ?? 0) + 1;
    const key = `${entry.tool}:${stableStringify(entry.input)}`;
    if (seen.has(key)) {
      redundantCalls += 1;
    }
    seen.add(key);
    if (entry.isError) {
      invalidCalls += 1;
    }
  }

  return { callsByTool, redundantCalls, invalidCalls };
}

export function collectTaskMetrics(
  taskId: string,
  record: RunRecord,
  score: ScoreRecord
): TaskMetrics {
  const summary = summarizeInvocations(record.invocations);
  return {
    taskId,
    score: score.finalScore,
    tier: score.tier,
    fieldScores: { ...score.fieldScores },
    toolCallsTotal: record.toolCallCount,
    toolCallsByType: summary.callsByTool,
    redundantToolCalls: summary.redundantCalls,
    invalidToolCalls: summary.invalidCalls,
    malformedOutputCount: record.malformedOutputCount,
    budgetExhausted: record.budgetExhausted,
    hasValidAnswer: record.verdict !== null,
    termination: record.termination,
    hallucinatedTechniques: [...score.hallucinatedTechniques],
    hallucinationCount: score.hallucinatedTechniques.length,
    missingTechniques: [...score.missingTechniques],
    wallTimeSeconds: record.wallTimeSeconds,
    inputTokens: record.tokens.input,
    outputTokens: record.tokens.output,
    totalTokens: record.tokens.input + record.tokens.output,
    error: record.error,
  };
}

/** Entry for a task that never produced a run record. */
export function failedTaskMetrics(taskId: string, error: string): TaskMetrics {
  return {
    taskId,
    score: 0,
    tier: "standard",
    fieldScores: {},
    toolCallsTotal: 0,
    toolCallsByType: {},
    redundantToolCalls: 0,
    invalidToolCalls: 0,
    malformedOutputCount: 0,
    budgetExhausted: false,
    hasValidAnswer: false,
    termination: "task_failed",
    hallucinatedTechniques: [],
    hallucinationCount: 0,
    missingTechniques: [],
    wallTimeSeconds: 0,
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    error,
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;
}

function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

export function computeAggregate(taskMetrics: readonly TaskMetrics[]): AggregateMetrics {
  const standard = taskMetrics.filter((metrics) => metrics.tier === "standard");
  const bonus = taskMetrics.filter((metrics) => metrics.tier === "bonus");
  const answered = taskMetrics.filter((metrics) => metrics.hasValidAnswer);
  const times = taskMetrics.map((metrics) => metrics.wallTimeSeconds);

  const toolUsageDistribution: Record<string, number> = {};
  for (const metrics of taskMetrics) {
    for (const [tool, count] of Object.entries(metrics.toolCallsByType)) {
      toolUsageDistribution[tool] = (toolUsageDistribution[tool] ?? 0) + count;
    }
  }

  const mainScore = mean(standard.map((metrics) => metrics.score));
  const bonusScore = mean(bonus.map((metrics) => metrics.score));

  return {
    tasksRun: taskMetrics.length,
    tasksWithAnswer: answered.length,
    successRate: round(taskMetrics.length > 0 ? answered.length / taskMetrics.length : 0, 4),
    mainScore: round(mainScore, 4),
    bonusScore: round(bonusScore, 4),
    totalScore: round(mainScore + bonusScore, 4),
    avgToolCallsPerTask: round(mean(taskMetrics.map((metrics) => metrics.toolCallsTotal)), 2),
    avgToolCallsPerSuccess: round(mean(answered.map((metrics) => metrics.toolCallsTotal)), 2),
    toolUsageDistribution,
    avgHallucinationRate: round(mean(taskMetrics.map((metrics) => metrics.hallucinationCount)), 4),
    episodeLengthMin: round(times.length > 0 ? Math.min(...times) : 0, 2),
    episodeLengthMax: round(times.length > 0 ? Math.max(...times) : 0, 2),
    episodeLengthMean: round(mean(times), 2),
    episodeLengthMedian: round(median(times), 2),
    totalWallTime: round(times.reduce((sum, value) => sum + value, 0), 2),
    totalTokens: taskMetrics.reduce((sum, metrics) => sum + metrics.totalTokens, 0),
    budgetExhaustedCount: taskMetrics.filter((metrics) => metrics.budgetExhausted).length,
  };
}
