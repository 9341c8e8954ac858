import {
  runAnalysisAgent,
  type AgentRunProgressEvent,
  type RunRecord,
} from "@/lib/server/agentRunner";
import {
  createContainerCommandRunner,
  createLocalCommandRunner,
  type CommandRunner,
} from "@/lib/server/commandRunner";
import { resolveProviderCredential, type BenchmarkConfig } from "@/lib/server/config";
import {
  collectTaskMetrics,
  computeAggregate,
  failedTaskMetrics,
  type AggregateMetrics,
  type TaskMetrics,
} from "@/lib/server/metrics";
import { toErrorMessage, type ModelBackend } from "@/lib/server/model";
import { validateSandboxPath } from "@/lib/server/pathPolicy";
import { buildSystemPrompt } from "@/lib/server/prompts";
import { createModelBackend } from "@/lib/server/providers";
import {
  createRunEventWriter,
  saveBenchmarkReport,
  saveRunRecord,
} from "@/lib/server/runStore";
import { emptyScore, type ScoreRecord, type Scorer } from "@/lib/server/scorer";
import { ADVANCED_DIFFICULTY, type BenchmarkTask } from "@/lib/server/tasks";
import { createToolDispatcher } from "@/lib/server/toolDispatcher";
import { getToolDeclarationsForFormat } from "@/lib/server/tools";
import { resolveWorkspaceRoot } from "@/lib/server/workspace";

export type BenchmarkProgressEvent =
  | { type: "benchmark_started"; data: { tasks: number; provider: string; model: string } }
  | { type: "task_started"; data: { taskId: string } }
  | { type: "task_event"; data: { taskId: string; event: AgentRunProgressEvent } }
  | { type: "task_finished"; data: { taskId: string; metrics: TaskMetrics } }
  | { type: "task_failed"; data: { taskId: string; error: string } }
  | { type: "score_error"; data: { taskId: string; error: string } }
  | { type: "store_error"; data: { taskId: string | null; error: string } };

export interface BenchmarkHooks {
  onEvent?: (event: BenchmarkProgressEvent) => void;
}

export interface BenchmarkDependencies {
  config: BenchmarkConfig;
  /** Defaults to the configured provider's adapter. */
  backend?: ModelBackend;
  /** Defaults to a container or local runner, per `config.useContainer`. */
  createRunner?: (workspaceRoot: string, config: BenchmarkConfig) => CommandRunner;
  scorer?: Scorer;
  /** Write run records, event logs and the report under `config.resultsDir`. */
  persist?: boolean;
}

export interface BenchmarkTaskResult {
  taskId: string;
  record: RunRecord | null;
  score: ScoreRecord;
  metrics: TaskMetrics;
}

export interface BenchmarkResult {
  tasks: BenchmarkTaskResult[];
  aggregate: AggregateMetrics;
  reportPath: string | null;
}

function emit(hooks: BenchmarkHooks | undefined, event: BenchmarkProgressEvent) {
  hooks?.onEvent?.(event);
}

export function createCommandRunnerForConfig(
  workspaceRoot: string,
  config: BenchmarkConfig
): CommandRunner {
  const limits = {
    timeoutMs: config.toolTimeoutSeconds * 1000,
    maxOutputChars: config.maxOutputChars,
  };
  if (config.useContainer) {
    return createContainerCommandRunner({
      workspaceRoot,
      image: config.containerImage,
      runtime: config.containerRuntime,
      ...limits,
    });
  }
  return createLocalCommandRunner({ workspaceRoot, ...limits });
}

export function createBackendForConfig(config: BenchmarkConfig): ModelBackend {
  return createModelBackend({
    provider: config.provider,
    model: config.model,
    credential: resolveProviderCredential(config.provider, config.apiKey),
    baseUrl: config.baseUrl,
    timeoutMs: config.modelRequestTimeoutMs,
  });
}

interface TaskContext {
  config: BenchmarkConfig;
  backend: ModelBackend;
  createRunner: (workspaceRoot: string, config: BenchmarkConfig) => CommandRunner;
  scorer?: Scorer;
  persist: boolean;
  hooks?: BenchmarkHooks;
}

async function scoreRun(
  context: TaskContext,
  task: BenchmarkTask,
  record: RunRecord
): Promise<ScoreRecord> {
  if (!context.scorer || !task.groundTruth) {
    return emptyScore();
  }
  try {
    return await context.scorer.score(task.groundTruth, record.verdict);
  } catch (err) {
    emit(context.hooks, {
      type: "score_error",
      data: { taskId: task.taskId, error: toErrorMessage(err, "Scoring failed") },
    });
    return emptyScore();
  }
}

async function runSingleTask(
  context: TaskContext,
  task: BenchmarkTask
): Promise<BenchmarkTaskResult> {
  const { config } = context;
  emit(context.hooks, { type: "task_started", data: { taskId: task.taskId } });

  const workspaceRoot = await resolveWorkspaceRoot(task.workspaceDir);
  const runner = context.createRunner(workspaceRoot, config);
  const sample = await validateSandboxPath(task.sampleName, workspaceRoot);
  const declarations = task.fileType
    ? getToolDeclarationsForFormat(task.fileType, config.allowedTools)
    : undefined;
  const dispatcher = createToolDispatcher({
    runner,
    allowedTools: declarations?.map((declaration) => declaration.name) ?? config.allowedTools,
    declarations,
  });
  const eventWriter = context.persist
    ? createRunEventWriter(config.resultsDir, task.taskId)
    : null;

  const record = await runAnalysisAgent(
    {
      taskId: task.taskId,
      backend: context.backend,
      dispatcher,
      systemPrompt: buildSystemPrompt({
        sampleName: task.sampleName,
        mountedPath: runner.toCommandPath(sample),
        maxToolCalls: config.maxToolCalls,
        toolNames: dispatcher.declarations.map((declaration) => declaration.name),
        advanced: task.difficulty >= ADVANCED_DIFFICULTY,
      }),
      maxToolCalls: config.maxToolCalls,
      maxOutputTokens: config.maxOutputTokens,
    },
    {
      onEvent: (event) => {
        eventWriter?.record(event);
        emit(context.hooks, { type: "task_event", data: { taskId: task.taskId, event } });
      },
    }
  );

  const score = await scoreRun(context, task, record);
  const metrics = collectTaskMetrics(task.taskId, record, score);

  if (context.persist) {
    try {
      await saveRunRecord(config.resultsDir, record, { score, metrics });
    } catch (err) {
      emit(context.hooks, {
        type: "store_error",
        data: { taskId: task.taskId, error: toErrorMessage(err, "Could not save run record") },
      });
    }
    try {
      await eventWriter?.flush();
    } catch (err) {
      emit(context.hooks, {
        type: "store_error",
        data: { taskId: task.taskId, error: toErrorMessage(err, "Could not write run events") },
      });
    }
  }

  emit(context.hooks, { type: "task_finished", data: { taskId: task.taskId, metrics } });
  return { taskId: task.taskId, record, score, metrics };
}

/**
 * Runs every task, at most `config.concurrency` at a time. Each run owns its
 * runner, dispatcher and conversation; a task that cannot start is recorded
 * without a verdict and the rest continue.
 */
export async function runBenchmark(
  tasks: readonly BenchmarkTask[],
  deps: BenchmarkDependencies,
  hooks?: BenchmarkHooks
): Promise<BenchmarkResult> {
  const { config } = deps;
  const context: TaskContext = {
    config,
    backend: deps.backend ?? createBackendForConfig(config),
    createRunner: deps.createRunner ?? createCommandRunnerForConfig,
    scorer: deps.scorer,
    persist: deps.persist ?? true,
    hooks,
  };
  const concurrency = Math.max(1, Math.floor(config.concurrency));

  emit(hooks, {
    type: "benchmark_started",
    data: { tasks: tasks.length, provider: context.backend.provider, model: context.backend.model },
  });

  const results: BenchmarkTaskResult[] = [];
  for (let index = 0; index < tasks.length; index += concurrency) {
    const batch = tasks.slice(index, index + concurrency);
    const settled = await Promise.allSettled(batch.map((task) => runSingleTask(context, task)));

    settled.forEach((outcome, offset) => {
      if (outcome.status === "fulfilled") {
        results.push(outcome.value);
        return;
      }
      const { taskId } = batch[offset];
      const error = toErrorMessage(outcome.reason, "Task failed");
      emit(hooks, { type: "task_failed", data: { taskId, error } });
      results.push({
        taskId,
        record: null,
        score: emptyScore(),
        metrics: failedTaskMetrics(taskId, error),
      });
    });
  }

  const aggregate = computeAggregate(results.map((result) => result.metrics));

  let reportPath: string | null = null;
  if (context.persist) {
    try {
      reportPath = await saveBenchmarkReport(config.resultsDir, {
        config: {
          provider: config.provider,
          model: config.model,
          maxToolCalls: config.maxToolCalls,
          useContainer: config.useContainer,
          allowedTools: config.allowedTools,
        },
        aggregate,
        tasks: results.map((result) => result.metrics),
        scores: Object.fromEntries(results.map((result) => [result.taskId, result.score])),
      });
    } catch (err) {
      emit(hooks, {
        type: "store_error",
        data: { taskId: null, error: toErrorMessage(err, "Could not save benchmark report") },
      });
    }
  }

  return { tasks: results, aggregate, reportPath };
}
