export {
  DEFAULT_BUDGET_WARNING_THRESHOLDS,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_TOOL_CALLS,
  runAnalysisAgent,
  type AgentRunHooks,
  type AgentRunOptions,
  type AgentRunProgressEvent,
  type AgentState,
  type InvocationLogEntry,
  type RunRecord,
  type RunTermination,
  type TokenUsage,
  type VerdictSource,
} from "./lib/server/agentRunner";
export {
  createBackendForConfig,
  createCommandRunnerForConfig,
  runBenchmark,
  type BenchmarkDependencies,
  type BenchmarkHooks,
  type BenchmarkProgressEvent,
  type BenchmarkResult,
  type BenchmarkTaskResult,
} from "./lib/server/benchmarkRunner";
export {
  OUTPUT_TRUNCATION_MARKER,
  buildContainerArgs,
  createContainerCommandRunner,
  createLocalCommandRunner,
  runProcess,
  type CommandResult,
  type CommandRunner,
} from "./lib/server/commandRunner";
export {
  DEFAULT_MODELS,
  PROVIDER_KEY_VARIABLES,
  getBenchmarkConfig,
  loadEnvFile,
  parseBenchmarkConfigInput,
  resolveBenchmarkConfig,
  resolveProviderCredential,
  type BenchmarkConfig,
  type BenchmarkConfigInput,
} from "./lib/server/config";
export {
  collectTaskMetrics,
  computeAggregate,
  summarizeInvocations,
  type AggregateMetrics,
  type TaskMetrics,
} from "./lib/server/metrics";
export {
  BackendError,
  type ConversationTurn,
  type ModelBackend,
  type ModelCredential,
  type ModelRequest,
  type ModelResponse,
  type StopCondition,
} from "./lib/server/model";
export {
  SANDBOX_MOUNT_PATH,
  SandboxViolationError,
  stripSandboxMountPrefix,
  validateSandboxPath,
  type SandboxedPath,
} from "./lib/server/pathPolicy";
export { buildSystemPrompt } from "./lib/server/prompts";
export {
  PROVIDER_NAMES,
  createModelBackend,
  isProviderName,
  type ProviderName,
} from "./lib/server/providers";
export { createRunEventWriter, saveBenchmarkReport, saveRunRecord } from "./lib/server/runStore";
export type { GroundTruth, ScoreRecord, Scorer } from "./lib/server/scorer";
export { filterTasks, loadBenchmarkTasks, type BenchmarkTask } from "./lib/server/tasks";
export {
  DispatchError,
  createToolDispatcher,
  type DispatchOutcome,
  type ToolDispatcher,
} from "./lib/server/toolDispatcher";
export {
  FINAL_ANSWER_TOOL,
  getToolDeclarations,
  getToolDeclarationsForFormat,
  type ToolDeclaration,
} from "./lib/server/tools";
export {
  checkVerdict,
  extractVerdictFromText,
  verdictSchema,
  type SubmittedVerdict,
  type Verdict,
} from "./lib/server/verdict";
export { WorkspaceAccessError, resolveWorkspaceRoot } from "./lib/server/workspace";
