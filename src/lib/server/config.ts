import { readFile } from "fs/promises";
import path from "path";
import { parseEnv } from "util";
import { z } from "zod";
import { DEFAULT_MODEL_REQUEST_TIMEOUT_MS, type ModelCredential } from "@/lib/server/model";
import { PROVIDER_NAMES, isProviderName, type ProviderName } from "@/lib/server/providers";
import {
  DEFAULT_ALLOWED_TOOLS,
  INVESTIGATION_TOOLS,
  isInvestigationTool,
  type InvestigationToolName,
} from "@/lib/server/tools";
import { formatIssues } from "@/lib/server/verdict";

export type EnvSource = Record<string, string | undefined>;

export interface BenchmarkConfig {
  workspaceDir: string;
  resultsDir: string;
  provider: ProviderName;
  model: string;
  baseUrl?: string;
  /** Explicit key; wins over the provider's environment variable. */
  apiKey?: string;
  maxToolCalls: number;
  toolTimeoutSeconds: number;
  maxOutputChars: number;
  maxOutputTokens: number;
  containerImage: string;
  containerRuntime: string;
  useContainer: boolean;
  allowedTools: InvestigationToolName[];
  modelRequestTimeoutMs: number;
  concurrency: number;
}

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
  openrouter: "anthropic/claude-sonnet-4",
  deepseek: "deepseek-chat",
  gemini: "gemini-2.0-flash",
};

export const PROVIDER_KEY_VARIABLES: Record<ProviderName, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  openrouter: "OPENROUTER_API_KEY",
  deepseek: "DEEPSEEK_API_KEY",
  gemini: "GOOGLE_API_KEY",
};

const DEFAULT_PROVIDER: ProviderName = "anthropic";
const DEFAULT_WORKSPACE_DIR = "binaries";
const DEFAULT_RESULTS_DIR = "results";
const DEFAULT_CONTAINER_IMAGE = "binprobe-tools:latest";
const DEFAULT_CONTAINER_RUNTIME = "docker";

const LIMITS = {
  maxToolCalls: { fallback: 25, min: 1, max: 200 },
  toolTimeoutSeconds: { fallback: 30, min: 1, max: 600 },
  maxOutputChars: { fallback: 50000, min: 1000, max: 1000000 },
  maxOutputTokens: { fallback: 4096, min: 256, max: 64000 },
  modelRequestTimeoutMs: { fallback: DEFAULT_MODEL_REQUEST_TIMEOUT_MS, min: 5000, max: 1800000 },
  concurrency: { fallback: 1, min: 1, max: 16 },
} as const;

type NumericSetting = keyof typeof LIMITS;

function numberSchema(setting: NumericSetting) {
  return z.number().int().min(LIMITS[setting].min).max(LIMITS[setting].max).optional();
}

const benchmarkConfigInputSchema = z
  .object({
    workspaceDir: z.string().trim().min(1).optional(),
    resultsDir: z.string().trim().min(1).optional(),
    provider: z.enum(PROVIDER_NAMES).optional(),
    model: z.string().trim().min(1).optional(),
    baseUrl: z.string().trim().url().optional(),
    apiKey: z.string().trim().min(1).optional(),
    maxToolCalls: numberSchema("maxToolCalls"),
    toolTimeoutSeconds: numberSchema("toolTimeoutSeconds"),
    maxOutputChars: numberSchema("maxOutputChars"),
    maxOutputTokens: numberSchema("maxOutputTokens"),
    containerImage: z.string().trim().min(1).optional(),
    containerRuntime: z.string().trim().min(1).optional(),
    useContainer: z.boolean().optional(),
    allowedTools: z.array(z.enum(INVESTIGATION_TOOLS)).min(1).optional(),
    modelRequestTimeoutMs: numberSchema("modelRequestTimeoutMs"),
    concurrency: numberSchema("concurrency"),
  })
  .strict();

export type BenchmarkConfigInput = z.infer<typeof benchmarkConfigInputSchema>;

function normalizeString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function clampNumber(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.floor(value)));
}

function readNumber(source: EnvSource, key: string, setting: NumericSetting): number {
  const { fallback, min, max } = LIMITS[setting];
  const raw = normalizeString(source[key]);
  if (raw === undefined) return fallback;
  const numeric = Number(raw);
  if (!Number.isFinite(numeric)) {
    return fallback;
  }
  return clampNumber(numeric, min, max);
}

function readBoolean(source: EnvSource, key: string, fallback: boolean): boolean {
  const raw = normalizeString(source[key])?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  return fallback;
}

function readToolList(source: EnvSource, key: string): InvestigationToolName[] {
  const raw = normalizeString(source[key]);
  if (raw === undefined) return [...DEFAULT_ALLOWED_TOOLS];
  const tools = raw
    .split(",")
    .map((name) => name.trim())
    .filter(isInvestigationTool);
  return tools.length > 0 ? [...new Set(tools)] : [...DEFAULT_ALLOWED_TOOLS];
}

/**
 * Copies variables from a dotenv file into `target`. Variables already set win.
 * A missing file is not an error. Returns the names that were applied.
 */
export async function loadEnvFile(
  filePath: string = path.resolve(".env"),
  target: EnvSource = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") {
      return [];
    }
    throw err;
  }

  const applied: string[] = [];
  for (const [key, value] of Object.entries(parseEnv(content))) {
    if (typeof value !== "string" || target[key] !== undefined) continue;
    target[key] = value;
    applied.push(key);
  }
  return applied;
}

export function getBenchmarkConfig(source: EnvSource = process.env): BenchmarkConfig {
  const providerRaw = normalizeString(source.BINPROBE_PROVIDER)?.toLowerCase();
  const provider = providerRaw && isProviderName(providerRaw) ? providerRaw : DEFAULT_PROVIDER;

  return {
    workspaceDir: path.resolve(normalizeString(source.BINPROBE_WORKSPACE_DIR) || DEFAULT_WORKSPACE_DIR),
    resultsDir: path.resolve(normalizeString(source.BINPROBE_RESULTS_DIR) || DEFAULT_RESULTS_DIR),
    provider,
    model: normalizeString(source.BINPROBE_MODEL) || DEFAULT_MODELS[provider],
    baseUrl: normalizeString(source.BINPROBE_BASE_URL),
    maxToolCalls: readNumber(source, "BINPROBE_MAX_TOOL_CALLS", "maxToolCalls"),
    toolTimeoutSeconds: readNumber(source, "BINPROBE_TOOL_TIMEOUT_SECONDS", "toolTimeoutSeconds"),
    maxOutputChars: readNumber(source, "BINPROBE_MAX_OUTPUT_CHARS", "maxOutputChars"),
    maxOutputTokens: readNumber(source, "BINPROBE_MAX_TOKENS", "maxOutputTokens"),
    containerImage: normalizeString(source.BINPROBE_CONTAINER_IMAGE) || DEFAULT_CONTAINER_IMAGE,
    containerRuntime:
      normalizeString(source.BINPROBE_CONTAINER_RUNTIME) || DEFAULT_CONTAINER_RUNTIME,
    useContainer: readBoolean(source, "BINPROBE_USE_CONTAINER", true),
    allowedTools: readToolList(source, "BINPROBE_ALLOWED_TOOLS"),
    modelRequestTimeoutMs: readNumber(source, "BINPROBE_MODEL_TIMEOUT_MS", "modelRequestTimeoutMs"),
    concurrency: readNumber(source, "BINPROBE_CONCURRENCY", "concurrency"),
  };
}

export function parseBenchmarkConfigInput(value: unknown): BenchmarkConfigInput | undefined {
  if (value === undefined) return undefined;
  const parsed = benchmarkConfigInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid benchmark config: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

export function resolveBenchmarkConfig(
  override?: BenchmarkConfigInput,
  source: EnvSource = process.env
): BenchmarkConfig {
  const base = getBenchmarkConfig(source);
  const provider = override?.provider ?? base.provider;
  // A provider switch without a model takes that provider's default model.
  const model =
    override?.model ??
    (provider !== base.provider && !normalizeString(source.BINPROBE_MODEL)
      ? DEFAULT_MODELS[provider]
      : base.model);

  // Field by field: a key present but set to undefined must not clear the default.
  return {
    workspaceDir: override?.workspaceDir ? path.resolve(override.workspaceDir) : base.workspaceDir,
    resultsDir: override?.resultsDir ? path.resolve(override.resultsDir) : base.resultsDir,
    provider,
    model,
    baseUrl: override?.baseUrl ?? base.baseUrl,
    apiKey: override?.apiKey ?? base.apiKey,
    maxToolCalls: override?.maxToolCalls ?? base.maxToolCalls,
    toolTimeoutSeconds: override?.toolTimeoutSeconds ?? base.toolTimeoutSeconds,
    maxOutputChars: override?.maxOutputChars ?? base.maxOutputChars,
    maxOutputTokens: override?.maxOutputTokens ?? base.maxOutputTokens,
    containerImage: override?.containerImage ?? base.containerImage,
    containerRuntime: override?.containerRuntime ?? base.containerRuntime,
    useContainer: override?.useContainer ?? base.useContainer,
    allowedTools: override?.allowedTools ? [...new Set(override.allowedTools)] : base.allowedTools,
    modelRequestTimeoutMs: override?.modelRequestTimeoutMs ?? base.modelRequestTimeoutMs,
    concurrency: override?.concurrency ?? base.concurrency,
  };
}

export function resolveProviderCredential(
  provider: ProviderName,
  explicitKey?: string,
  source: EnvSource = process.env
): ModelCredential {
  const explicit = normalizeString(explicitKey);
  if (explicit) {
    return { apiKey: explicit };
  }
  const variable = PROVIDER_KEY_VARIABLES[provider];
  const fromEnv = normalizeString(source[variable]);
  if (fromEnv) {
    return { apiKey: fromEnv };
  }
  throw new Error(
    `No API key for provider '${provider}'. Set ${variable} in the environment or pass an explicit key.`
  );
}
