import type { ModelBackend, ModelCredential } from "@/lib/server/model";
import { createAnthropicBackend } from "@/lib/server/providers/anthropic";
import { createGeminiBackend } from "@/lib/server/providers/gemini";
import { createOpenAICompatibleBackend } from "@/lib/server/providers/openaiCompatible";

export const PROVIDER_NAMES = ["anthropic", "openai", "openrouter", "deepseek", "gemini"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ModelBackendOptions {
  provider: ProviderName;
  model: string;
  credential: ModelCredential;
  baseUrl?: string;
  timeoutMs?: number;
}

type BackendFactory = (options: ModelBackendOptions) => ModelBackend;

const PROVIDER_FACTORIES: Record<ProviderName, BackendFactory> = {
  anthropic: (options) => createAnthropicBackend(options),
  openai: (options) =>
    createOpenAICompatibleBackend({
      ...options,
      baseUrl: options.baseUrl || "https://api.openai.com/v1",
      maxTokensField: "max_completion_tokens",
    }),
  openrouter: (options) =>
    createOpenAICompatibleBackend({
      ...options,
      baseUrl: options.baseUrl || "https://openrouter.ai/api/v1",
    }),
  deepseek: (options) =>
    createOpenAICompatibleBackend({
      ...options,
      baseUrl: options.baseUrl || "https://api.deepseek.com",
    }),
  gemini: (options) => createGeminiBackend(options),
};

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function createModelBackend(options: ModelBackendOptions): ModelBackend {
  const factory = PROVIDER_FACTORIES[options.provider];
  if (!factory) {
    throw new Error(
      `Unknown provider '${String(options.provider)}'. Choose from: ${PROVIDER_NAMES.join(", ")}`
    );
  }
  return factory(options);
}
