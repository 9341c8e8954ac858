import type { ToolDeclaration } from "@/lib/server/tools";

export type ContentBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; toolUseId: string; content: string; isError: boolean };

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string | ContentBlock[];
}

export interface ToolInvocationRequest {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type StopCondition = "tool_request" | "normal_stop" | "length_limit" | "other";

export interface ModelResponse {
  stopCondition: StopCondition;
  /** Vendor's own stop reason, kept for the run record. */
  rawStopReason: string;
  text: string;
  toolRequests: ToolInvocationRequest[];
  inputTokens: number;
  outputTokens: number;
}

export interface ModelRequest {
  system: string;
  conversation: readonly ConversationTurn[];
  tools: readonly ToolDeclaration[];
  maxOutputTokens: number;
}

export interface ModelBackend {
  readonly provider: string;
  readonly model: string;
  send(request: ModelRequest): Promise<ModelResponse>;
}

/** Resolved by the caller; backends never look credentials up themselves. */
export interface ModelCredential {
  apiKey: string;
  headers?: Record<string, string>;
}

export class BackendError extends Error {
  provider: string;
  status?: number;

  constructor(message: string, provider: string, status?: number) {
    super(message);
    this.name = "BackendError";
    this.provider = provider;
    this.status = status;
  }
}

export const DEFAULT_MODEL_REQUEST_TIMEOUT_MS = 300000;
const MAX_ERROR_BODY_CHARS = 1800;

export function toErrorMessage(err: unknown, fallback: string): string {
  if (err instanceof Error && err.message.trim().length > 0) {
    return err.message;
  }
  if (typeof err === "string" && err.trim().length > 0) {
    return err;
  }
  return fallback;
}

function truncateText(value: string, maxChars: number): string {
  if (value.length <= maxChars) return value;
  return `${value.slice(0, maxChars)}\n... (truncated ${value.length - maxChars} chars)`;
}

interface PostJsonOptions {
  provider: string;
  headers: Record<string, string>;
  timeoutMs?: number;
}

/**
 * One POST, bounded by a timeout. Any transport, HTTP or decoding failure
 * surfaces as a single BackendError; there is no retry at this layer.
 */
export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions
): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_MODEL_REQUEST_TIMEOUT_MS;
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
  } catch (err) {
    throw new BackendError(
      timedOut
        ? `Model request timed out after ${timeoutMs}ms`
        : `Model request failed: ${toErrorMessage(err, "network error")}`,
      options.provider
    );
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "Unknown error");
    throw new BackendError(
      `Model API error ${response.status}: ${truncateText(errorText, MAX_ERROR_BODY_CHARS)}`,
      options.provider,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (err) {
    throw new BackendError(
      `Model API returned invalid JSON: ${toErrorMessage(err, "parse error")}`,
      options.provider,
      response.status
    );
  }
}

export function joinUrl(base: string, suffix: string): string {
  return `${base.replace(/\/+$/, "")}/${suffix.replace(/^\/+/, "")}`;
}
