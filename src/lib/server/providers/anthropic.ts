import { z } from "zod";
import {
  BackendError,
  joinUrl,
  postJson,
  type ConversationTurn,
  type ModelBackend,
  type ModelCredential,
  type StopCondition,
  type ToolInvocationRequest,
} from "@/lib/server/model";

const DEFAULT_BASE_URL = "https://api.anthropic.com";
const API_VERSION = "2023-06-01";

type AnthropicBlock =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: "user" | "assistant";
  content: AnthropicBlock[];
}

const responseSchema = z.object({
  stop_reason: z.string().nullable().optional(),
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
          id: z.string().optional(),
          name: z.string().optional(),
          input: z.record(z.unknown()).optional(),
        })
        .passthrough()
    )
    .default([]),
  usage: z
    .object({
      input_tokens: z.number().default(0),
      output_tokens: z.number().default(0),
    })
    .default({}),
});

function toAnthropicBlocks(turn: ConversationTurn): AnthropicBlock[] {
  if (typeof turn.content === "string") {
    return turn.content ? [{ type: "text", text: turn.content }] : [];
  }
  return turn.content.map((block): AnthropicBlock => {
    switch (block.type) {
      case "text":
        return block;
      case "tool_use":
        return block;
      case "tool_result":
        return {
          type: "tool_result",
          tool_use_id: block.toolUseId,
          content: block.content,
          is_error: block.isError || undefined,
        };
    }
  });
}

/** Adjacent same-role turns (tool results followed by a warning) become one message. */
export function toAnthropicMessages(conversation: readonly ConversationTurn[]): AnthropicMessage[] {
  const messages: AnthropicMessage[] = [];
  for (const turn of conversation) {
    const blocks = toAnthropicBlocks(turn);
    if (blocks.length === 0) continue;
    const previous = messages[messages.length - 1];
    if (previous && previous.role === turn.role) {
      previous.content.push(...blocks);
    } else {
      messages.push({ role: turn.role, content: blocks });
    }
  }
  return messages;
}

function mapStopReason(reason: string): StopCondition {
  switch (reason) {
    case "tool_use":
      return "tool_request";
    case "end_turn":
    case "stop_sequence":
      return "normal_stop";
    case "max_tokens":
      return "length_limit";
    default:
      return "other";
  }
}

export interface AnthropicBackendOptions {
  model: string;
  credential: ModelCredential;
  baseUrl?: string;
  timeoutMs?: number;
}

export function createAnthropicBackend(options: AnthropicBackendOptions): ModelBackend {
  const provider = "anthropic";
  const url = joinUrl(options.baseUrl || DEFAULT_BASE_URL, "/v1/messages");

  return {
    provider,
    model: options.model,
    async send(request) {
      const raw = await postJson(
        url,
        {
          model: options.model,
          max_tokens: request.maxOutputTokens,
          system: request.system,
          messages: toAnthropicMessages(request.conversation),
          tools: request.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            input_schema: tool.parameters,
          })),
        },
        {
          provider,
          timeoutMs: options.timeoutMs,
          headers: {
            "x-api-key": options.credential.apiKey,
            "anthropic-version": API_VERSION,
            ...options.credential.headers,
          },
        }
      );

      const parsed = responseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new BackendError("Anthropic response did not match the Messages schema", provider);
      }

      const textParts: string[] = [];
      const toolRequests: ToolInvocationRequest[] = [];
      for (const block of parsed.data.content) {
        if (block.type === "text" && block.text !== undefined) {
          textParts.push(block.text);
        } else if (block.type === "tool_use" && block.id && block.name) {
          toolRequests.push({ id: block.id, name: block.name, input: block.input ?? {} });
        }
      }

      const rawStopReason = parsed.data.stop_reason ?? "end_turn";
      return {
        stopCondition: mapStopReason(rawStopReason),
        rawStopReason,
        text: textParts.join("\n"),
        toolRequests,
        inputTokens: parsed.data.usage.input_tokens,
        outputTokens: parsed.data.usage.output_tokens,
      };
    },
  };
}
