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

type ChatMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: Array<{
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }>;
    }
  | { role: "tool"; tool_call_id: string; content: string };

const responseSchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullable().optional(),
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().default("{}"),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      completion_tokens: z.number().default(0),
    })
    .nullable()
    .optional(),
});

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Malformed arguments reach the dispatcher as an empty object and fail validation there.
    return {};
  }
  return {};
}

export function toChatMessages(
  system: string,
  conversation: readonly ConversationTurn[]
): ChatMessage[] {
  const messages: ChatMessage[] = [{ role: "system", content: system }];

  for (const turn of conversation) {
    if (typeof turn.content === "string") {
      messages.push(
        turn.role === "assistant"
          ? { role: "assistant", content: turn.content }
          : { role: "user", content: turn.content }
      );
      continue;
    }

    if (turn.role === "assistant") {
      const text: string[] = [];
      const toolCalls: NonNullable<Extract<ChatMessage, { role: "assistant" }>["tool_calls"]> = [];
      for (const block of turn.content) {
        if (block.type === "text") text.push(block.text);
        if (block.type === "tool_use") {
          toolCalls.push({
            id: block.id,
            type: "function",
            function: { name: block.name, arguments: JSON.stringify(block.input) },
          });
        }
      }
      messages.push({
        role: "assistant",
        content: text.length > 0 ? text.join("\n") : null,
        ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
      });
      continue;
    }

    // Tool messages must directly follow the assistant turn that requested them.
    const text: string[] = [];
    for (const block of turn.content) {
      if (block.type === "tool_result") {
        messages.push({ role: "tool", tool_call_id: block.toolUseId, content: block.content });
      } else if (block.type === "text") {
        text.push(block.text);
      }
    }
    if (text.length > 0) {
      messages.push({ role: "user", content: text.join("\n") });
    }
  }

  return messages;
}

function mapFinishReason(reason: string, hasToolCalls: boolean): StopCondition {
  if (hasToolCalls) return "tool_request";
  switch (reason) {
    case "stop":
      return "normal_stop";
    case "length":
      return "length_limit";
    default:
      return "other";
  }
}

export interface OpenAICompatibleBackendOptions {
  provider: string;
  model: string;
  credential: ModelCredential;
  baseUrl: string;
  /** OpenAI proper wants `max_completion_tokens`; most compatible servers still read `max_tokens`. */
  maxTokensField?: "max_tokens" | "max_completion_tokens";
  timeoutMs?: number;
}

export function createOpenAICompatibleBackend(
  options: OpenAICompatibleBackendOptions
): ModelBackend {
  const url = joinUrl(options.baseUrl, "/chat/completions");
  const maxTokensField = options.maxTokensField || "max_tokens";

  return {
    provider: options.provider,
    model: options.model,
    async send(request) {
      const raw = await postJson(
        url,
        {
          model: options.model,
          messages: toChatMessages(request.system, request.conversation),
          tools: request.tools.map((tool) => ({
            type: "function",
            function: {
              name: tool.name,
              description: tool.description,
              parameters: tool.parameters,
            },
          })),
          [maxTokensField]: request.maxOutputTokens,
        },
        {
          provider: options.provider,
          timeoutMs: options.timeoutMs,
          headers: {
            Authorization: `Bearer ${options.credential.apiKey}`,
            ...options.credential.headers,
          },
        }
      );

      const parsed = responseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new BackendError(
          "Chat completion response did not include a usable choice",
          options.provider
        );
      }

      const [choice] = parsed.data.choices;
      const toolRequests: ToolInvocationRequest[] = (choice.message.tool_calls ?? []).map(
        (call) => ({
          id: call.id,
          name: call.function.name,
          input: parseArguments(call.function.arguments),
        })
      );
      const rawStopReason = choice.finish_reason ?? "stop";

      return {
        stopCondition: mapFinishReason(rawStopReason, toolRequests.length > 0),
        rawStopReason,
        text: choice.message.content ?? "",
        toolRequests,
        inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
        outputTokens: parsed.data.usage?.completion_tokens ?? 0,
      };
    },
  };
}
