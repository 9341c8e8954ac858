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
import type { JsonSchema } from "@/lib/server/tools";

const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { result: string; isError: boolean } } };

interface GeminiContent {
  role: "user" | "model";
  parts: GeminiPart[];
}

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        finishReason: z.string().optional(),
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({ name: z.string(), args: z.record(z.unknown()).default({}) })
                    .optional(),
                })
              )
              .default([]),
          })
          .default({}),
      })
    )
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
    })
    .default({}),
});

/** The function-declaration dialect rejects `additionalProperties`. */
export function toGeminiSchema(schema: JsonSchema): JsonSchema {
  const { additionalProperties: _dropped, properties, items, ...rest } = schema;
  const converted: JsonSchema = { ...rest };
  if (properties) {
    converted.properties = Object.fromEntries(
      Object.entries(properties).map(([key, value]) => [key, toGeminiSchema(value)])
    );
  }
  if (items) {
    converted.items = toGeminiSchema(items);
  }
  return converted;
}

export function toGeminiContents(conversation: readonly ConversationTurn[]): GeminiContent[] {
  // Function responses are matched by name, not id.
  const toolNames = new Map<string, string>();
  const contents: GeminiContent[] = [];

  for (const turn of conversation) {
    const role = turn.role === "assistant" ? "model" : "user";
    const parts: GeminiPart[] = [];

    if (typeof turn.content === "string") {
      parts.push({ text: turn.content });
    } else {
      for (const block of turn.content) {
        switch (block.type) {
          case "text":
            parts.push({ text: block.text });
            break;
          case "tool_use":
            toolNames.set(block.id, block.name);
            parts.push({ functionCall: { name: block.name, args: block.input } });
            break;
          case "tool_result":
            parts.push({
              functionResponse: {
                name: toolNames.get(block.toolUseId) ?? "unknown",
                response: { result: block.content, isError: block.isError },
              },
            });
            break;
        }
      }
    }

    const previous = contents[contents.length - 1];
    if (previous && previous.role === role) {
      previous.parts.push(...parts);
    } else {
      contents.push({ role, parts: parts.length > 0 ? parts : [{ text: "" }] });
    }
  }

  return contents;
}

function mapFinishReason(reason: string, hasToolCalls: boolean): StopCondition {
  if (hasToolCalls) return "tool_request";
  switch (reason) {
    case "STOP":
      return "normal_stop";
    case "MAX_TOKENS":
      return "length_limit";
    default:
      return "other";
  }
}

export interface GeminiBackendOptions {
  model: string;
  credential: ModelCredential;
  baseUrl?: string;
  timeoutMs?: number;
}

export function createGeminiBackend(options: GeminiBackendOptions): ModelBackend {
  const provider = "gemini";
  const url = joinUrl(
    options.baseUrl || DEFAULT_BASE_URL,
    `/models/${encodeURIComponent(options.model)}:generateContent`
  );
  let callCounter = 0;

  return {
    provider,
    model: options.model,
    async send(request) {
      const raw = await postJson(
        url,
        {
          systemInstruction: { parts: [{ text: request.system }] },
          contents: toGeminiContents(request.conversation),
          tools: [
            {
              functionDeclarations: request.tools.map((tool) => ({
                name: tool.name,
                description: tool.description,
                parameters: toGeminiSchema(tool.parameters),
              })),
            },
          ],
          generationConfig: { maxOutputTokens: request.maxOutputTokens },
        },
        {
          provider,
          timeoutMs: options.timeoutMs,
          headers: {
            "x-goog-api-key": options.credential.apiKey,
            ...options.credential.headers,
          },
        }
      );

      const parsed = responseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new BackendError("Gemini response did not include a candidate", provider);
      }

      const [candidate] = parsed.data.candidates;
      const textParts: string[] = [];
      const toolRequests: ToolInvocationRequest[] = [];
      for (const part of candidate.content.parts) {
        if (part.functionCall) {
          callCounter += 1;
          toolRequests.push({
            id: `gemini_${part.functionCall.name}_${callCounter}`,
            name: part.functionCall.name,
            input: part.functionCall.args,
          });
        } else if (part.text !== undefined) {
          textParts.push(part.text);
        }
      }

      const rawStopReason = candidate.finishReason ?? "STOP";
      return {
        stopCondition: mapFinishReason(rawStopReason, toolRequests.length > 0),
        rawStopReason,
        text: textParts.join("\n"),
        toolRequests,
        inputTokens: parsed.data.usageMetadata.promptTokenCount,
        outputTokens: parsed.data.usageMetadata.candidatesTokenCount,
      };
    },
  };
}
