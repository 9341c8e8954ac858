import { afterEach, describe, expect, it, vi } from "vitest";
import { BackendError, type ConversationTurn, type ModelRequest } from "@/lib/server/model";
import { createAnthropicBackend, toAnthropicMessages } from "@/lib/server/providers/anthropic";
import { getToolDeclarations } from "@/lib/server/tools";

interface CapturedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function stubFetch(respond: () => Response | Promise<Response>) {
  const captured: CapturedRequest[] = [];
  vi.stubGlobal(
    "fetch",
    async (url: string, init: { headers: Record<string, string>; body: string }) => {
      captured.push({ url, headers: init.headers, body: JSON.parse(init.body) });
      return respond();
    }
  );
  return captured;
}

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const conversation: ConversationTurn[] = [
  { role: "user", content: "Begin." },
  {
    role: "assistant",
    content: [
      { type: "text", text: "Checking the header." },
      { type: "tool_use", id: "toolu_1", name: "file", input: { path: "/workspace/sample.bin" } },
    ],
  },
  {
    role: "user",
    content: [
      { type: "tool_result", toolUseId: "toolu_1", content: "ELF 64-bit LSB executable", isError: false },
    ],
  },
  { role: "user", content: "IMPORTANT: 5 left." },
];

const request: ModelRequest = {
  system: "You are analyzing a binary.",
  conversation,
  tools: getToolDeclarations(["file"]),
  maxOutputTokens: 1024,
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("toAnthropicMessages", () => {
  it("merges adjacent same-role turns and maps tool results", () => {
    expect(toAnthropicMessages(conversation)).toEqual([
      { role: "user", content: [{ type: "text", text: "Begin." }] },
      {
        role: "assistant",
        content: [
          { type: "text", text: "Checking the header." },
          { type: "tool_use", id: "toolu_1", name: "file", input: { path: "/workspace/sample.bin" } },
        ],
      },
      {
        role: "user",
        content: [
          {
            type: "tool_result",
            tool_use_id: "toolu_1",
            content: "ELF 64-bit LSB executable",
            is_error: undefined,
          },
          { type: "text", text: "IMPORTANT: 5 left." },
        ],
      },
    ]);
  });
});

describe("createAnthropicBackend", () => {
  it("posts a Messages request and normalises tool requests", async () => {
    const captured = stubFetch(() =>
      jsonResponse({
        stop_reason: "tool_use",
        content: [
          { type: "text", text: "Looking at strings next." },
          { type: "tool_use", id: "toolu_2", name: "strings", input: { path: "/workspace/sample.bin" } },
        ],
        usage: { input_tokens: 120, output_tokens: 30 },
      })
    );
    const backend = createAnthropicBackend({
      model: "claude-sonnet-4-20250514",
      credential: { apiKey: "test-secret" },
    });

    const response = await backend.send(request);

    expect(response).toEqual({
      stopCondition: "tool_request",
      rawStopReason: "tool_use",
      text: "Looking at strings next.",
      toolRequests: [{ id: "toolu_2", name: "strings", input: { path: "/workspace/sample.bin" } }],
      inputTokens: 120,
      outputTokens: 30,
    });
    expect(captured).toHaveLength(1);
    expect(captured[0].url).toBe("https://api.anthropic.com/v1/messages");
    expect(captured[0].headers).toMatchObject({
      "x-api-key": "test-secret",
      "anthropic-version": "2023-06-01",
    });
    expect(captured[0].body).toMatchObject({
      model: "claude-sonnet-4-20250514",
      max_tokens: 1024,
      system: "You are analyzing a binary.",
    });
    expect(captured[0].body).toHaveProperty("tools.0.name", "file");
    expect(captured[0].body).toHaveProperty("tools.0.input_schema.type", "object");
  });

  it("maps max_tokens to a length limit", async () => {
    stubFetch(() =>
      jsonResponse({
        stop_reason: "max_tokens",
        content: [{ type: "text", text: "The binary" }],
        usage: { input_tokens: 1, output_tokens: 2 },
      })
    );
    const backend = createAnthropicBackend({ model: "m", credential: { apiKey: "test-secret" } });

    const response = await backend.send(request);

    expect(response.stopCondition).toBe("length_limit");
    expect(response.text).toBe("The binary");
  });

  it("surfaces HTTP failures as a BackendError with the status", async () => {
    stubFetch(() => new Response("overloaded", { status: 529 }));
    const backend = createAnthropicBackend({ model: "m", credential: { apiKey: "test-secret" } });

    const attempt = backend.send(request);

    await expect(attempt).rejects.toBeInstanceOf(BackendError);
    await expect(attempt).rejects.toMatchObject({
      provider: "anthropic",
      status: 529,
      message: "Model API error 529: overloaded",
    });
  });

  it("surfaces transport failures as a BackendError", async () => {
    stubFetch(() => {
      throw new TypeError("fetch failed");
    });
    const backend = createAnthropicBackend({ model: "m", credential: { apiKey: "test-secret" } });

    await expect(backend.send(request)).rejects.toMatchObject({
      name: "BackendError",
      message: "Model request failed: fetch failed",
    });
  });

  it("rejects a body that is not a Messages response", async () => {
    stubFetch(() => jsonResponse({ content: "nope" }));
    const backend = createAnthropicBackend({ model: "m", credential: { apiKey: "test-secret" } });

    await expect(backend.send(request)).rejects.toThrow(
      "Anthropic response did not match the Messages schema"
    );
  });
});
