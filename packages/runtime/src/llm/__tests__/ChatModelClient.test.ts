import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  FatalProviderError,
  TransientProviderError,
} from "../../errors/index.js";
import { ChatModelClient } from "../ChatModelClient.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("ChatModelClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("resolves provider defaults from the environment", () => {
    const client = new ChatModelClient({
      env: { DEEPSEEK_API_KEY: "test-secret", DEEPSEEK_BASE_URL: "http://localhost:9999/v1/" },
    });
    expect(client.getProvider()).toBe("deepseek");
    expect(client.getEndpoint()).toBe("http://localhost:9999/v1/chat/completions");
    expect(client.isConfigured()).toBe(true);
  });

  it("refuses to call without an API key", async () => {
    const client = new ChatModelClient({ provider: "openai", env: {} });
    await expect(client.complete({ messages: [] })).rejects.toThrow(
      new FatalProviderError("ChatModelClient (openai) is not configured with an API key")
    );
  });

  it("sends the chat payload and maps tool calls", async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        choices: [
          {
            message: {
              content: "",
              tool_calls: [
                { id: "call-1", function: { name: "math", arguments: '{"expression":"1+1"}' } },
              ],
            },
          },
        ],
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new ChatModelClient({
      provider: "openai",
      apiKey: "test-secret",
      baseURL: "http://localhost:9999/v1",
      model: "test-model",
      env: {},
    });
    const response = await client.complete({
      messages: [
        { role: "user", content: "add" },
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "call-0", name: "echo", arguments: { message: "x" } }],
        },
        { role: "tool", content: "{}", toolCallId: "call-0" },
      ],
      temperature: 0.2,
      maxTokens: 64,
      responseFormat: "json_object",
      purpose: "execution",
    });

    expect(response).toEqual({
      content: null,
      toolCalls: [{ id: "call-1", name: "math", arguments: '{"expression":"1+1"}' }],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:9999/v1/chat/completions");
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      temperature: 0.2,
      max_tokens: 64,
      messages: [
        { role: "user", content: "add" },
        {
          role: "assistant",
          content: "",
          tool_calls: [
            {
              id: "call-0",
              type: "function",
              function: { name: "echo", arguments: '{"message":"x"}' },
            },
          ],
        },
        { role: "tool", content: "{}", tool_call_id: "call-0" },
      ],
      response_format: { type: "json_object" },
    });
  });

  it("classifies rate limits and server errors as transient", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("slow down", { status: 429, statusText: "Too Many Requests" }))
    );
    const client = new ChatModelClient({ provider: "deepseek", apiKey: "test-secret", env: {} });

    const failure = client.complete({ messages: [{ role: "user", content: "hi" }] });
    await expect(failure).rejects.toBeInstanceOf(TransientProviderError);
    await expect(failure).rejects.toThrow(
      "Deepseek request failed with status 429 Too Many Requests: slow down"
    );
  });

  it("classifies client errors as fatal", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("", { status: 401, statusText: "Unauthorized" }))
    );
    const client = new ChatModelClient({ provider: "openai", apiKey: "test-secret", env: {} });

    const error = await client
      .complete({ messages: [{ role: "user", content: "hi" }] })
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(FatalProviderError);
    if (error instanceof FatalProviderError) {
      expect(error.message).toBe("Openai request failed with status 401 Unauthorized");
      expect(error.details).toEqual({ status: 401 });
    }
  });

  it("rejects empty completions", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ choices: [{ message: { content: "  " } }] })));
    const client = new ChatModelClient({ provider: "openai", apiKey: "test-secret", env: {} });

    await expect(client.complete({ messages: [] })).rejects.toThrow(
      "Openai response did not contain any message content"
    );
  });

  it("does not call out when the signal is already aborted", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}));
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();
    const client = new ChatModelClient({ provider: "openai", apiKey: "test-secret", env: {} });

    await expect(
      client.complete({ messages: [], signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
