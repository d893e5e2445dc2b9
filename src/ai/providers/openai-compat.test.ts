/**
 * OpenAI-compatible Provider Tests
 * Request shape, tool call parsing and error mapping, with fetch stubbed
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { OpenAICompatProvider } from "./openai-compat.js";
import { ProviderError } from "../provider.js";
import { SQL_TOOLS } from "../tools.js";

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

function stubFetch() {
  const fetchMock = vi.fn<(url: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function makeProvider() {
  return new OpenAICompatProvider({
    baseUrl: "https://llm.test/v1",
    apiKey: "test-secret",
    defaultModel: "test-model",
    retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 1, retryableStatuses: new Set([503]) },
  });
}

const completion = {
  choices: [
    {
      message: {
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "execute_sql", arguments: '{"sql_query":"SELECT 1"}' },
          },
        ],
      },
    },
  ],
  usage: { prompt_tokens: 42, completion_tokens: 7 },
};

describe("OpenAICompatProvider", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should post a chat completion with tools", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse(completion));

    await makeProvider().generate({
      systemPrompt: "You are a tester.",
      messages: [{ role: "user", content: "Count the rows" }],
      tools: [SQL_TOOLS.execute_sql],
      temperature: 0,
    });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });

    const body = JSON.parse(String(init?.body));
    expect(body.model).toBe("test-model");
    expect(body.temperature).toBe(0);
    expect(body.messages).toEqual([
      { role: "system", content: "You are a tester." },
      { role: "user", content: "Count the rows" },
    ]);
    expect(body.tools).toEqual([
      {
        type: "function",
        function: {
          name: "execute_sql",
          description: SQL_TOOLS.execute_sql.description,
          parameters: SQL_TOOLS.execute_sql.parameters,
        },
      },
    ]);
    expect(body.tool_choice).toBe("auto");
  });

  it("should return tool calls with raw arguments and usage", async () => {
    stubFetch().mockResolvedValueOnce(jsonResponse(completion));

    const result = await makeProvider().generate({ messages: [{ role: "user", content: "hi" }] });

    expect(result).toEqual({
      text: "",
      toolCalls: [{ id: "call_1", name: "execute_sql", arguments: '{"sql_query":"SELECT 1"}' }],
      inputTokens: 42,
      outputTokens: 7,
    });
  });

  it("should send tool results back in wire format", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ choices: [{ message: { content: "There is 1 row." } }] })
    );

    const result = await makeProvider().generate({
      messages: [
        { role: "user", content: "Count the rows" },
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "call_1", name: "execute_sql", arguments: '{"sql_query":"SELECT 1"}' }],
        },
        { role: "tool", toolCallId: "call_1", name: "execute_sql", content: "1" },
      ],
    });

    const body = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body.messages.slice(1)).toEqual([
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "execute_sql", arguments: '{"sql_query":"SELECT 1"}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "call_1", name: "execute_sql", content: "1" },
    ]);
    expect(body.tools).toBeUndefined();
    expect(result.text).toBe("There is 1 row.");
    expect(result.inputTokens).toBe(0);
  });

  it("should map error bodies to ProviderError", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: { message: "Failed to call a function.", code: "tool_use_failed" } },
        400
      )
    );

    const error = await makeProvider()
      .generate({ messages: [{ role: "user", content: "hi" }] })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ status: 400, code: "tool_use_failed" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should retry server errors", async () => {
    const fetchMock = stubFetch();
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: { message: "over capacity" } }, 503))
      .mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: "ok" } }] }));

    const result = await makeProvider().generate({ messages: [{ role: "user", content: "hi" }] });

    expect(result.text).toBe("ok");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should reject responses without choices", async () => {
    stubFetch().mockResolvedValueOnce(jsonResponse({ choices: [] }));

    await expect(
      makeProvider().generate({ messages: [{ role: "user", content: "hi" }] })
    ).rejects.toMatchObject({ status: 502 });
  });
});
