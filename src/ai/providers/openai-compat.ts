/**
 * OpenAI-compatible provider.
 *
 * Connects to any API that implements the OpenAI chat completions format
 * with function calling: Groq (the default), OpenAI, Together AI, vLLM, etc.
 */

import { z } from "zod";
import {
  ProviderError,
  type ChatMessage,
  type GenerateOptions,
  type GenerateResult,
  type ModelProvider,
} from "../provider.js";
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from "../retry.js";
import { createLogger } from "../../infra/logger.js";

const log = createLogger("openai-compat");

export interface OpenAICompatConfig {
  baseUrl: string;
  apiKey: string;
  defaultModel: string;
  temperature?: number;
  maxTokens?: number;
  retry?: RetryConfig;
}

// ─── OpenAI API Types ───────────────────────────────────────

const responseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string(),
                  function: z.object({
                    name: z.string(),
                    arguments: z.string().nullish(),
                  }),
                })
              )
              .nullish(),
          })
          .nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .nullish(),
});

const errorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.string().nullish(),
  }),
});

type WireMessage =
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
  | { role: "tool"; tool_call_id: string; name: string; content: string };

export class OpenAICompatProvider implements ModelProvider {
  readonly id = "openai-compat";

  private config: OpenAICompatConfig;

  constructor(config: OpenAICompatConfig) {
    this.config = config;
  }

  async generate(opts: GenerateOptions): Promise<GenerateResult> {
    const body: Record<string, unknown> = {
      model: opts.model || this.config.defaultModel,
      messages: this.buildMessages(opts),
      temperature: opts.temperature ?? this.config.temperature ?? 0.2,
      max_tokens: opts.maxTokens ?? this.config.maxTokens ?? 4096,
    };

    if (opts.tools && opts.tools.length > 0) {
      body.tools = opts.tools.map((t) => ({
        type: "function",
        function: {
          name: t.name,
          description: t.description,
          parameters: t.parameters,
        },
      }));
      body.tool_choice = "auto";
    }

    const json = await withRetry(
      () => this.post(body),
      this.config.retry ?? DEFAULT_RETRY_CONFIG
    );

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(
        `OpenAI-compat returned an unexpected response: ${parsed.error.message}`,
        502
      );
    }

    const message = parsed.data.choices[0].message;
    return {
      text: message?.content ?? "",
      toolCalls: (message?.tool_calls ?? []).map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments ?? "",
      })),
      inputTokens: parsed.data.usage?.prompt_tokens ?? 0,
      outputTokens: parsed.data.usage?.completion_tokens ?? 0,
    };
  }

  private async post(body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const text = await res.text();
      const errorBody = safeParseJson(text);
      const parsedError = errorBodySchema.safeParse(errorBody);
      const code = parsedError.success ? parsedError.data.error.code ?? undefined : undefined;
      const detail = parsedError.success ? parsedError.data.error.message ?? text : text;
      log.debug("Chat completion failed: %d %s", res.status, detail);
      throw new ProviderError(`OpenAI-compat error: ${res.status} ${detail}`, res.status, {
        code,
        headers: Object.fromEntries(res.headers.entries()),
      });
    }

    return res.json();
  }

  private buildMessages(opts: GenerateOptions): WireMessage[] {
    const messages: WireMessage[] = [];

    if (opts.systemPrompt) {
      messages.push({ role: "system", content: opts.systemPrompt });
    }

    for (const msg of opts.messages) {
      messages.push(toWireMessage(msg));
    }

    return messages;
  }
}

function toWireMessage(msg: ChatMessage): WireMessage {
  switch (msg.role) {
    case "user":
      return { role: "user", content: msg.content };
    case "assistant":
      return msg.toolCalls && msg.toolCalls.length > 0
        ? {
            role: "assistant",
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function",
              function: { name: tc.name, arguments: tc.arguments },
            })),
          }
        : { role: "assistant", content: msg.content };
    case "tool":
      return { role: "tool", tool_call_id: msg.toolCallId, name: msg.name, content: msg.content };
  }
}

function safeParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
