/**
 * Model provider contract shared by the agent loop and the concrete clients.
 *
 * Tool call arguments are handed back exactly as the model produced them; the
 * agent loop decides what to do with arguments that do not parse.
 */

import type { ToolDeclaration } from "./tools.js";

export interface ToolCallRequest {
  id: string;
  name: string;
  // Raw JSON text from the model
  arguments: string;
}

export type ChatMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls?: ToolCallRequest[] }
  | { role: "tool"; toolCallId: string; name: string; content: string };

export interface GenerateOptions {
  model?: string;
  systemPrompt?: string;
  messages: ChatMessage[];
  tools?: ToolDeclaration[];
  temperature?: number;
  maxTokens?: number;
}

export interface GenerateResult {
  text: string;
  toolCalls: ToolCallRequest[];
  inputTokens: number;
  outputTokens: number;
}

export interface ModelProvider {
  readonly id: string;
  generate(opts: GenerateOptions): Promise<GenerateResult>;
}

/**
 * Non-OK response from a model API. `code` carries the provider's own error
 * code when the body had one (e.g. "tool_use_failed").
 */
export class ProviderError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly headers: Record<string, string>;

  constructor(
    message: string,
    status: number,
    options: { code?: string; headers?: Record<string, string> } = {}
  ) {
    super(message);
    this.name = "ProviderError";
    this.status = status;
    this.code = options.code;
    this.headers = options.headers ?? {};
  }
}
