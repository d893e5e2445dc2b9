/**
 * Tool-calling loop for a single agent on a single task.
 *
 * The model is called with the agent persona, the task prompt and the tool
 * declarations; tool calls are executed and their results fed back until the
 * model answers in plain text. Two budgets bound the loop: the number of model
 * calls and the number of malformed tool calls.
 */

import type { Logger } from "pino";
import type { AgentDefinition } from "../config/schema.js";
import {
  ProviderError,
  type ChatMessage,
  type GenerateResult,
  type ModelProvider,
  type ToolCallRequest,
} from "../ai/provider.js";
import type { ToolDeclaration } from "../ai/tools.js";
import type { ToolCall, ToolResult } from "./tool-executor.js";
import { buildPersonaPrompt } from "./prompts.js";
import { createLogger } from "../infra/logger.js";

const defaultLog = createLogger("agent-runner");

export type ToolHandler = (call: ToolCall) => Promise<ToolResult>;

export interface AgentRunOptions {
  maxIterations: number;
  maxMalformedToolCalls: number;
  model?: string;
  temperature?: number;
  logger?: Logger;
}

export interface AgentTaskInput {
  agent: AgentDefinition;
  prompt: string;
  tools: ToolDeclaration[];
  executeTool: ToolHandler;
}

export interface ToolCallRecord {
  name: string;
  success: boolean;
}

export interface AgentTaskResult {
  agent: string;
  output: string;
  iterations: number;
  toolCalls: ToolCallRecord[];
  malformedToolCalls: number;
  usage: { inputTokens: number; outputTokens: number };
}

export class AgentRunError extends Error {
  public readonly agent: string;

  constructor(agent: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentRunError";
    this.agent = agent;
  }
}

export class MalformedToolCallError extends AgentRunError {
  public readonly attempts: number;

  constructor(agent: string, attempts: number, lastProblem: string) {
    super(
      agent,
      `Agent "${agent}" made ${attempts} malformed tool call(s); giving up. Last problem: ${lastProblem}`
    );
    this.name = "MalformedToolCallError";
    this.attempts = attempts;
  }
}

const MALFORMED_RETRY_NUDGE =
  "Your last tool call could not be processed. Call the tool again with valid JSON arguments that match its declaration, or give your final answer.";
const EMPTY_ANSWER_NUDGE = "Your reply was empty. Provide your final answer now.";

export async function runAgentTask(
  provider: ModelProvider,
  input: AgentTaskInput,
  options: AgentRunOptions
): Promise<AgentTaskResult> {
  const { agent, prompt, tools, executeTool } = input;
  const log = options.logger ?? defaultLog;
  const level = agent.verbose ? "info" : "debug";

  const systemPrompt = buildPersonaPrompt(agent, tools.length > 0);
  const allowed = new Set(tools.map((t) => t.name));
  const messages: ChatMessage[] = [{ role: "user", content: prompt }];
  const toolCalls: ToolCallRecord[] = [];
  const usage = { inputTokens: 0, outputTokens: 0 };
  let malformed = 0;

  const registerMalformed = (problem: string) => {
    malformed++;
    log.warn("Agent %s: malformed tool call (%d/%d): %s", agent.name, malformed, options.maxMalformedToolCalls, problem);
    if (malformed > options.maxMalformedToolCalls) {
      throw new MalformedToolCallError(agent.name, malformed, problem);
    }
  };

  for (let iteration = 1; iteration <= options.maxIterations; iteration++) {
    log[level]("Agent %s: model call %d", agent.name, iteration);

    let result: GenerateResult;
    try {
      result = await provider.generate({
        model: options.model,
        temperature: options.temperature,
        systemPrompt,
        messages,
        tools: tools.length > 0 ? tools : undefined,
      });
    } catch (err) {
      if (err instanceof ProviderError && err.code === "tool_use_failed") {
        registerMalformed(err.message);
        messages.push({ role: "user", content: MALFORMED_RETRY_NUDGE });
        continue;
      }
      throw err;
    }

    usage.inputTokens += result.inputTokens;
    usage.outputTokens += result.outputTokens;

    if (result.toolCalls.length === 0) {
      const output = result.text.trim();
      if (output) {
        log[level]("Agent %s: final answer after %d model call(s)", agent.name, iteration);
        return {
          agent: agent.name,
          output,
          iterations: iteration,
          toolCalls,
          malformedToolCalls: malformed,
          usage,
        };
      }
      messages.push({ role: "assistant", content: "" }, { role: "user", content: EMPTY_ANSWER_NUDGE });
      continue;
    }

    messages.push({ role: "assistant", content: result.text, toolCalls: result.toolCalls });

    for (const call of result.toolCalls) {
      const content = await runToolCall(call);
      messages.push({ role: "tool", toolCallId: call.id, name: call.name, content });
    }
  }

  throw new AgentRunError(
    agent.name,
    `Agent "${agent.name}" did not produce a final answer within ${options.maxIterations} model call(s)`
  );

  async function runToolCall(call: ToolCallRequest): Promise<string> {
    if (!allowed.has(call.name)) {
      const problem = `unknown tool "${call.name}"`;
      registerMalformed(problem);
      return `Error: ${problem}. Available tools: ${[...allowed].join(", ") || "(none)"}`;
    }

    const args = parseArguments(call.arguments);
    if (args === null) {
      const problem = `arguments for ${call.name} are not a JSON object: ${call.arguments.slice(0, 200)}`;
      registerMalformed(problem);
      return `Error: ${problem}`;
    }

    log[level]({ args }, "Agent %s: calling %s", agent.name, call.name);
    const outcome = await executeTool({ name: call.name, args });
    toolCalls.push({ name: call.name, success: outcome.success });

    if (outcome.rejected) {
      registerMalformed(outcome.error ?? `call to ${call.name} was rejected`);
    }
    log[level]("Agent %s: %s %s", agent.name, call.name, outcome.success ? "OK" : "FAIL");
    return outcome.success ? outcome.output : `Error: ${outcome.error ?? "tool failed"}`;
  }
}

export function parseArguments(raw: string): Record<string, unknown> | null {
  if (raw.trim() === "") return {};
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
