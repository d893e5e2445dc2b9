/**
 * The financial-analysis crew.
 *
 * Binds the pipeline stages to the configured agents and runs them in order
 * for one question. Every run gets its own id so its log lines can be
 * followed through the three stages.
 */

import { nanoid } from "nanoid";
import { z } from "zod";
import type { Logger } from "pino";
import type { AgentDefinition, CrewConfig } from "../config/schema.js";
import { ConfigError } from "../config/config.js";
import type { ModelProvider } from "../ai/provider.js";
import { ASK_COWORKER_TOOL, SQL_TOOLS, type ToolDeclaration } from "../ai/tools.js";
import type { FinanceStore } from "../store/finance-store.js";
import { ToolExecutor, invalidArguments, type ToolResult } from "./tool-executor.js";
import { runAgentTask, type AgentTaskResult, type ToolHandler } from "./agent-runner.js";
import { PIPELINE_AGENTS, PIPELINE_TASKS, type StageId } from "./pipeline.js";
import { buildCoworkerPrompt, buildPersonaPrompt, buildTaskPrompt, interpolate } from "./prompts.js";
import { stripCodeFence, truncate } from "../utils/text.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("crew");

export type CrewInputs = { query: string };

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface StageOutput {
  id: StageId;
  agent: string;
  output: string;
  iterations: number;
  toolCalls: number;
}

export interface CrewOutput {
  runId: string;
  report: string;
  tasks: StageOutput[];
  usage: TokenUsage;
  durationMs: number;
}

export interface CrewOptions {
  config: CrewConfig;
  provider: ModelProvider;
  store: FinanceStore;
  model?: string;
  temperature?: number;
}

const askCoworkerArgs = z.object({
  coworker: z.string().trim().min(1),
  question: z.string().trim().min(1),
  context: z.string().optional(),
});

export class Crew {
  private agents = new Map<string, AgentDefinition>();
  private provider: ModelProvider;
  private executor: ToolExecutor;
  private config: CrewConfig;
  private model?: string;
  private temperature?: number;

  constructor(options: CrewOptions) {
    for (const agent of options.config.agents) {
      this.agents.set(agent.name, agent);
    }
    const missing = PIPELINE_AGENTS.filter((name) => !this.agents.has(name));
    if (missing.length > 0) {
      throw new ConfigError(
        "Crew configuration is missing pipeline agents",
        missing.map((name) => ({ path: "/agents", message: `no agent named "${name}"` }))
      );
    }

    this.config = options.config;
    this.provider = options.provider;
    this.executor = new ToolExecutor(options.store, {
      maxRows: options.config.limits.max_result_rows,
    });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  async kickoff(inputs: CrewInputs): Promise<CrewOutput> {
    const runId = nanoid(10);
    const runLog = log.child({ runId });
    const started = Date.now();
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
    const outputs = new Map<StageId, string>();
    const tasks: StageOutput[] = [];

    runLog.info("Crew run started: %s", truncate(inputs.query, 120));

    for (const task of PIPELINE_TASKS) {
      const agent = this.getAgent(task.agent);
      const prompt = buildTaskPrompt({
        description: interpolate(task.description, inputs),
        expectedOutput: task.expectedOutput,
        context: task.contextFrom ? outputs.get(task.contextFrom) : undefined,
      });

      let result: AgentTaskResult;
      try {
        result = await runAgentTask(
          this.provider,
          {
            agent,
            prompt,
            tools: this.toolsFor(agent),
            executeTool: this.toolHandler(agent, usage, runLog),
          },
          {
            maxIterations: this.config.limits.max_iterations,
            maxMalformedToolCalls: this.config.limits.max_malformed_tool_calls,
            model: this.model,
            temperature: this.temperature,
            logger: runLog,
          }
        );
      } catch (err) {
        runLog.warn("Crew run failed in stage %s (%s)", task.id, agent.name);
        throw err;
      }

      usage.inputTokens += result.usage.inputTokens;
      usage.outputTokens += result.usage.outputTokens;
      outputs.set(task.id, result.output);
      tasks.push({
        id: task.id,
        agent: agent.name,
        output: result.output,
        iterations: result.iterations,
        toolCalls: result.toolCalls.length,
      });

      const level = agent.verbose ? "info" : "debug";
      runLog[level]("Stage %s done: %s", task.id, truncate(result.output.replace(/\s+/g, " "), 200));
    }

    const report = stripCodeFence(outputs.get("report") ?? "");
    const durationMs = Date.now() - started;
    runLog.info(
      { inputTokens: usage.inputTokens, outputTokens: usage.outputTokens },
      "Crew run finished in %dms",
      durationMs
    );
    return { runId, report, tasks, usage, durationMs };
  }

  private getAgent(name: string): AgentDefinition {
    const agent = this.agents.get(name);
    if (!agent) throw new ConfigError(`No agent named "${name}"`);
    return agent;
  }

  private toolsFor(agent: AgentDefinition): ToolDeclaration[] {
    const tools = agent.tools.map((name) => SQL_TOOLS[name]);
    if (agent.allow_delegation && this.agents.size > 1) {
      tools.push(ASK_COWORKER_TOOL);
    }
    return tools;
  }

  private toolHandler(agent: AgentDefinition, usage: TokenUsage, runLog: Logger): ToolHandler {
    return async (call) => {
      if (call.name === ASK_COWORKER_TOOL.name) {
        return this.askCoworker(agent, call.args, usage, runLog);
      }
      return this.executor.execute(call);
    };
  }

  /**
   * Pose a question to another agent. The coworker answers with a single
   * model call and no tools of its own.
   */
  private async askCoworker(
    asker: AgentDefinition,
    args: Record<string, unknown>,
    usage: TokenUsage,
    runLog: Logger
  ): Promise<ToolResult> {
    const parsed = askCoworkerArgs.safeParse(args);
    if (!parsed.success) return invalidArguments(ASK_COWORKER_TOOL.name, parsed.error);

    const { coworker: wanted, question, context } = parsed.data;
    const coworkers = [...this.agents.values()].filter((a) => a.name !== asker.name);
    const needle = wanted.toLowerCase();
    const coworker = coworkers.find(
      (a) => a.name.toLowerCase() === needle || a.role.toLowerCase() === needle
    );
    if (!coworker) {
      return {
        success: false,
        output: "",
        error: `unknown coworker "${wanted}". Coworkers: ${coworkers
          .map((a) => `${a.name} (${a.role})`)
          .join(", ")}`,
      };
    }

    runLog[asker.verbose ? "info" : "debug"]("Agent %s asks %s: %s", asker.name, coworker.name, truncate(question, 120));
    const answer = await this.provider.generate({
      model: this.model,
      temperature: this.temperature,
      systemPrompt: buildPersonaPrompt(coworker, false),
      messages: [{ role: "user", content: buildCoworkerPrompt(question, context) }],
    });
    usage.inputTokens += answer.inputTokens;
    usage.outputTokens += answer.outputTokens;

    const text = answer.text.trim();
    return text
      ? { success: true, output: text }
      : { success: false, output: "", error: `${coworker.name} gave no answer` };
  }
}

export function createCrew(options: CrewOptions): Crew {
  return new Crew(options);
}
