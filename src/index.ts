// Public API exports
export { createCrew, Crew, type CrewInputs, type CrewOutput, type StageOutput } from "./agents/crew.js";
export { runAgentTask, AgentRunError, MalformedToolCallError } from "./agents/agent-runner.js";
export { ToolExecutor, type ToolCall, type ToolResult } from "./agents/tool-executor.js";
export { PIPELINE_TASKS, type TaskDefinition } from "./agents/pipeline.js";
export { loadCrewConfig, loadSettings, ConfigError, type AppSettings } from "./config/config.js";
export type { AgentDefinition, CrewConfig, PipelineLimits, ToolName } from "./config/schema.js";
export { loadCsvIntoStore, DataLoadError, type LoadResult } from "./data/loader.js";
export { FinanceStore, type QueryResult } from "./store/finance-store.js";
export { OpenAICompatProvider } from "./ai/providers/openai-compat.js";
export { ProviderError, type ModelProvider, type GenerateOptions, type GenerateResult } from "./ai/provider.js";
export { runBoot, type AppContext } from "./gateway/boot.js";
export { createApp, startServer } from "./web/server.js";
