import { resolve } from "path";
import { existsSync } from "fs";
import { readYAML } from "../utils/file.js";
import {
  DEFAULT_LIMITS,
  toViolations,
  validateCrewConfig,
  type ConfigViolation,
  type CrewConfig,
} from "./schema.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("config");

/**
 * Error thrown when the crew configuration or process settings are unusable.
 */
export class ConfigError extends Error {
  public readonly violations: ConfigViolation[];

  constructor(summary: string, violations: ConfigViolation[] = []) {
    super(
      violations.length > 0
        ? `${summary}:\n${violations.map((v) => `  - ${v.path}: ${v.message}`).join("\n")}`
        : summary
    );
    this.name = "ConfigError";
    this.violations = violations;
  }
}

export function loadCrewConfig(configPath: string): CrewConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = readYAML(configPath);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file is not valid YAML (${configPath}): ${reason}`);
  }
  if (raw === null || raw === undefined) {
    throw new ConfigError(`Configuration file is empty: ${configPath}`);
  }

  if (!validateCrewConfig(raw)) {
    throw new ConfigError(
      `Invalid configuration in ${configPath}`,
      toViolations(validateCrewConfig.errors)
    );
  }

  const duplicates = findDuplicateNames(raw);
  if (duplicates.length > 0) {
    throw new ConfigError(`Invalid configuration in ${configPath}`, duplicates);
  }

  const config: CrewConfig = {
    agents: raw.agents.map((agent) => ({ ...agent, backstory: agent.backstory.trim() })),
    limits: { ...DEFAULT_LIMITS, ...raw.limits },
  };
  log.info("Loaded %d agent definition(s) from %s", config.agents.length, configPath);
  return config;
}

function findDuplicateNames(config: CrewConfig): ConfigViolation[] {
  const seen = new Set<string>();
  const violations: ConfigViolation[] = [];
  config.agents.forEach((agent, i) => {
    if (seen.has(agent.name)) {
      violations.push({ path: `/agents/${i}/name`, message: `duplicate agent name "${agent.name}"` });
    }
    seen.add(agent.name);
  });
  return violations;
}

// ─── Process settings ───────────────────────────────────────

export interface AppSettings {
  rootDir: string;
  apiKey?: string;
  model: string;
  baseUrl: string;
  temperature: number;
  port: number;
  csvPath: string;
  dbPath: string;
  tableName?: string;
  configPath: string;
}

export const API_KEY_ENV = "GROQ_API_KEY";

export function loadSettings(
  env: NodeJS.ProcessEnv,
  rootDir: string
): AppSettings {
  const violations: ConfigViolation[] = [];

  const port = parseNumber(env.PORT, 5000);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    violations.push({ path: "PORT", message: `must be a port number, got "${env.PORT}"` });
  }
  const temperature = parseNumber(env.LLM_TEMPERATURE, 0.2);
  if (Number.isNaN(temperature) || temperature < 0 || temperature > 2) {
    violations.push({
      path: "LLM_TEMPERATURE",
      message: `must be a number between 0 and 2, got "${env.LLM_TEMPERATURE}"`,
    });
  }
  if (violations.length > 0) {
    throw new ConfigError("Invalid environment settings", violations);
  }

  return {
    rootDir,
    apiKey: env[API_KEY_ENV] || undefined,
    model: env.LLM_MODEL || "llama-3.3-70b-versatile",
    baseUrl: (env.LLM_BASE_URL || "https://api.groq.com/openai/v1").replace(/\/+$/, ""),
    temperature,
    port,
    csvPath: resolve(rootDir, env.DATA_CSV || "data/Financial Statements.csv"),
    dbPath: resolve(rootDir, env.DATABASE_PATH || "finance.db"),
    tableName: env.DATA_TABLE || undefined,
    configPath: resolve(rootDir, env.CREW_CONFIG || "config.yaml"),
  };
}

export function requireApiKey(settings: AppSettings): string {
  if (!settings.apiKey) {
    throw new ConfigError(
      `${API_KEY_ENV} environment variable not set. Create a .env file and add it.`
    );
  }
  return settings.apiKey;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return Number(value);
}
