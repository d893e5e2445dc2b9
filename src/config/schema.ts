import AjvModule, { type ErrorObject } from "ajv";

const Ajv = AjvModule.default;

export const TOOL_NAMES = ["list_tables", "tables_schema", "execute_sql", "check_sql"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface AgentDefinition {
  name: string;
  role: string;
  goal: string;
  backstory: string;
  tools: ToolName[];
  allow_delegation: boolean;
  verbose: boolean;
}

export interface PipelineLimits {
  // Model calls per stage before the stage gives up
  max_iterations: number;
  max_malformed_tool_calls: number;
  max_result_rows: number;
}

export interface CrewConfig {
  agents: AgentDefinition[];
  limits: PipelineLimits;
}

export const DEFAULT_LIMITS: PipelineLimits = {
  max_iterations: 10,
  max_malformed_tool_calls: 3,
  max_result_rows: 200,
};

const nonEmptyString = { type: "string", pattern: "\\S" };

const crewConfigSchema = {
  type: "object",
  required: ["agents"],
  properties: {
    agents: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["name", "role", "goal", "backstory"],
        properties: {
          name: nonEmptyString,
          role: nonEmptyString,
          goal: nonEmptyString,
          backstory: nonEmptyString,
          tools: {
            type: "array",
            items: { type: "string", enum: [...TOOL_NAMES] },
            default: [],
          },
          allow_delegation: { type: "boolean", default: false },
          verbose: { type: "boolean", default: true },
        },
        additionalProperties: false,
      },
    },
    limits: {
      type: "object",
      properties: {
        max_iterations: { type: "integer", minimum: 1, default: DEFAULT_LIMITS.max_iterations },
        max_malformed_tool_calls: {
          type: "integer",
          minimum: 0,
          default: DEFAULT_LIMITS.max_malformed_tool_calls,
        },
        max_result_rows: { type: "integer", minimum: 1, default: DEFAULT_LIMITS.max_result_rows },
      },
      additionalProperties: false,
      default: {},
    },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, useDefaults: true });
export const validateCrewConfig = ajv.compile<CrewConfig>(crewConfigSchema);

export interface ConfigViolation {
  path: string;
  message: string;
}

/**
 * Flatten ajv errors into field-addressed violations. A missing property is
 * reported at the path of the property itself rather than its parent.
 */
export function toViolations(errors: ErrorObject[] | null | undefined): ConfigViolation[] {
  return (errors ?? []).map((err) => {
    const missing = err.keyword === "required" ? String(err.params.missingProperty) : undefined;
    const extra =
      err.keyword === "additionalProperties" ? String(err.params.additionalProperty) : undefined;
    const field = missing ?? extra;
    const path = field ? `${err.instancePath}/${field}` : err.instancePath || "/";
    const message =
      err.keyword === "pattern" ? "must not be empty" : err.message ?? "is invalid";
    return { path, message };
  });
}
