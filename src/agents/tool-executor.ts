import { z } from "zod";
import type { FinanceStore, QueryResult, CellValue } from "../store/finance-store.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("tool-executor");

export interface ToolCall {
  name: string;
  args: Record<string, unknown>;
}

export interface ToolResult {
  success: boolean;
  output: string;
  error?: string;
  // The call never ran because its arguments were unusable
  rejected?: boolean;
}

const SAMPLE_ROWS = 3;

const tablesSchemaArgs = z.object({ tables: z.string().trim().min(1) });
const sqlArgs = z.object({ sql_query: z.string().trim().min(1) });

/**
 * Executes the SQL tools against the shared read-only store. Every outcome,
 * including SQL errors, comes back as text for the agent.
 */
export class ToolExecutor {
  private store: FinanceStore;
  private maxRows: number;

  constructor(store: FinanceStore, options: { maxRows?: number } = {}) {
    this.store = store;
    this.maxRows = options.maxRows ?? 200;
  }

  async execute(tool: ToolCall): Promise<ToolResult> {
    log.debug("Executing tool: %s", tool.name);

    try {
      switch (tool.name) {
        case "list_tables":
          return this.executeListTables();
        case "tables_schema":
          return this.executeTablesSchema(tool.args);
        case "execute_sql":
          return this.executeSql(tool.args);
        case "check_sql":
          return this.executeCheckSql(tool.args);
        default:
          return { success: false, output: "", error: `Unknown tool: ${tool.name}`, rejected: true };
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.error({ err }, "Tool execution failed: %s", tool.name);
      return { success: false, output: "", error: msg };
    }
  }

  private executeListTables(): ToolResult {
    return { success: true, output: this.store.listTables().join(", ") };
  }

  private executeTablesSchema(args: Record<string, unknown>): ToolResult {
    const parsed = tablesSchemaArgs.safeParse(args);
    if (!parsed.success) return invalidArguments("tables_schema", parsed.error);

    const requested = parsed.data.tables
      .split(",")
      .map((t) => t.trim().replace(/^["'`[]|["'`\]]$/g, ""))
      .filter(Boolean);
    const missing = requested.filter((name) => !this.store.hasTable(name));
    if (missing.length > 0) {
      const available = this.store.listTables();
      return {
        success: false,
        output: "",
        error: `table(s) not found in database: ${missing.join(", ")}. Available tables: ${
          available.length > 0 ? available.join(", ") : "(none)"
        }`,
      };
    }

    const sections = requested.flatMap((requestedName) => {
      const info = this.store.describeTable(requestedName);
      if (!info) return [];
      const sample = this.store.sampleRows(info.name, SAMPLE_ROWS);
      return [
        info.createSql,
        "",
        "/*",
        `${sample.rows.length} rows from ${info.name} table:`,
        sample.columns.join("\t"),
        ...sample.rows.map((row) => row.map(formatCell).join("\t")),
        "*/",
      ].join("\n");
    });
    return { success: true, output: sections.join("\n\n") };
  }

  private executeSql(args: Record<string, unknown>): ToolResult {
    const parsed = sqlArgs.safeParse(args);
    if (!parsed.success) return invalidArguments("execute_sql", parsed.error);

    try {
      const result = this.store.query(parsed.data.sql_query, this.maxRows);
      return { success: true, output: formatQueryResult(result, this.maxRows) };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      log.debug("SQL error: %s", msg);
      return { success: false, output: "", error: msg };
    }
  }

  private executeCheckSql(args: Record<string, unknown>): ToolResult {
    const parsed = sqlArgs.safeParse(args);
    if (!parsed.success) return invalidArguments("check_sql", parsed.error);

    try {
      this.store.check(parsed.data.sql_query);
      return { success: true, output: "OK: the query is valid." };
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      return { success: false, output: "", error: msg };
    }
  }
}

export function formatQueryResult(result: QueryResult, maxRows: number): string {
  if (result.rows.length === 0) return "Query returned no rows.";
  const lines = [
    result.columns.join(" | "),
    ...result.rows.map((row) => row.map(formatCell).join(" | ")),
  ];
  if (result.truncated) {
    lines.push(`(showing first ${maxRows} rows; add a LIMIT or aggregate to narrow the result)`);
  }
  return lines.join("\n");
}

function formatCell(value: CellValue): string {
  if (value === null) return "NULL";
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  return String(value);
}

export function invalidArguments(tool: string, error: z.ZodError): ToolResult {
  const detail = error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; ");
  return {
    success: false,
    output: "",
    error: `Invalid arguments for ${tool}: ${detail}`,
    rejected: true,
  };
}
