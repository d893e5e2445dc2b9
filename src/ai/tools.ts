// Function declarations for model tool use

import type { ToolName } from "../config/schema.js";

export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: {
    type: "object";
    properties: Record<string, { type: string; description: string }>;
    required?: string[];
  };
}

export const SQL_TOOLS: Record<ToolName, ToolDeclaration> = {
  list_tables: {
    name: "list_tables",
    description: "List the available tables in the database.",
    parameters: {
      type: "object",
      properties: {},
    },
  },
  tables_schema: {
    name: "tables_schema",
    description:
      "Input is a comma-separated list of tables, output is the schema and sample rows for those tables. Call list_tables first to be sure the tables exist.",
    parameters: {
      type: "object",
      properties: {
        tables: { type: "string", description: "Comma-separated table names, e.g. table1, table2" },
      },
      required: ["tables"],
    },
  },
  execute_sql: {
    name: "execute_sql",
    description:
      "Execute a read-only SQL query against the SQLite database and return the result. If the query is not correct an error message is returned; rewrite the query and try again.",
    parameters: {
      type: "object",
      properties: {
        sql_query: { type: "string", description: "A single SQLite SELECT statement" },
      },
      required: ["sql_query"],
    },
  },
  check_sql: {
    name: "check_sql",
    description:
      "Use this tool to double check if your query is correct before executing it. Always call it before execute_sql.",
    parameters: {
      type: "object",
      properties: {
        sql_query: { type: "string", description: "The SQLite query to validate" },
      },
      required: ["sql_query"],
    },
  },
};

export const ASK_COWORKER_TOOL: ToolDeclaration = {
  name: "ask_coworker",
  description:
    "Ask a specific question to one of your coworkers. Give them all the context they need; they know nothing about your task beyond what you send.",
  parameters: {
    type: "object",
    properties: {
      coworker: { type: "string", description: "Name or role of the coworker to ask" },
      question: { type: "string", description: "The question to ask" },
      context: { type: "string", description: "Everything the coworker needs to know to answer" },
    },
    required: ["coworker", "question"],
  },
};
