import Database from "better-sqlite3";
import { createLogger } from "../infra/logger.js";

const log = createLogger("finance-store");

export type CellValue = string | number | bigint | Buffer | null;

export interface QueryResult {
  columns: string[];
  rows: CellValue[][];
  // More rows were available than maxRows allowed
  truncated: boolean;
}

export interface TableInfo {
  name: string;
  createSql: string;
  columns: Array<{ name: string; type: string }>;
}

/**
 * SQLite access for the agent tools. Opened read-only at boot and shared by
 * every request; the loader is the only writer and runs before this opens.
 */
export class FinanceStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath, { readonly: true, fileMustExist: true });
    log.debug("Opened %s read-only", dbPath);
  }

  listTables(): string[] {
    const rows = this.db
      .prepare(
        `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
      )
      .pluck()
      .all();
    return rows.filter((name): name is string => typeof name === "string");
  }

  hasTable(name: string): boolean {
    return this.describeTable(name) !== null;
  }

  /**
   * Table names match case-insensitively, as they do in SQL; the returned
   * name is the one stored in the schema.
   */
  describeTable(name: string): TableInfo | null {
    const row = this.db
      .prepare(`SELECT name, sql FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE`)
      .get(name);
    if (!isSchemaRow(row)) return null;

    const columns = this.db
      .prepare(`SELECT name, type FROM pragma_table_info(?)`)
      .all(row.name)
      .flatMap((col) => (isColumnRow(col) ? [{ name: col.name, type: col.type }] : []));
    return { name: row.name, createSql: row.sql, columns };
  }

  sampleRows(name: string, limit: number): QueryResult {
    return this.query(`SELECT * FROM ${quoteIdentifier(name)} LIMIT ${Math.max(0, Math.floor(limit))}`);
  }

  /**
   * Run a read query. Throws on syntax errors, unknown objects and any
   * statement that would write.
   */
  query(sql: string, maxRows?: number): QueryResult {
    const stmt = this.prepareRead(sql);
    const columns = stmt.columns().map((c) => c.name);
    const rows: CellValue[][] = [];
    let truncated = false;
    for (const row of stmt.raw().iterate()) {
      if (maxRows !== undefined && rows.length >= maxRows) {
        truncated = true;
        break;
      }
      rows.push(Array.isArray(row) ? row.map(toCell) : []);
    }
    return { columns, rows, truncated };
  }

  /**
   * Compile a statement without running it.
   */
  check(sql: string): void {
    this.prepareRead(sql);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private prepareRead(sql: string): Database.Statement {
    const stmt = this.db.prepare(sql);
    // A write with RETURNING also yields rows, so both flags are needed
    if (!stmt.reader || !stmt.readonly) {
      throw new Error("only read-only queries (SELECT) are allowed");
    }
    return stmt;
  }
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function isSchemaRow(row: unknown): row is { name: string; sql: string } {
  return (
    typeof row === "object" &&
    row !== null &&
    "name" in row &&
    "sql" in row &&
    typeof row.name === "string" &&
    typeof row.sql === "string"
  );
}

function isColumnRow(row: unknown): row is { name: string; type: string } {
  return (
    typeof row === "object" &&
    row !== null &&
    "name" in row &&
    "type" in row &&
    typeof row.name === "string" &&
    typeof row.type === "string"
  );
}

function toCell(value: unknown): CellValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  return String(value);
}
