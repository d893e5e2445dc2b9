/**
 * CSV ingestion: turns the financial statements export into a single SQLite
 * table whose columns are the normalized CSV headers.
 */

import Database from "better-sqlite3";
import csv from "csv-parser";
import { createReadStream, existsSync } from "fs";
import { basename, dirname, extname } from "path";
import { ensureDir } from "../utils/file.js";
import { quoteIdentifier } from "../store/finance-store.js";
import { createLogger } from "../infra/logger.js";

const log = createLogger("loader");

export type ColumnAffinity = "INTEGER" | "REAL" | "TEXT";

export interface LoadOptions {
  csvPath: string;
  dbPath: string;
  // Defaults to the normalized CSV file name
  tableName?: string;
  // Drop and reload an existing table
  replace?: boolean;
}

export interface LoadResult {
  tableName: string;
  skipped: boolean;
  rowCount: number;
  columns: Array<{ name: string; affinity: ColumnAffinity }>;
}

export class DataLoadError extends Error {
  public readonly csvPath: string;

  constructor(message: string, csvPath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataLoadError";
    this.csvPath = csvPath;
  }
}

/**
 * Normalize a CSV header into a SQL-friendly column name:
 * "Market Cap(in B USD)" -> "Market_Capin_B_USD".
 */
export function normalizeColumnName(header: string): string {
  return header
    .replace(/^\uFEFF/, "")
    .trim()
    .replace(/ /g, "_")
    .replace(/[()]/g, "")
    .replace(/\//g, "_");
}

export function defaultTableName(csvPath: string): string {
  return normalizeColumnName(basename(csvPath, extname(csvPath)));
}

/**
 * Empty names become column_<n>; repeats get a numeric suffix.
 */
export function uniqueColumnNames(headers: string[]): string[] {
  const used = new Set<string>();
  return headers.map((header, i) => {
    const base = normalizeColumnName(header) || `column_${i + 1}`;
    let name = base;
    for (let n = 2; used.has(name.toLowerCase()); n++) {
      name = `${base}_${n}`;
    }
    used.add(name.toLowerCase());
    return name;
  });
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
// Plain decimal notation only; hex, octal and binary literals stay text
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function inferAffinity(values: string[]): ColumnAffinity {
  const present = values.map((v) => v.trim()).filter((v) => v !== "");
  if (present.length === 0) return "TEXT";
  if (present.every((v) => INTEGER_PATTERN.test(v) && Number.isSafeInteger(Number(v)))) {
    return "INTEGER";
  }
  if (present.every((v) => REAL_PATTERN.test(v) && Number.isFinite(Number(v)))) return "REAL";
  return "TEXT";
}

function toSqlValue(raw: string | undefined, affinity: ColumnAffinity): string | number | null {
  const value = raw?.trim() ?? "";
  if (value === "") return null;
  return affinity === "TEXT" ? value : Number(value);
}

interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

function readCsv(csvPath: string): Promise<ParsedCsv> {
  return new Promise((resolve, reject) => {
    // Rows are keyed by position so repeated header names cannot collide
    const headers: string[] = [];
    const rows: string[][] = [];

    createReadStream(csvPath)
      .on("error", reject)
      .pipe(
        csv({
          mapHeaders: ({ header, index }) => {
            headers[index] = header;
            return `c${index}`;
          },
        })
      )
      .on("data", (row: Record<string, string | undefined>) => {
        rows.push(headers.map((_, i) => row[`c${i}`] ?? ""));
      })
      .on("error", reject)
      .on("end", () => resolve({ headers, rows }));
  });
}

/**
 * Load the CSV into the database. Skips the load when the table is already
 * present unless `replace` is set.
 */
export async function loadCsvIntoStore(options: LoadOptions): Promise<LoadResult> {
  const { csvPath, dbPath, replace = false } = options;
  const tableName = options.tableName ?? defaultTableName(csvPath);

  ensureDir(dirname(dbPath));
  const db = new Database(dbPath);
  try {
    const exists =
      db.prepare(`SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?`).get(tableName) !==
      undefined;

    if (exists && !replace) {
      const rowCount = Number(
        db.prepare(`SELECT COUNT(*) FROM ${quoteIdentifier(tableName)}`).pluck().get()
      );
      log.info("Table %s already present in %s (%d rows), skipping load", tableName, dbPath, rowCount);
      return { tableName, skipped: true, rowCount, columns: [] };
    }

    if (!existsSync(csvPath)) {
      throw new DataLoadError(`Data file not found: ${csvPath}`, csvPath);
    }

    let parsed: ParsedCsv;
    try {
      parsed = await readCsv(csvPath);
    } catch (err) {
      throw new DataLoadError(`Failed to read ${csvPath}`, csvPath, { cause: err });
    }
    if (parsed.headers.length === 0) {
      throw new DataLoadError(`Data file has no header row: ${csvPath}`, csvPath);
    }

    const names = uniqueColumnNames(parsed.headers);
    const columns = names.map((name, i) => ({
      name,
      affinity: inferAffinity(parsed.rows.map((row) => row[i] ?? "")),
    }));

    const table = quoteIdentifier(tableName);
    const columnDefs = columns.map((c) => `${quoteIdentifier(c.name)} ${c.affinity}`).join(", ");
    const insert = `INSERT INTO ${table} VALUES (${columns.map(() => "?").join(", ")})`;

    const load = db.transaction((rows: string[][]) => {
      db.exec(`DROP TABLE IF EXISTS ${table}`);
      db.exec(`CREATE TABLE ${table} (${columnDefs})`);
      const stmt = db.prepare(insert);
      for (const row of rows) {
        stmt.run(columns.map((c, i) => toSqlValue(row[i], c.affinity)));
      }
    });
    load(parsed.rows);

    log.info(
      "Loaded %d row(s) into %s (%s)",
      parsed.rows.length,
      tableName,
      columns.map((c) => c.name).join(", ")
    );
    return { tableName, skipped: false, rowCount: parsed.rows.length, columns };
  } finally {
    db.close();
  }
}
