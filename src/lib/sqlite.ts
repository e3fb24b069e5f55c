import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { getConfig } from "@/config/index";
import { describeError, isRecord, previewSql } from "@/lib/helpers";
import { rewriteSql, type RewriteContext } from "@/lib/sql/rewrite";

let db: Database.Database | null = null;

/**
 * Get or create the shared SQLite database connection
 */
export function getDatabase(): Database.Database {
  if (!db) {
    const configured = getConfig().SQLITE_DB_PATH;
    const dbPath =
      configured === ":memory:" ? configured : path.resolve(process.cwd(), configured);
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    console.log(`[SQLite] Connecting to database at: ${dbPath}`);
    db = new Database(dbPath);
    db.pragma("foreign_keys = ON");
  }
  return db;
}

export interface QueryResult {
  sql: string; // the statement actually executed
  rewritten: boolean; // whether it went through the rewriter
  rows: Record<string, unknown>[];
  columns: string[];
  rowCount: number;
  executionTime: number;
}

export interface ExecuteOptions {
  // star schema rewriting applied before execution when REWRITE_ENABLED
  rewrite?: RewriteContext;
  database?: Database.Database;
}

/**
 * Execute SQL and return results. Rewrite failures propagate unchanged;
 * driver failures are reported as SQLite errors.
 */
export async function executeSQL(
  sql: string,
  options: ExecuteOptions = {}
): Promise<QueryResult> {
  const rewriteCtx = getConfig().REWRITE_ENABLED ? options.rewrite : undefined;
  const finalSql = rewriteCtx ? rewriteSql(sql, rewriteCtx) : sql;
  const rewritten = rewriteCtx !== undefined;

  const startTime = Date.now();
  console.log(`[SQLite] Executing query: ${previewSql(finalSql)}`);

  try {
    const conn = options.database ?? getDatabase();
    const stmt = conn.prepare(finalSql);

    if (stmt.reader) {
      const rows = stmt.all().filter(isRecord);
      const columns = stmt.columns().map((c) => c.name);

      const executionTime = Date.now() - startTime;
      console.log(
        `[SQLite] Query completed in ${executionTime}ms, returned ${rows.length} rows`
      );

      return {
        sql: finalSql,
        rewritten,
        rows,
        columns,
        rowCount: rows.length,
        executionTime,
      };
    }

    // For INSERT, UPDATE, DELETE, etc.
    const result = stmt.run();
    const executionTime = Date.now() - startTime;
    console.log(
      `[SQLite] Query completed in ${executionTime}ms, affected ${result.changes} rows`
    );

    return {
      sql: finalSql,
      rewritten,
      rows: [],
      columns: [],
      rowCount: result.changes,
      executionTime,
    };
  } catch (error) {
    const executionTime = Date.now() - startTime;
    const message = describeError(error);
    console.error(`[SQLite] Query failed after ${executionTime}ms:`, message);
    throw new Error(`SQLite Error: ${message}`, { cause: error });
  }
}

/**
 * Test database connection
 */
export function testConnection(): boolean {
  try {
    const row = getDatabase().prepare("SELECT 1 AS test").get();
    return isRecord(row) && row.test === 1;
  } catch (error) {
    console.error("[SQLite] Connection test failed:", describeError(error));
    return false;
  }
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (db) {
    console.log("[SQLite] Closing database connection");
    db.close();
    db = null;
  }
}
