import { SQL_LOG_PREVIEW_CHARS } from "@/config/constants";

export type AstRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is AstRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Shortened statement text for log lines */
export function previewSql(sql: string): string {
  const flat = sql.replace(/\s+/g, " ").trim();
  return flat.length > SQL_LOG_PREVIEW_CHARS
    ? flat.substring(0, SQL_LOG_PREVIEW_CHARS) + "..."
    : flat;
}
