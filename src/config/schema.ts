import { z } from "zod";
import {
  DEFAULT_SQL_DIALECT,
  DEFAULT_SQLITE_DB_PATH,
  DEFAULT_STAR_SCHEMA_DIR,
} from "@/config/constants";

export const sqlDialectSchema = z.enum([
  "mysql",
  "mariadb",
  "postgresql",
  "sqlite",
  "bigquery",
  "snowflake",
  "redshift",
  "hive",
  "transactsql",
]);

export type SqlDialect = z.infer<typeof sqlDialectSchema>;

/**
 * Complete environment variable schema for the rewriter
 * Single source of truth for all configuration
 */
export const configSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Parser / printer
  SQL_DIALECT: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(sqlDialectSchema)
    .default(DEFAULT_SQL_DIALECT),

  // Star schema definitions
  STAR_SCHEMA_DIR: z.string().min(1).default(DEFAULT_STAR_SCHEMA_DIR),

  // SQLite execution
  SQLITE_DB_PATH: z.string().min(1).default(DEFAULT_SQLITE_DB_PATH),

  // Runtime Flags
  REWRITE_ENABLED: z
    .string()
    .transform((v) => v === "true")
    .default(true),
  LOG_REWRITTEN_SQL: z
    .string()
    .transform((v) => v === "true")
    .default(false),
});

export type Config = z.infer<typeof configSchema>;
