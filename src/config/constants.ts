/**
 * Operational constants for the star-schema rewriter
 * Defaults here feed the environment schema in schema.ts
 */

// Default values (used in schema.ts)
export const DEFAULT_SQL_DIALECT = "sqlite";
export const DEFAULT_STAR_SCHEMA_DIR = "src/semantic/star_schemas";
export const DEFAULT_SQLITE_DB_PATH = "data/analytics.db";

// Dialect name as node-sql-parser expects it in `database`
export const PARSER_DATABASE = {
  mysql: "MySQL",
  mariadb: "MariaDB",
  postgresql: "PostgresQL",
  sqlite: "Sqlite",
  bigquery: "BigQuery",
  snowflake: "Snowflake",
  redshift: "Redshift",
  hive: "Hive",
  transactsql: "TransactSQL",
} as const;

// Dialects where "name" is an identifier rather than a string literal
export const DOUBLE_QUOTED_IDENTIFIER_DIALECTS: ReadonlySet<string> = new Set([
  "sqlite",
  "postgresql",
  "snowflake",
  "redshift",
]);

// How many characters of a statement go into a log line
export const SQL_LOG_PREVIEW_CHARS = 150;
