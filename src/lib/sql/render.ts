// SQL text for replacement FROM terms

import type { SqlDialect } from "@/config/schema";
import type { DimensionJoin, RewritePlan } from "./join-types";

/**
 * Quote an identifier for `dialect`. Every identifier is quoted, so names that
 * are also keywords (`order`, `key`) survive the re-parse. Quoted names are
 * case-sensitive where the database folds unquoted ones (Snowflake stores
 * `orders` as `ORDERS`), so register table and key names in their stored case.
 */
export function quoteIdentifier(ident: string, dialect: SqlDialect): string {
  switch (dialect) {
    case "postgresql":
    case "snowflake":
    case "redshift":
      return `"${ident.replace(/"/g, '""')}"`;
    case "transactsql":
      return `[${ident.replace(/]/g, "]]")}]`;
    default:
      return "`" + ident.replace(/`/g, "``") + "`";
  }
}

// <db>.<schema>.<table> identifiers are quoted per segment
export function quoteTableName(name: string, dialect: SqlDialect): string {
  return name
    .split(".")
    .map((part) => quoteIdentifier(part, dialect))
    .join(".");
}

export function renderJoinCondition(
  factTable: string,
  join: DimensionJoin,
  dialect: SqlDialect
): string {
  const key = quoteIdentifier(join.joinKey, dialect);
  const fact = quoteTableName(factTable, dialect);
  const dim = quoteTableName(join.dimension, dialect);
  return `${fact}.${key} = ${dim}.${key}`;
}

/** SELECT * over the fact table and the plan's dimensions, equi-joined on their keys */
export function renderStarSubquery(plan: RewritePlan, dialect: SqlDialect): string {
  if (plan.joins.length === 0) {
    throw new Error(`Plan for "${plan.logicalTable}" has no dimensions to join.`);
  }

  const tables = [plan.factTable, ...plan.joins.map((j) => j.dimension)]
    .map((t) => quoteTableName(t, dialect))
    .join(", ");
  const where = plan.joins
    .map((j) => renderJoinCondition(plan.factTable, j, dialect))
    .join(" AND ");

  return `SELECT * FROM ${tables} WHERE ${where}`;
}

/**
 * The FROM term replacing a logical table: the bare fact table when no
 * dimension is needed, else the star subquery as a derived table.
 */
export function renderFromFragment(
  plan: RewritePlan,
  alias: string | null,
  dialect: SqlDialect
): string {
  const term =
    plan.joins.length === 0
      ? quoteTableName(plan.factTable, dialect)
      : `(${renderStarSubquery(plan, dialect)})`;

  return alias ? `${term} AS ${quoteIdentifier(alias, dialect)}` : term;
}
