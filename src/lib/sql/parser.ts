// Boundary with node-sql-parser: text -> tree -> text

import pkg from "node-sql-parser";
import type { AST } from "node-sql-parser";
import { PARSER_DATABASE } from "@/config/constants";
import type { SqlDialect } from "@/config/schema";
import { InternalConstructionError, ParseError } from "@/lib/errors";
import { describeError, isRecord, type AstRecord } from "@/lib/helpers";

const { Parser } = pkg;

// Parser holds no per-statement state we rely on; share one instance
const SQL_PARSER = new Parser();

export type QueryTree = AST | AST[];

function parserOptions(dialect: SqlDialect) {
  return { database: PARSER_DATABASE[dialect] };
}

export function parseSql(sql: string, dialect: SqlDialect): QueryTree {
  try {
    return SQL_PARSER.astify(sql, parserOptions(dialect));
  } catch (error) {
    throw new ParseError(sql, error);
  }
}

export function serializeSql(tree: QueryTree, dialect: SqlDialect): string {
  return SQL_PARSER.sqlify(tree, parserOptions(dialect));
}

/**
 * Parse a FROM term (`t AS a`, `(SELECT ...) AS a`) by wrapping it in
 * `SELECT * FROM`, and return that statement's single FROM entry.
 */
export function parseFromFragment(fragment: string, dialect: SqlDialect): AstRecord {
  let tree: QueryTree;
  try {
    tree = SQL_PARSER.astify(`SELECT * FROM ${fragment}`, parserOptions(dialect));
  } catch (error) {
    throw new InternalConstructionError(fragment, describeError(error), error);
  }

  const stmt: unknown = Array.isArray(tree) ? (tree.length === 1 ? tree[0] : null) : tree;
  if (!isRecord(stmt) || stmt.type !== "select") {
    throw new InternalConstructionError(fragment, "expected a single SELECT statement");
  }

  const from = stmt.from;
  if (!Array.isArray(from) || from.length !== 1) {
    throw new InternalConstructionError(fragment, "expected exactly one FROM term");
  }

  const entry: unknown = from[0];
  if (!isRecord(entry)) {
    throw new InternalConstructionError(fragment, "FROM term is not a table reference");
  }
  return entry;
}
