// Tagged-variant view over node-sql-parser ASTs and a single-pass visitor walk

import { isRecord, type AstRecord } from "@/lib/helpers";

/** A table named in FROM position (including JOIN terms) */
export interface FromNode {
  kind: "from";
  name: string; // db.table when schema-qualified, else table
  table: string;
  db: string | null;
  alias: string | null;
  raw: AstRecord;
}

export interface ColumnNode {
  kind: "column";
  column: string; // bare name, "*" for wildcards
  qualifier: string | null;
  raw: AstRecord;
}

export interface OtherNode {
  kind: "other";
  raw: AstRecord;
}

export type SqlNode = FromNode | ColumnNode | OtherNode;
export type SqlNodeKind = SqlNode["kind"];
export type NodeOfKind<K extends SqlNodeKind> = Extract<SqlNode, { kind: K }>;

/**
 * Handlers per node kind. A handler may return a replacement record, which is
 * written into the parent slot in place of the visited node; the replacement
 * is not walked.
 */
export type TreeVisitor = {
  [K in SqlNodeKind]?: (node: NodeOfKind<K>) => AstRecord | void;
};

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

// column_ref.column is a plain string in some dialects and
// { expr: { type, value } } in others
function columnName(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (isRecord(value)) {
    const expr = value.expr;
    if (isRecord(expr)) return stringOrNull(expr.value);
  }
  return null;
}

export interface WalkOptions {
  // Read `"name"` as a column reference; node-sql-parser leaves it a
  // double_quote_string in dialects such as SQLite
  doubleQuotedIdentifiers?: boolean;
}

export function classifyNode(
  raw: AstRecord,
  inFromList: boolean,
  options: WalkOptions = {}
): SqlNode {
  const table = raw.table;
  if (inFromList && typeof table === "string") {
    const db = stringOrNull(raw.db);
    return {
      kind: "from",
      name: db ? `${db}.${table}` : table,
      table,
      db,
      alias: stringOrNull(raw.as),
      raw,
    };
  }

  if (raw.type === "column_ref") {
    const column = columnName(raw.column);
    if (column !== null) {
      return { kind: "column", column, qualifier: stringOrNull(raw.table), raw };
    }
  }

  if (options.doubleQuotedIdentifiers && raw.type === "double_quote_string") {
    const column = stringOrNull(raw.value);
    if (column !== null) {
      return { kind: "column", column, qualifier: null, raw };
    }
  }

  return { kind: "other", raw };
}

function dispatch(node: SqlNode, visitor: TreeVisitor): AstRecord | void {
  switch (node.kind) {
    case "from":
      return visitor.from?.(node);
    case "column":
      return visitor.column?.(node);
    default:
      return visitor.other?.(node);
  }
}

function visitValue(
  value: unknown,
  inFromList: boolean,
  visitor: TreeVisitor,
  options: WalkOptions,
  replace: (next: AstRecord) => void
): void {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    items.forEach((item, i) =>
      visitValue(item, inFromList, visitor, options, (next) => {
        items[i] = next;
      })
    );
    return;
  }
  if (!isRecord(value)) return;

  const record = value;
  const node = classifyNode(record, inFromList, options);
  const next = dispatch(node, visitor);
  if (isRecord(next)) {
    replace(next);
    return;
  }
  // a column reference's own parts are not further references
  if (node.kind === "column") return;

  for (const [key, child] of Object.entries(record)) {
    visitValue(child, key === "from", visitor, options, (replacement) => {
      record[key] = replacement;
    });
  }
}

/**
 * Visit every node of the tree once, depth first, including subqueries,
 * joins, CTEs and set-operation branches. Returns the same (mutated) tree.
 */
export function walkTree<T>(
  tree: T,
  visitor: TreeVisitor,
  options: WalkOptions = {}
): T {
  visitValue(tree, false, visitor, options, () => {
    throw new Error("The root of a query tree cannot be replaced.");
  });
  return tree;
}
