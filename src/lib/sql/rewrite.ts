// Star schema FROM-clause rewriting: text in, text out

import { DOUBLE_QUOTED_IDENTIFIER_DIALECTS } from "@/config/constants";
import { getConfig } from "@/config/index";
import type { SqlDialect } from "@/config/schema";
import { previewSql, type AstRecord } from "@/lib/helpers";
import type { SchemaRegistry } from "@/lib/semantic/registry";
import type { RewritePlan } from "./join-types";
import { planJoins } from "./joins";
import { parseFromFragment, parseSql, serializeSql, type QueryTree } from "./parser";
import { extractReferences, type QueryReferences } from "./references";
import { renderFromFragment } from "./render";
import { walkTree, type FromNode, type WalkOptions } from "./tree";

/** A normalization pass run between parsing and reference extraction */
export type QueryPass = (tree: QueryTree) => QueryTree;

export interface RewriteContext {
  registry: SchemaRegistry;
  dialect: SqlDialect;
  passes?: QueryPass[];
  logSql?: boolean;
}

// Properties that tie a FROM entry to its neighbours rather than naming a table
const JOIN_PROPERTIES = ["join", "on", "using"] as const;

export function createRewriteContext(
  registry: SchemaRegistry,
  overrides: Partial<Omit<RewriteContext, "registry">> = {}
): RewriteContext {
  const config = getConfig();
  return {
    registry,
    dialect: overrides.dialect ?? config.SQL_DIALECT,
    passes: overrides.passes ?? [],
    logSql: overrides.logSql ?? config.LOG_REWRITTEN_SQL,
  };
}

/**
 * Build the replacement for one FROM entry. The entry's join type and join
 * condition carry over so the term keeps its position in a JOIN chain.
 */
export function rewriteFromClause(
  node: FromNode,
  plan: RewritePlan,
  alias: string | null,
  dialect: SqlDialect
): AstRecord {
  const fragment = renderFromFragment(plan, alias, dialect);
  const replacement = parseFromFragment(fragment, dialect);

  for (const key of JOIN_PROPERTIES) {
    if (key in node.raw) replacement[key] = node.raw[key];
  }
  return replacement;
}

// An unaliased table whose name qualifies column references keeps that name
// as the alias of its replacement, so `accidents.ID` still resolves.
function aliasFor(node: FromNode, refs: QueryReferences): string | null {
  if (node.alias) return node.alias;
  if (refs.qualifiers.has(node.table)) return node.table;
  return null;
}

function planRewrites(
  refs: QueryReferences,
  registry: SchemaRegistry
): Map<string, RewritePlan> {
  const plans = new Map<string, RewritePlan>();

  for (const name of refs.tableNames) {
    const schema = registry.lookup(name);
    if (!schema) continue;
    // A schema without dimensions is a no-op registration
    if (schema.dimension_tables.size === 0) continue;
    plans.set(name, planJoins(name, schema, refs.columnNames));
  }

  return plans;
}

/**
 * Rewrite every FROM reference to a registered star schema into the fact
 * table, or a join of the fact table with the dimensions the query uses.
 *
 * A query that references no columns (`SELECT * FROM t LIMIT 5`) comes back
 * exactly as given, since there is no way to tell which dimensions it needs.
 */
export function rewriteSql(sql: string, ctx: RewriteContext): string {
  let tree = parseSql(sql, ctx.dialect);
  for (const pass of ctx.passes ?? []) {
    tree = pass(tree);
  }

  const walkOptions: WalkOptions = {
    doubleQuotedIdentifiers: DOUBLE_QUOTED_IDENTIFIER_DIALECTS.has(ctx.dialect),
  };
  const refs = extractReferences(tree, walkOptions);
  if (refs.columnNames.size === 0) {
    return sql;
  }

  const plans = planRewrites(refs, ctx.registry);
  if (plans.size > 0) {
    walkTree(
      tree,
      {
        from: (node) => {
          const plan = plans.get(node.name);
          if (!plan) return;
          return rewriteFromClause(node, plan, aliasFor(node, refs), ctx.dialect);
        },
      },
      walkOptions
    );
  }

  const rewritten = serializeSql(tree, ctx.dialect);

  if (ctx.logSql) {
    for (const plan of plans.values()) {
      const dims = plan.joins.map((j) => j.dimension).join(", ");
      console.log(
        `[Rewrite] ${plan.logicalTable} -> ${plan.factTable}` +
          (dims ? ` joined with ${dims}` : " (fact only)")
      );
    }
    console.log(`[Rewrite] SQL: ${previewSql(rewritten)}`);
  }

  return rewritten;
}
