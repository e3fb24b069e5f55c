// Minimal join-set computation for one star schema

import type { StarSchema } from "@/lib/semantic/types";
import type { DimensionJoin, RewritePlan } from "./join-types";

/**
 * Work out which dimensions of `schema` hold columns the query uses.
 *
 * `columnNames` is the whole query's column set, not scoped to this table, so
 * a column that several registered tables own is planned for each of them.
 * Columns without an owner, owned by the fact table, or owned by a table that
 * is not a declared dimension are skipped.
 */
export function planJoins(
  logicalTable: string,
  schema: StarSchema,
  columnNames: Iterable<string>
): RewritePlan {
  const needed = new Set<string>();

  for (const col of columnNames) {
    const owner = schema.column_owner.get(col);
    if (!owner || owner === schema.fact_table) continue;
    if (!schema.dimension_tables.has(owner)) continue;
    needed.add(owner);
  }

  // Lexical order keeps the rendered SQL reproducible
  const joins: DimensionJoin[] = Array.from(needed)
    .sort()
    .flatMap((dimension) => {
      const joinKey = schema.dimension_tables.get(dimension);
      return joinKey ? [{ dimension, joinKey }] : [];
    });

  return { logicalTable, factTable: schema.fact_table, joins };
}
