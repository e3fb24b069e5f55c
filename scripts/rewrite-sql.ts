#!/usr/bin/env tsx
/**
 * Print the rewritten form of a query.
 *
 *   npm run rewrite -- "SELECT ID, Severity FROM accidents WHERE State = 'OH'"
 *
 * Star schemas are loaded from STAR_SCHEMA_DIR; SQL_DIALECT picks the parser.
 */

import { isInternalConstructionError, isParseError } from "@/lib/errors";
import { loadStarSchemas } from "@/lib/semantic/io";
import { SchemaRegistry } from "@/lib/semantic/registry";
import { createRewriteContext, rewriteSql } from "@/lib/sql/rewrite";

async function main(): Promise<number> {
  const sql = process.argv.slice(2).join(" ").trim();
  if (!sql) {
    console.error('Usage: npm run rewrite -- "<sql>"');
    return 2;
  }

  const registry = new SchemaRegistry();
  const names = await loadStarSchemas(registry);
  console.error(`Loaded star schemas: ${names.join(", ") || "(none)"}`);

  try {
    console.log(rewriteSql(sql, createRewriteContext(registry)));
    return 0;
  } catch (error) {
    if (isParseError(error)) {
      console.error(`❌ Could not parse query: ${error.message}`);
      return 1;
    }
    if (isInternalConstructionError(error)) {
      console.error(`❌ Rewrite failed: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
