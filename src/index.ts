export { SchemaRegistry, parseStarSchemaDefinition } from "@/lib/semantic/registry";
export {
  clearStarSchemaCache,
  listStarSchemas,
  loadStarSchemaYaml,
  loadStarSchemas,
  readStarSchemaYaml,
} from "@/lib/semantic/io";
export type { LoadedStarSchema } from "@/lib/semantic/io";
export type {
  ColumnName,
  JoinKey,
  StarSchema,
  StarSchemaDefinition,
  TableName,
} from "@/lib/semantic/types";

export {
  createRewriteContext,
  rewriteFromClause,
  rewriteSql,
} from "@/lib/sql/rewrite";
export type { QueryPass, RewriteContext } from "@/lib/sql/rewrite";
export { extractReferences } from "@/lib/sql/references";
export type { QueryReferences } from "@/lib/sql/references";
export { planJoins } from "@/lib/sql/joins";
export type { DimensionJoin, RewritePlan } from "@/lib/sql/join-types";
export { renderFromFragment, renderStarSubquery } from "@/lib/sql/render";
export { parseFromFragment, parseSql, serializeSql } from "@/lib/sql/parser";
export type { QueryTree } from "@/lib/sql/parser";
export { walkTree } from "@/lib/sql/tree";
export type {
  ColumnNode,
  FromNode,
  OtherNode,
  SqlNode,
  TreeVisitor,
  WalkOptions,
} from "@/lib/sql/tree";

export {
  InternalConstructionError,
  ParseError,
  SchemaDefinitionError,
  isInternalConstructionError,
  isParseError,
} from "@/lib/errors";

export { closeDatabase, executeSQL, getDatabase, testConnection } from "@/lib/sqlite";
export type { ExecuteOptions, QueryResult } from "@/lib/sqlite";

export { getConfig, loadConfig, resetConfig } from "@/config/index";
export type { Config, SqlDialect } from "@/config/schema";
