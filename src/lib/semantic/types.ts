// Core TypeScript types for star schema definitions

export type TableName = string;
export type ColumnName = string;
export type JoinKey = string;

// Definition shape as written in YAML or passed to registerSchema
export interface StarSchemaDefinition {
  name?: string;
  description?: string;
  fact_table: TableName;
  dimension_tables: Record<TableName, JoinKey>;
  column_owner: Record<ColumnName, TableName>;
}

// Normalized form held by the registry
export interface StarSchema {
  readonly fact_table: TableName;
  // dimension table -> join key shared with the fact table
  readonly dimension_tables: ReadonlyMap<TableName, JoinKey>;
  // column -> physical table storing it; unmapped columns live on the fact table
  readonly column_owner: ReadonlyMap<ColumnName, TableName>;
}
