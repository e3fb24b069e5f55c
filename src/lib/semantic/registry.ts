// Registry of logical table name -> star schema

import { SchemaDefinitionError } from "@/lib/errors";
import { starSchemaDefinitionSchema } from "./schemas";
import type {
  ColumnName,
  JoinKey,
  StarSchema,
  StarSchemaDefinition,
  TableName,
} from "./types";

/**
 * Validate a definition (shape and column ownership only; join keys are
 * never checked against the database) and normalize it into a StarSchema.
 */
export function parseStarSchemaDefinition(
  doc: unknown,
  source: string
): { name?: string; schema: StarSchema } {
  const parsed = starSchemaDefinitionSchema.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.map(String).join(".")}: ${i.message}`
    );
    throw new SchemaDefinitionError(source, issues);
  }

  const def = parsed.data;
  return {
    name: def.name,
    schema: {
      fact_table: def.fact_table,
      dimension_tables: new Map(Object.entries(def.dimension_tables)),
      column_owner: new Map(Object.entries(def.column_owner)),
    },
  };
}

function copySchema(schema: StarSchema): StarSchema {
  return {
    fact_table: schema.fact_table,
    dimension_tables: new Map(schema.dimension_tables),
    column_owner: new Map(schema.column_owner),
  };
}

/**
 * Holds the star schemas a rewrite may expand. Construct one per client or
 * session and pass it to the rewriter; finish registering before rewriting.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<TableName, StarSchema>();

  /** Store or replace the schema for `name`. The schema is copied. */
  register(name: TableName, schema: StarSchema): void {
    const replaced = this.schemas.has(name);
    this.schemas.set(name, copySchema(schema));
    console.log(
      `[Registry] ${replaced ? "Replaced" : "Registered"} star schema "${name}" ` +
        `(fact: ${schema.fact_table}, dimensions: ${schema.dimension_tables.size})`
    );
  }

  registerSchema(
    name: TableName,
    factTable: TableName,
    dimensionTables: Record<TableName, JoinKey>,
    columnOwner: Record<ColumnName, TableName>
  ): StarSchema {
    const { schema } = parseStarSchemaDefinition(
      {
        fact_table: factTable,
        dimension_tables: dimensionTables,
        column_owner: columnOwner,
      },
      `Star schema "${name}"`
    );
    this.register(name, schema);
    return this.lookup(name) ?? schema;
  }

  /** Register several definitions keyed by logical table name. */
  registerAll(definitions: Record<TableName, StarSchemaDefinition>): void {
    for (const [name, def] of Object.entries(definitions)) {
      const { schema } = parseStarSchemaDefinition(def, `Star schema "${name}"`);
      this.register(name, schema);
    }
  }

  /** Absence means the table is not a star schema and is left as-is. */
  lookup(name: TableName): StarSchema | undefined {
    return this.schemas.get(name);
  }

  has(name: TableName): boolean {
    return this.schemas.has(name);
  }

  names(): TableName[] {
    return Array.from(this.schemas.keys());
  }

  get size(): number {
    return this.schemas.size;
  }
}
