// Zod schemas for validating star schema definitions

import { z } from "zod";

const identifier = z.string().trim().min(1);

export const starSchemaDefinitionSchema = z
  .object({
    name: identifier.optional(),
    description: z.string().optional(),
    fact_table: identifier,
    dimension_tables: z.record(z.string(), identifier).default({}),
    column_owner: z.record(z.string(), identifier).default({}),
  })
  .superRefine((data, ctx) => {
    // column_owner values must name the fact table or a declared dimension
    for (const [column, owner] of Object.entries(data.column_owner)) {
      if (owner !== data.fact_table && !Object.hasOwn(data.dimension_tables, owner)) {
        ctx.addIssue({
          code: "custom",
          path: ["column_owner", column],
          message: `owner "${owner}" is neither the fact table nor a dimension table`,
        });
      }
    }
  });
