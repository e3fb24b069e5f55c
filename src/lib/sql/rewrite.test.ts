import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ParseError } from "@/lib/errors";
import { SchemaRegistry } from "@/lib/semantic/registry";
import { parseSql, serializeSql, type QueryTree } from "./parser";
import { rewriteSql, type RewriteContext } from "./rewrite";
import { walkTree } from "./tree";

// Expected SQL goes through the same printer as the rewriter's output
function normalize(sql: string): string {
  return serializeSql(parseSql(sql, "sqlite"), "sqlite");
}

// Replacement terms quote every identifier
const FACT = "`accidents_fact`";
const DIM1_SUBQUERY =
  "(SELECT * FROM `accidents_fact`, `accidents_dim1` " +
  "WHERE `accidents_fact`.`p1` = `accidents_dim1`.`p1`)";

describe("rewriteSql", () => {
  let registry: SchemaRegistry;
  let ctx: RewriteContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    registry = new SchemaRegistry();
    registry.registerSchema(
      "accidents",
      "accidents_fact",
      { accidents_dim1: "p1", accidents_dim2: "p2" },
      {
        ID: "accidents_fact",
        Severity: "accidents_dim1",
        State: "accidents_dim1",
        Weather_Condition: "accidents_dim2",
      }
    );
    ctx = { registry, dialect: "sqlite" };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns queries without column references untouched", () => {
    const inputs = [
      "SELECT * FROM accidents LIMIT 5",
      "select   *\n  from accidents",
      "SELECT COUNT(*) FROM accidents",
    ];

    for (const sql of inputs) {
      expect(rewriteSql(sql, ctx)).toBe(sql);
    }
  });

  it("points fact-only queries at the fact table", () => {
    expect(rewriteSql("SELECT ID FROM accidents WHERE ID = 1", ctx)).toBe(
      normalize(`SELECT ID FROM ${FACT} WHERE ID = 1`)
    );
  });

  it("joins the dimension that owns a referenced column", () => {
    expect(rewriteSql("SELECT Severity FROM accidents", ctx)).toBe(
      normalize(`SELECT Severity FROM ${DIM1_SUBQUERY}`)
    );
  });

  it("keeps the table alias on the replacement", () => {
    expect(rewriteSql("SELECT a.ID FROM accidents AS a", ctx)).toBe(
      normalize(`SELECT a.ID FROM ${FACT} AS \`a\``)
    );
    expect(rewriteSql("SELECT a.State FROM accidents AS a", ctx)).toBe(
      normalize(`SELECT a.State FROM ${DIM1_SUBQUERY} AS \`a\``)
    );
  });

  it("joins every needed dimension in lexical order", () => {
    expect(
      rewriteSql("SELECT Weather_Condition, Severity FROM accidents", ctx)
    ).toBe(
      normalize(
        "SELECT Weather_Condition, Severity FROM (SELECT * FROM `accidents_fact`, " +
          "`accidents_dim1`, `accidents_dim2` WHERE `accidents_fact`.`p1` = `accidents_dim1`.`p1` " +
          "AND `accidents_fact`.`p2` = `accidents_dim2`.`p2`)"
      )
    );
  });

  it("leaves unregistered tables alone", () => {
    expect(rewriteSql("SELECT Name FROM visitors", ctx)).toBe(
      normalize("SELECT Name FROM visitors")
    );
    expect(
      rewriteSql("SELECT v.Name, a.ID FROM visitors AS v, accidents AS a", ctx)
    ).toBe(normalize(`SELECT v.Name, a.ID FROM visitors AS v, ${FACT} AS \`a\``));
  });

  it("aliases the replacement with the table name when columns are qualified by it", () => {
    expect(rewriteSql("SELECT accidents.Severity FROM accidents", ctx)).toBe(
      normalize(`SELECT accidents.Severity FROM ${DIM1_SUBQUERY} AS \`accidents\``)
    );
  });

  it("rewrites tables in JOIN position and keeps the join condition", () => {
    expect(
      rewriteSql(
        "SELECT r.Stars, a.Severity FROM reviews AS r INNER JOIN accidents AS a ON r.ID = a.ID",
        ctx
      )
    ).toBe(
      normalize(
        `SELECT r.Stars, a.Severity FROM reviews AS r INNER JOIN ${DIM1_SUBQUERY} AS \`a\` ON r.ID = a.ID`
      )
    );
  });

  it("rewrites references inside subqueries", () => {
    expect(
      rewriteSql(
        "SELECT ID FROM accidents WHERE ID IN (SELECT ID FROM accidents WHERE Severity > 2)",
        ctx
      )
    ).toBe(
      normalize(
        `SELECT ID FROM ${DIM1_SUBQUERY} WHERE ID IN (SELECT ID FROM ${DIM1_SUBQUERY} WHERE Severity > 2)`
      )
    );
  });

  it("sees double-quoted column names", () => {
    expect(
      rewriteSql('SELECT "ID", "Severity" FROM accidents WHERE "Severity" > 2', ctx)
    ).toBe(normalize(`SELECT "ID", "Severity" FROM ${DIM1_SUBQUERY} WHERE "Severity" > 2`));
  });

  it("rewrites tables and keys named like keywords", () => {
    registry.registerSchema(
      "orders",
      "order",
      { group: "key" },
      { Total: "order", Region: "group" }
    );

    expect(rewriteSql("SELECT Total FROM orders", ctx)).toBe(
      normalize("SELECT Total FROM `order`")
    );
    expect(rewriteSql("SELECT Region FROM orders", ctx)).toBe(
      normalize(
        "SELECT Region FROM (SELECT * FROM `order`, `group` WHERE `order`.`key` = `group`.`key`)"
      )
    );
  });

  it("rewrites schema-qualified logical tables registered under their qualified name", () => {
    registry.registerSchema(
      "analytics.accidents",
      "accidents_fact",
      { accidents_dim1: "p1" },
      { Severity: "accidents_dim1" }
    );

    expect(rewriteSql("SELECT Severity FROM analytics.accidents", ctx)).toBe(
      normalize(`SELECT Severity FROM ${DIM1_SUBQUERY}`)
    );
    expect(rewriteSql("SELECT Severity FROM accidents_archive.accidents", ctx)).toBe(
      normalize("SELECT Severity FROM accidents_archive.accidents")
    );
  });

  it("skips schemas without dimensions", () => {
    registry.registerSchema("orders", "orders_fact", {}, { OrderId: "orders_fact" });

    expect(rewriteSql("SELECT OrderId FROM orders", ctx)).toBe(
      normalize("SELECT OrderId FROM orders")
    );
  });

  it("raises ParseError for invalid SQL", () => {
    expect(() => rewriteSql("SELEC ID FROM accidents", ctx)).toThrow(ParseError);
  });

  it("runs normalization passes before rewriting", () => {
    const rename = vi.fn((tree: QueryTree) =>
      walkTree(tree, {
        from: (node) => {
          if (node.name === "crashes") node.raw.table = "accidents";
        },
      })
    );

    const out = rewriteSql("SELECT Severity FROM crashes", { ...ctx, passes: [rename] });

    expect(rename).toHaveBeenCalledTimes(1);
    expect(out).toBe(normalize(`SELECT Severity FROM ${DIM1_SUBQUERY}`));
  });

  it("logs the plan when asked to", () => {
    rewriteSql("SELECT Severity FROM accidents", { ...ctx, logSql: true });

    expect(console.log).toHaveBeenCalledWith(
      "[Rewrite] accidents -> accidents_fact joined with accidents_dim1"
    );
  });

  it("produces the same text for the same input", () => {
    const sql = "SELECT State, Weather_Condition FROM accidents AS a WHERE a.ID > 10";

    expect(rewriteSql(sql, ctx)).toBe(rewriteSql(sql, ctx));
  });
});
