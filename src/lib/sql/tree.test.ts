import { describe, expect, it } from "vitest";
import { classifyNode, walkTree } from "./tree";

describe("classifyNode", () => {
  it("reads FROM entries with schema and alias", () => {
    const node = classifyNode({ db: "analytics", table: "accidents", as: "a" }, true);

    expect(node).toMatchObject({
      kind: "from",
      name: "analytics.accidents",
      table: "accidents",
      db: "analytics",
      alias: "a",
    });
  });

  it("only treats table records as FROM entries inside a FROM list", () => {
    expect(classifyNode({ table: "accidents" }, false).kind).toBe("other");
  });

  it("reads column names in both string and expression form", () => {
    expect(
      classifyNode({ type: "column_ref", table: "a", column: "Severity" }, false)
    ).toMatchObject({ kind: "column", column: "Severity", qualifier: "a" });

    expect(
      classifyNode(
        { type: "column_ref", table: null, column: { expr: { type: "default", value: "State" } } },
        false
      )
    ).toMatchObject({ kind: "column", column: "State", qualifier: null });
  });

  it("reads double-quoted strings as columns only when asked to", () => {
    const raw = { type: "double_quote_string", value: "Severity" };

    expect(classifyNode(raw, false, { doubleQuotedIdentifiers: true })).toMatchObject({
      kind: "column",
      column: "Severity",
      qualifier: null,
    });
    expect(classifyNode(raw, false).kind).toBe("other");
  });

  it("falls back to other for unrecognised records", () => {
    expect(classifyNode({ type: "number", value: 1 }, false).kind).toBe("other");
  });
});

describe("walkTree", () => {
  it("replaces nodes in place without walking the replacement", () => {
    const tree = {
      type: "select",
      from: [{ table: "accidents", as: null }],
      where: { type: "column_ref", table: null, column: "Severity" },
    };
    const seen: string[] = [];

    walkTree(tree, {
      from: (node) => {
        seen.push(node.name);
        return { table: "accidents_fact", as: null, from: [{ table: "nested" }] };
      },
      column: (node) => {
        seen.push(node.column);
      },
    });

    expect(seen).toEqual(["accidents", "Severity"]);
    expect(tree.from[0]).toEqual({
      table: "accidents_fact",
      as: null,
      from: [{ table: "nested" }],
    });
  });

  it("reaches FROM lists nested in subqueries", () => {
    const tree = [
      {
        type: "select",
        from: [{ expr: { ast: { type: "select", from: [{ table: "inner_t" }] } }, as: "s" }],
      },
    ];
    const names: string[] = [];

    walkTree(tree, { from: (node) => void names.push(node.name) });

    expect(names).toEqual(["inner_t"]);
  });

  it("does not descend into column references", () => {
    const tree = {
      type: "select",
      columns: [
        {
          expr: {
            type: "column_ref",
            table: "a",
            column: { expr: { type: "double_quote_string", value: "Severity" } },
          },
        },
      ],
    };
    const columns: string[] = [];

    walkTree(tree, { column: (node) => void columns.push(node.column) }, {
      doubleQuotedIdentifiers: true,
    });

    expect(columns).toEqual(["Severity"]);
  });

  it("refuses to replace the root", () => {
    expect(() =>
      walkTree({ type: "column_ref", column: "ID" }, { column: () => ({ type: "number" }) })
    ).toThrow("The root of a query tree cannot be replaced.");
  });
});
