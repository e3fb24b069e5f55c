// Collects the tables and columns a query refers to

import { walkTree, type WalkOptions } from "./tree";

export interface QueryReferences {
  // as written in FROM position, not resolved against aliases
  tableNames: Set<string>;
  // bare column names; qualifiers are dropped
  columnNames: Set<string>;
  // every table or alias used to qualify a column
  qualifiers: Set<string>;
}

export function extractReferences(
  tree: unknown,
  options: WalkOptions = {}
): QueryReferences {
  const refs: QueryReferences = {
    tableNames: new Set(),
    columnNames: new Set(),
    qualifiers: new Set(),
  };

  walkTree(
    tree,
    {
      from: (node) => {
        refs.tableNames.add(node.name);
      },
      column: (node) => {
        if (node.qualifier) refs.qualifiers.add(node.qualifier);
        // t.* and * say nothing about which dimensions are needed
        if (node.column !== "*") refs.columnNames.add(node.column);
      },
    },
    options
  );

  return refs;
}
