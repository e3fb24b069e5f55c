// Types for join-set planning and FROM rewriting

export interface DimensionJoin {
  dimension: string; // physical dimension table
  joinKey: string; // column present in both fact and dimension
}

export interface RewritePlan {
  logicalTable: string;
  factTable: string;
  // Dimensions whose columns the query uses, in render order.
  // Empty means the fact table alone answers the query.
  joins: DimensionJoin[];
}
