/** Per-node predecessor, `null` when the node was never reached from another node. */
export type Predecessors = ReadonlyArray<number | null>;

export interface TraversalResult {
  readonly found: boolean;
  readonly predecessors: Predecessors;
  /** Nodes in the order the search expanded them. */
  readonly visitedOrder: readonly number[];
}
