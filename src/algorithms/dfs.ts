import type { Graph, Neighbor } from "../graph/model.js";
import type { TraversalResult } from "./types.js";

interface Frame {
  readonly node: number;
  readonly edges: Iterator<Neighbor>;
}

/**
 * Depth-first search from `start` that returns on the first arrival at `end`.
 *
 * The walk uses an explicit stack of neighbour iterators, which visits nodes
 * in exactly the order a recursive implementation would without being bound
 * by the call stack depth. The resulting path is valid but not necessarily
 * the shortest one.
 */
export function dfs(graph: Graph, start: number, end: number): TraversalResult {
  graph.assertNode(start);
  graph.assertNode(end);

  const visited = new Array<boolean>(graph.nodeCount).fill(false);
  const predecessors = new Array<number | null>(graph.nodeCount).fill(null);
  const visitedOrder: number[] = [start];

  visited[start] = true;
  if (start === end) {
    return { found: true, predecessors, visitedOrder };
  }

  const stack: Frame[] = [{ node: start, edges: graph.neighbors(start)[Symbol.iterator]() }];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    const step = frame.edges.next();
    if (step.done) {
      stack.pop();
      continue;
    }

    const next = step.value.to;
    if (visited[next]) {
      continue;
    }
    visited[next] = true;
    predecessors[next] = frame.node;
    visitedOrder.push(next);

    if (next === end) {
      return { found: true, predecessors, visitedOrder };
    }
    stack.push({ node: next, edges: graph.neighbors(next)[Symbol.iterator]() });
  }

  return { found: false, predecessors, visitedOrder };
}
