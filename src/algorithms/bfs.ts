import type { Graph } from "../graph/model.js";
import type { TraversalResult } from "./types.js";

/**
 * Breadth-first search from `start`, stopping as soon as `end` is dequeued.
 * Because every edge counts as one hop, the predecessor chain of `end` is a
 * path with the fewest edges. Ties follow adjacency order.
 */
export function bfs(graph: Graph, start: number, end: number): TraversalResult {
  graph.assertNode(start);
  graph.assertNode(end);

  const visited = new Array<boolean>(graph.nodeCount).fill(false);
  const predecessors = new Array<number | null>(graph.nodeCount).fill(null);
  const visitedOrder: number[] = [];

  // Array-backed queue with a moving head keeps dequeue O(1).
  const queue: number[] = [start];
  let head = 0;
  visited[start] = true;

  while (head < queue.length) {
    const current = queue[head];
    head += 1;
    visitedOrder.push(current);

    if (current === end) {
      return { found: true, predecessors, visitedOrder };
    }

    for (const { to } of graph.neighbors(current)) {
      if (!visited[to]) {
        visited[to] = true;
        predecessors[to] = current;
        queue.push(to);
      }
    }
  }

  return { found: false, predecessors, visitedOrder };
}
