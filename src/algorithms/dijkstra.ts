import { DistanceOverflowError } from "../errors.js";
import type { Graph } from "../graph/model.js";
import type { Predecessors } from "./types.js";

/**
 * Which candidate wins when several unvisited nodes share the minimum
 * distance during selection.
 *
 * - `"last"`: the highest index among the tied nodes (a `<=` scan).
 * - `"first"`: the lowest index among the tied nodes (a `<` scan).
 */
export type TieBreak = "last" | "first";

export const DEFAULT_TIE_BREAK: TieBreak = "last";

export interface DijkstraOptions {
  readonly tieBreak?: TieBreak;
}

export interface DijkstraResult {
  /** Minimum accumulated weight from the source, `Infinity` when unreachable. */
  readonly distances: readonly number[];
  readonly predecessors: Predecessors;
}

/**
 * Single-source shortest paths using the quadratic linear-scan variant of
 * Dijkstra's algorithm. Graph sizes handled here are small enough that a
 * priority queue brings no benefit, and the scan makes the tie-break between
 * equally distant nodes explicit. Weights are validated when edges are
 * inserted, so every weight seen here is a non-negative integer. A sum above
 * `Number.MAX_SAFE_INTEGER` raises {@link DistanceOverflowError}.
 */
export function dijkstra(graph: Graph, start: number, options: DijkstraOptions = {}): DijkstraResult {
  graph.assertNode(start);
  const tieBreak = options.tieBreak ?? DEFAULT_TIE_BREAK;
  const count = graph.nodeCount;

  const distances = new Array<number>(count).fill(Number.POSITIVE_INFINITY);
  const predecessors = new Array<number | null>(count).fill(null);
  const visited = new Array<boolean>(count).fill(false);
  distances[start] = 0;

  for (let round = 0; round < count - 1; round += 1) {
    const current = selectClosest(distances, visited, tieBreak);
    if (current === -1 || !Number.isFinite(distances[current])) {
      break;
    }
    visited[current] = true;

    for (const { to, weight } of graph.neighbors(current)) {
      if (visited[to]) {
        continue;
      }
      const tentative = distances[current] + weight;
      if (tentative > Number.MAX_SAFE_INTEGER) {
        throw new DistanceOverflowError(current, to, distances[current], weight);
      }
      if (tentative < distances[to]) {
        distances[to] = tentative;
        predecessors[to] = current;
      }
    }
  }

  return { distances, predecessors };
}

function selectClosest(distances: readonly number[], visited: readonly boolean[], tieBreak: TieBreak): number {
  let best = -1;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let node = 0; node < distances.length; node += 1) {
    if (visited[node]) {
      continue;
    }
    const distance = distances[node];
    const better = tieBreak === "last" ? distance <= bestDistance : distance < bestDistance;
    if (better) {
      best = node;
      bestDistance = distance;
    }
  }
  return best;
}
