import { BoundsError, CycleDetectedError, MissingEdgeError } from "../errors.js";
import type { Graph } from "../graph/model.js";
import type { Predecessors } from "./types.js";

/**
 * Rebuilds the `start -> end` path from a predecessor array.
 *
 * Returns `[start]` when both endpoints coincide and an empty array when the
 * predecessor chain of `end` stops before reaching `start`. The walk takes at
 * most `predecessors.length` steps; a longer chain can only come from a
 * cycle and raises {@link CycleDetectedError}.
 */
export function reconstructPath(predecessors: Predecessors, start: number, end: number): number[] {
  const count = predecessors.length;
  for (const node of [start, end]) {
    if (!Number.isInteger(node) || node < 0 || node >= count) {
      throw new BoundsError(node, count);
    }
  }

  if (start === end) {
    return [start];
  }

  const reversed: number[] = [];
  let current: number | null = end;
  let steps = 0;
  while (current !== start) {
    if (current === null) {
      return [];
    }
    if (steps >= count) {
      throw new CycleDetectedError(start, end, steps);
    }
    reversed.push(current);
    current = predecessors[current] ?? null;
    steps += 1;
  }
  reversed.push(start);
  return reversed.reverse();
}

/**
 * Sums the weights along `path`, taking the cheapest edge between each pair
 * of consecutive nodes. Throws {@link MissingEdgeError} when a hop has no
 * edge in the graph.
 */
export function pathCost(graph: Graph, path: readonly number[]): number {
  let total = 0;
  for (let i = 1; i < path.length; i += 1) {
    const weight = graph.edgeWeight(path[i - 1], path[i]);
    if (weight === undefined) {
      throw new MissingEdgeError(path[i - 1], path[i]);
    }
    total += weight;
  }
  return total;
}
