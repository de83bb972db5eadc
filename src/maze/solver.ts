import { bfs } from "../algorithms/bfs.js";
import { dfs } from "../algorithms/dfs.js";
import { reconstructPath } from "../algorithms/path.js";
import type { TraversalResult } from "../algorithms/types.js";
import type { Cell } from "../graph/gridIndex.js";
import type { Graph } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import type { Maze } from "./parser.js";

export type MazeAlgorithm = "bfs" | "dfs";

export const MAZE_ALGORITHMS: readonly MazeAlgorithm[] = ["bfs", "dfs"];

export interface MazeSolution {
  readonly algorithm: MazeAlgorithm;
  readonly found: boolean;
  readonly path: Cell[];
  /** Number of moves along {@link path}; `null` when no path exists. */
  readonly steps: number | null;
  /** Number of cells the search expanded before stopping. */
  readonly visited: number;
}

const SEARCHES: Record<MazeAlgorithm, (graph: Graph, start: number, end: number) => TraversalResult> = {
  bfs,
  dfs,
};

export function solveMaze(maze: Maze, algorithm: MazeAlgorithm, logger?: StructuredLogger): MazeSolution {
  const search = SEARCHES[algorithm];
  const result = search(maze.graph, maze.start, maze.end);
  const nodes = result.found ? reconstructPath(result.predecessors, maze.start, maze.end) : [];
  const path = nodes.map((node) => maze.grid.toCell(node));
  const solution: MazeSolution = {
    algorithm,
    found: result.found,
    path,
    steps: result.found ? path.length - 1 : null,
    visited: result.visitedOrder.length,
  };
  logger?.debug("maze_solved", {
    algorithm,
    found: solution.found,
    steps: solution.steps,
    visited: solution.visited,
  });
  return solution;
}
