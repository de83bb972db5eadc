import type { Cell } from "../graph/gridIndex.js";
import { END_MARKER, START_MARKER } from "./parser.js";

export const PATH_MARKER = "*";

export function formatCell(cell: Cell): string {
  return `(${cell.row}, ${cell.col})`;
}

/** `(1, 1) -> (2, 1) -> (2, 2)` */
export function formatCells(path: readonly Cell[]): string {
  return path.map(formatCell).join(" -> ");
}

/** Returns the maze rows with every path cell except `S` and `E` replaced by `*`. */
export function renderMaze(rows: readonly string[], path: readonly Cell[] = []): string[] {
  const grid = rows.map((row) => row.split(""));
  for (const { row, col } of path) {
    const current = grid[row]?.[col];
    if (current !== undefined && current !== START_MARKER && current !== END_MARKER) {
      grid[row][col] = PATH_MARKER;
    }
  }
  return grid.map((cells) => cells.join(""));
}
