import { MazeFormatError, MissingEndpointError } from "../errors.js";
import { GridIndex } from "../graph/gridIndex.js";
import { Graph, type GraphOptions } from "../graph/model.js";

export const WALL = "#";
export const START_MARKER = "S";
export const END_MARKER = "E";

/** Up, down, left, right. The order fixes how adjacency lists are filled. */
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
];

export interface Maze {
  readonly rows: readonly string[];
  readonly grid: GridIndex;
  readonly graph: Graph;
  readonly start: number;
  readonly end: number;
}

/** Splits maze text into rows, tolerating CRLF endings and trailing blank lines. */
export function splitMazeRows(source: string): string[] {
  const lines = source.replace(/\r\n?/g, "\n").split("\n");
  while (lines.length > 0 && lines[lines.length - 1].trim().length === 0) {
    lines.pop();
  }
  return lines;
}

/**
 * Builds the graph of a rectangular maze. Every non-wall cell is a node;
 * each pair of orthogonally adjacent open cells is linked in both directions.
 * Cells are scanned row by row and every neighbour is linked from both sides,
 * so each adjacency list holds duplicate entries, which traversals ignore.
 */
export function parseMaze(source: string, options: GraphOptions = {}): Maze {
  const rows = splitMazeRows(source);
  if (rows.length === 0 || rows[0].length === 0) {
    throw new MazeFormatError("maze is empty");
  }
  const width = rows[0].length;
  rows.forEach((row, index) => {
    if (row.length !== width) {
      throw new MazeFormatError(`row ${index} has ${row.length} cells, expected ${width}`, {
        row: index,
        length: row.length,
        expected: width,
      });
    }
  });

  const grid = new GridIndex(rows.length, width);
  const graph = new Graph(grid.size, options);
  const isOpen = (row: number, col: number): boolean => grid.contains(row, col) && rows[row][col] !== WALL;
  let start: number | undefined;
  let end: number | undefined;

  for (let row = 0; row < grid.rows; row += 1) {
    for (let col = 0; col < grid.cols; col += 1) {
      if (!isOpen(row, col)) {
        continue;
      }
      const node = grid.toIndex(row, col);
      const marker = rows[row][col];
      if (marker === START_MARKER) {
        start = claimMarker(START_MARKER, start, node, grid);
      } else if (marker === END_MARKER) {
        end = claimMarker(END_MARKER, end, node, grid);
      }

      for (const [dr, dc] of DIRECTIONS) {
        if (isOpen(row + dr, col + dc)) {
          graph.addUndirectedEdge(node, grid.toIndex(row + dr, col + dc));
        }
      }
    }
  }

  if (start === undefined || end === undefined) {
    const missing: Array<"S" | "E"> = [];
    if (start === undefined) missing.push("S");
    if (end === undefined) missing.push("E");
    throw new MissingEndpointError(missing);
  }

  return { rows, grid, graph, start, end };
}

function claimMarker(marker: string, previous: number | undefined, node: number, grid: GridIndex): number {
  if (previous !== undefined) {
    const first = grid.toCell(previous);
    const second = grid.toCell(node);
    throw new MazeFormatError(`maze contains more than one '${marker}' marker`, {
      marker,
      cells: [first, second],
    });
  }
  return node;
}
