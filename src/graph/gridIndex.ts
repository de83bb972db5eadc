export interface Cell {
  readonly row: number;
  readonly col: number;
}

/** Row-major mapping between grid cells and flat node indices. */
export class GridIndex {
  constructor(readonly rows: number, readonly cols: number) {}

  get size(): number {
    return this.rows * this.cols;
  }

  toIndex(row: number, col: number): number {
    return row * this.cols + col;
  }

  toCell(index: number): Cell {
    return { row: Math.floor(index / this.cols), col: index % this.cols };
  }

  contains(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }
}
