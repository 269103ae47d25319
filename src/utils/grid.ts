/**
 * Immutable rectangular grid of numbers stored row-major in one flat array,
 * so every row has exactly `columns` cells.
 */
export class Grid {
  private readonly cells: Float64Array;

  private constructor(
    readonly rows: number,
    readonly columns: number,
    cells: Float64Array
  ) {
    this.cells = cells;
  }

  static build(rows: number, columns: number, cell: (row: number, column: number) => number): Grid {
    const cells = new Float64Array(rows * columns);
    for (let row = 0; row < rows; row++) {
      for (let column = 0; column < columns; column++) {
        cells[row * columns + column] = cell(row, column);
      }
    }
    return new Grid(rows, columns, cells);
  }

  static fromRows(values: number[][]): Grid {
    const columns = values[0]?.length ?? 0;
    for (const [index, row] of values.entries()) {
      if (row.length !== columns) {
        throw new RangeError(`Row ${index} has ${row.length} cells, expected ${columns}`);
      }
    }
    return Grid.build(values.length, columns, (row, column) => values[row][column]);
  }

  get(row: number, column: number): number {
    if (row < 0 || row >= this.rows || column < 0 || column >= this.columns) {
      throw new RangeError(`Cell (${row}, ${column}) is outside a ${this.rows}x${this.columns} grid`);
    }
    return this.cells[row * this.columns + column];
  }

  row(row: number): number[] {
    if (row < 0 || row >= this.rows) {
      throw new RangeError(`Row ${row} is outside a grid with ${this.rows} rows`);
    }
    const start = row * this.columns;
    return Array.from(this.cells.subarray(start, start + this.columns));
  }

  map(fn: (value: number, row: number, column: number) => number): Grid {
    return Grid.build(this.rows, this.columns, (row, column) => fn(this.get(row, column), row, column));
  }

  toArrays(): number[][] {
    return Array.from({ length: this.rows }, (_, row) => this.row(row));
  }
}
