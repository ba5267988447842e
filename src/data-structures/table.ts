import { IHaveDebugStr } from '../debug';

/**
 * A header row followed by rows of the same width, printed with each column
 * right aligned to its widest cell. Models use it for transition tables.
 */
export class TextTable implements IHaveDebugStr {
  private readonly rows: string[][];

  constructor(header: readonly string[]) {
    this.rows = [[...header]];
  }

  get numCols() {
    return this.rows[0].length;
  }

  /** Rows including the header */
  get numRows() {
    return this.rows.length;
  }

  addRow(cells: readonly string[]): this {
    if (cells.length != this.numCols) {
      throw new Error(
        `TableShapeError: expected ${this.numCols} cells but found ${cells.length}`
      );
    }
    this.rows.push([...cells]);
    return this;
  }

  cell(row: number, col: number): string {
    if (row < 0 || row >= this.numRows) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.numRows - 1} inclusive`
      );
    }
    if (col < 0 || col >= this.numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this.numCols - 1} inclusive`
      );
    }
    return this.rows[row][col];
  }

  toDebugStr(): string {
    const widths = this.rows[0].map((_, col) =>
      Math.max(1, ...this.rows.map((row) => row[col].length))
    );
    return this.rows
      .map(
        (row) =>
          row.map((cell, col) => cell.padStart(widths[col] + 2)).join('') + '\n'
      )
      .join('');
  }
}
