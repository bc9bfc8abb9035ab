/**
 * A stored (row, col, value) triple.
 */
export interface MatrixEntry {
  readonly row: number;
  readonly col: number;
  readonly value: number;
}

/**
 * Read-only view of a dimensioned sparse matrix.
 */
export interface MatrixLike {
  readonly rows: number;
  readonly cols: number;
  entries(): Iterable<MatrixEntry>;
}
