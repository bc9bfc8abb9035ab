/**
 * Dictionary-of-keys sparse integer matrix.
 *
 * Entries live in an insertion-ordered map of row → (map of col → value), so
 * iteration and serialization follow the order entries were first set.
 * Coordinates are not bounds-checked and storing 0 keeps an explicit entry.
 * Arithmetic throws rather than lose precision outside the safe integer range.
 */

import { DimensionMismatchError, IntegerOverflowError } from '../error.js';
import { formatMatrixText, parseMatrixText } from './text-format.js';
import type { MatrixEntry, MatrixLike } from './types.js';

function shapeString(rows: number, cols: number): string {
  return `${rows}×${cols}`;
}

function checked(value: number, operation: string, row: number, col: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new IntegerOverflowError(operation, row, col);
  }
  return value;
}

export class SparseMatrix implements MatrixLike {
  readonly rows: number;
  readonly cols: number;
  private readonly data = new Map<number, Map<number, number>>();

  constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
  }

  /**
   * Parse a matrix from its text encoding.
   *
   * @throws FormatError if the text is malformed
   */
  static fromText(content: string): SparseMatrix {
    const parsed = parseMatrixText(content);
    return SparseMatrix.fromEntries(parsed.rows, parsed.cols, parsed.entries);
  }

  /**
   * Build a matrix by setting each entry in order. Later duplicates overwrite earlier ones.
   */
  static fromEntries(rows: number, cols: number, entries: Iterable<MatrixEntry>): SparseMatrix {
    const m = new SparseMatrix(rows, cols);
    for (const { row, col, value } of entries) {
      m.set(row, col, value);
    }
    return m;
  }

  /**
   * Number of stored entries, explicit zeros included.
   */
  get nnz(): number {
    let n = 0;
    for (const rowData of this.data.values()) {
      n += rowData.size;
    }
    return n;
  }

  /**
   * Get element at (row, col). Returns 0 for elements not stored.
   */
  get(row: number, col: number): number {
    return this.data.get(row)?.get(col) ?? 0;
  }

  set(row: number, col: number, value: number): void {
    let rowData = this.data.get(row);
    if (rowData === undefined) {
      rowData = new Map();
      this.data.set(row, rowData);
    }
    rowData.set(col, value);
  }

  /**
   * Stored entries in storage order.
   */
  *entries(): IterableIterator<MatrixEntry> {
    for (const [row, rowData] of this.data) {
      for (const [col, value] of rowData) {
        yield { row, col, value };
      }
    }
  }

  /**
   * Add two matrices: result = this + other
   *
   * Positions stored in either operand are stored in the result, even when they sum to 0.
   *
   * @throws IntegerOverflowError if a sum is not a safe integer
   */
  add(other: SparseMatrix): SparseMatrix {
    this.checkSameShape(other, 'add');
    const result = this.clone();
    for (const { row, col, value } of other.entries()) {
      result.set(row, col, checked(result.get(row, col) + value, 'add', row, col));
    }
    return result;
  }

  /**
   * Subtract two matrices: result = this - other
   */
  subtract(other: SparseMatrix): SparseMatrix {
    this.checkSameShape(other, 'subtract');
    const result = this.clone();
    for (const { row, col, value } of other.entries()) {
      result.set(row, col, checked(result.get(row, col) - value, 'subtract', row, col));
    }
    return result;
  }

  /**
   * Matrix-matrix multiplication: result = this * other
   *
   * Only rows stored in `this` are visited. Zero dot products are not stored.
   *
   * @throws IntegerOverflowError if a product or partial sum is not a safe integer
   */
  multiply(other: SparseMatrix): SparseMatrix {
    if (this.cols !== other.rows) {
      throw new DimensionMismatchError(
        'multiply',
        'Cannot multiply: column count of the first matrix must equal row count of the second',
        `${this.cols} rows`,
        `${other.rows} rows`
      );
    }

    const result = new SparseMatrix(this.rows, other.cols);

    for (const [row, rowData] of this.data) {
      // Stored columns outside [0, cols) never take part in the dot product
      const terms: Array<[number, number]> = [];
      for (const [k, value] of rowData) {
        if (Number.isInteger(k) && k >= 0 && k < this.cols) {
          terms.push([k, value]);
        }
      }

      for (let col = 0; col < other.cols; col++) {
        let sum = 0;
        for (const [k, value] of terms) {
          const product = checked(value * other.get(k, col), 'multiply', row, col);
          sum = checked(sum + product, 'multiply', row, col);
        }
        if (sum !== 0) {
          result.set(row, col, sum);
        }
      }
    }

    return result;
  }

  /**
   * Value equality: same shape and same value at every position either matrix stores.
   * Explicit zeros compare equal to absent entries.
   */
  equals(other: SparseMatrix): boolean {
    if (this.rows !== other.rows || this.cols !== other.cols) {
      return false;
    }

    for (const { row, col, value } of this.entries()) {
      if (other.get(row, col) !== value) return false;
    }
    for (const { row, col, value } of other.entries()) {
      if (this.get(row, col) !== value) return false;
    }
    return true;
  }

  /**
   * Deep copy preserving entry order.
   */
  clone(): SparseMatrix {
    return SparseMatrix.fromEntries(this.rows, this.cols, this.entries());
  }

  toText(): string {
    return formatMatrixText(this);
  }

  toString(): string {
    return this.toText();
  }

  private checkSameShape(other: SparseMatrix, operation: 'add' | 'subtract'): void {
    if (this.rows !== other.rows || this.cols !== other.cols) {
      throw new DimensionMismatchError(
        operation,
        `Cannot ${operation} matrices with different shapes`,
        shapeString(this.rows, this.cols),
        shapeString(other.rows, other.cols)
      );
    }
  }
}
