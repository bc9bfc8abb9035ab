/**
 * sparsemat - sparse integer matrix arithmetic
 *
 * @example
 * ```ts
 * import { SparseMatrix } from 'sparsemat';
 *
 * const A = SparseMatrix.fromText('rows=2\ncols=2\n(0, 0, 1)\n(1, 1, 2)\n');
 * const B = new SparseMatrix(2, 2);
 * B.set(0, 0, 3);
 * B.set(0, 1, 4);
 *
 * console.log(A.add(B).toText());
 * // rows=2
 * // cols=2
 * // (0, 0, 4)
 * // (0, 1, 4)
 * // (1, 1, 2)
 * ```
 *
 * @packageDocumentation
 */

// === Sparse Matrix ===
export type { MatrixEntry, MatrixLike, ParsedMatrix } from './sparse/index.js';
export { SparseMatrix, parseMatrixText, formatMatrixText } from './sparse/index.js';

// === Operations ===
export type { Operation } from './cli/operation.js';
export { OPERATIONS, parseOperation, applyOperation } from './cli/operation.js';

// === Files ===
export { readMatrixFile, resultFileName, writeResult } from './cli/files.js';

// === Errors ===
export {
  SparseMatrixError,
  FormatError,
  DimensionMismatchError,
  InvalidOperationError,
  IntegerOverflowError,
} from './error.js';
