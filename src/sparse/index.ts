export type { MatrixEntry, MatrixLike } from './types.js';
export type { ParsedMatrix } from './text-format.js';
export { parseMatrixText, formatMatrixText } from './text-format.js';
export { SparseMatrix } from './matrix.js';
