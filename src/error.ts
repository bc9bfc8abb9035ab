/**
 * Base error class for sparsemat.
 */
export class SparseMatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SparseMatrixError';
  }
}

/**
 * Error thrown when matrix text cannot be parsed.
 */
export class FormatError extends SparseMatrixError {
  /** 1-based line number of the offending line, when known */
  readonly line: number | undefined;

  constructor(message = 'Input has wrong format', line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = 'FormatError';
    this.line = line;
  }
}

/**
 * Error thrown when operand dimensions are incompatible with an operation.
 */
export class DimensionMismatchError extends SparseMatrixError {
  readonly operation: string;
  readonly expected: string;
  readonly got: string;

  constructor(operation: string, message: string, expected: string, got: string) {
    super(`${message}: expected ${expected}, got ${got}`);
    this.name = 'DimensionMismatchError';
    this.operation = operation;
    this.expected = expected;
    this.got = got;
  }
}

/**
 * Error thrown when an operation name is not recognized.
 */
export class InvalidOperationError extends SparseMatrixError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Invalid operation: ${operation}`);
    this.name = 'InvalidOperationError';
    this.operation = operation;
  }
}

/**
 * Error thrown when an arithmetic result leaves the safe integer range.
 */
export class IntegerOverflowError extends SparseMatrixError {
  readonly operation: string;

  constructor(operation: string, row: number, col: number) {
    super(`Integer overflow in ${operation} at (${row}, ${col}): result exceeds ±${Number.MAX_SAFE_INTEGER}`);
    this.name = 'IntegerOverflowError';
    this.operation = operation;
  }
}
