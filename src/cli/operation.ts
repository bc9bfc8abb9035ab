import { InvalidOperationError } from '../error.js';
import type { SparseMatrix } from '../sparse/index.js';

export const OPERATIONS = ['add', 'subtract', 'multiply'] as const;

export type Operation = (typeof OPERATIONS)[number];

function isOperation(name: string): name is Operation {
  return OPERATIONS.some((op) => op === name);
}

/**
 * Parse an operation name, ignoring case and surrounding whitespace.
 *
 * @throws InvalidOperationError for anything but add, subtract or multiply
 */
export function parseOperation(name: string): Operation {
  const normalized = name.trim().toLowerCase();
  if (!isOperation(normalized)) {
    throw new InvalidOperationError(name.trim());
  }
  return normalized;
}

/**
 * Apply an operation: result = a op b
 */
export function applyOperation(op: Operation, a: SparseMatrix, b: SparseMatrix): SparseMatrix {
  switch (op) {
    case 'add':
      return a.add(b);
    case 'subtract':
      return a.subtract(b);
    case 'multiply':
      return a.multiply(b);
  }
}
