/**
 * Line-oriented text encoding for sparse matrices.
 *
 * ```
 * rows=<int>
 * cols=<int>
 * (<row>, <col>, <value>)
 * ...
 * ```
 *
 * Blank lines are ignored on read. The header keys are not checked: only the
 * token after the first `=` is read.
 */

import { FormatError } from '../error.js';
import type { MatrixEntry, MatrixLike } from './types.js';

/**
 * Result of parsing matrix text, before it is loaded into a matrix.
 */
export interface ParsedMatrix {
  readonly rows: number;
  readonly cols: number;
  /** Entries in file order; later duplicates win when applied in sequence */
  readonly entries: MatrixEntry[];
}

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a trimmed integer token. Returns undefined for anything else.
 */
function parseInteger(token: string): number | undefined {
  const trimmed = token.trim();
  if (!INTEGER.test(trimmed)) return undefined;

  const n = Number(trimmed);
  if (!Number.isSafeInteger(n)) return undefined;

  // Normalize -0
  return n + 0;
}

function parseHeader(line: string, lineNo: number): number {
  const value = line.split('=')[1];
  const n = value === undefined ? undefined : parseInteger(value);
  if (n === undefined) {
    throw new FormatError(undefined, lineNo);
  }
  return n;
}

function parseEntry(line: string, lineNo: number): MatrixEntry {
  const tokens = line.slice(1, -1).split(',');
  if (tokens.length !== 3) {
    throw new FormatError(undefined, lineNo);
  }

  const [row, col, value] = tokens.map(parseInteger);
  if (row === undefined || col === undefined || value === undefined) {
    throw new FormatError(undefined, lineNo);
  }
  return { row, col, value };
}

/**
 * Parse matrix text into dimensions and entries.
 *
 * @throws FormatError if the header or any entry line is malformed
 */
export function parseMatrixText(content: string): ParsedMatrix {
  const lines: Array<{ text: string; lineNo: number }> = [];
  content.split(/\r\n|\r|\n/).forEach((raw, i) => {
    const text = raw.trim();
    if (text.length > 0) {
      lines.push({ text, lineNo: i + 1 });
    }
  });

  const [rowsLine, colsLine, ...entryLines] = lines;
  if (rowsLine === undefined || colsLine === undefined) {
    throw new FormatError();
  }

  const rows = parseHeader(rowsLine.text, rowsLine.lineNo);
  const cols = parseHeader(colsLine.text, colsLine.lineNo);
  const entries = entryLines.map((l) => parseEntry(l.text, l.lineNo));

  return { rows, cols, entries };
}

/**
 * Serialize a matrix. Entries are written in the order the matrix yields them.
 */
export function formatMatrixText(matrix: MatrixLike): string {
  const parts = [`rows=${matrix.rows}\n`, `cols=${matrix.cols}\n`];
  for (const { row, col, value } of matrix.entries()) {
    parts.push(`(${row}, ${col}, ${value})\n`);
  }
  return parts.join('');
}
