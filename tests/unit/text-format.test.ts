import { describe, it, expect } from 'vitest';
import { SparseMatrix, parseMatrixText, formatMatrixText } from '../../src/sparse/index.js';
import { FormatError } from '../../src/error.js';

describe('Matrix text format', () => {
  describe('parsing', () => {
    it('parses header and entries', () => {
      const m = SparseMatrix.fromText('rows=2\ncols=3\n(0,1,5)\n(1,2,-7)\n');
      expect(m.rows).toBe(2);
      expect(m.cols).toBe(3);
      expect(m.get(0, 1)).toBe(5);
      expect(m.get(1, 2)).toBe(-7);
      expect(m.nnz).toBe(2);
    });

    it('returns entries in file order', () => {
      const parsed = parseMatrixText('rows=3\ncols=3\n(2,0,1)\n(0,1,2)\n(2,0,3)\n');
      expect(parsed).toEqual({
        rows: 3,
        cols: 3,
        entries: [
          { row: 2, col: 0, value: 1 },
          { row: 0, col: 1, value: 2 },
          { row: 2, col: 0, value: 3 },
        ],
      });
    });

    it('skips blank lines and surrounding whitespace', () => {
      const m = SparseMatrix.fromText('\n  rows=2  \n\n cols=2\n   \n (0, 0, 1) \n\n');
      expect(m.rows).toBe(2);
      expect(m.cols).toBe(2);
      expect(m.get(0, 0)).toBe(1);
    });

    it('accepts CRLF line endings', () => {
      const m = SparseMatrix.fromText('rows=1\r\ncols=1\r\n(0,0,9)\r\n');
      expect(m.get(0, 0)).toBe(9);
    });

    it('accepts lone CR line endings', () => {
      const m = SparseMatrix.fromText('rows=2\rcols=3\r(0,0,9)\r\r(1,2,-1)\r');
      expect(m.rows).toBe(2);
      expect(m.cols).toBe(3);
      expect(m.get(0, 0)).toBe(9);
      expect(m.get(1, 2)).toBe(-1);
    });

    it('counts lone CR line endings in error line numbers', () => {
      expect(() => SparseMatrix.fromText('rows=2\rcols=2\r(0,0)\r')).toThrow(
        'Input has wrong format (line 3)'
      );
    });

    it('lets later duplicates overwrite earlier ones', () => {
      const m = SparseMatrix.fromText('rows=2\ncols=2\n(0,0,1)\n(0,0,2)\n');
      expect(m.get(0, 0)).toBe(2);
      expect(m.nnz).toBe(1);
    });

    it('parses signed integers', () => {
      const m = SparseMatrix.fromText('rows=2\ncols=2\n(+1,-2,-3)\n');
      expect(m.get(1, -2)).toBe(-3);
    });

    it('normalizes negative zero', () => {
      const m = SparseMatrix.fromText('rows=1\ncols=1\n(0,0,-0)\n');
      expect(m.get(0, 0)).toBe(0);
    });

    it('reads only the value after the first =', () => {
      const m = SparseMatrix.fromText('r=2\nc=3\n');
      expect(m.rows).toBe(2);
      expect(m.cols).toBe(3);
    });

    it('does not check the entry delimiters', () => {
      const m = SparseMatrix.fromText('rows=2\ncols=2\n[0,1,5]\n');
      expect(m.get(0, 1)).toBe(5);
    });
  });

  describe('malformed input', () => {
    it('rejects a missing cols line', () => {
      expect(() => SparseMatrix.fromText('rows=2\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\n')).toThrow(/^Input has wrong format$/);
    });

    it('rejects empty input', () => {
      expect(() => SparseMatrix.fromText('')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('\n  \n')).toThrow(FormatError);
    });

    it('rejects entries with the wrong arity', () => {
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n(1,1)\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n(1,1,1,1)\n')).toThrow(FormatError);
    });

    it('rejects non-integer tokens', () => {
      expect(() => SparseMatrix.fromText('rows=x\ncols=2\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\ncols=\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n(a,1,2)\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n(1.5,1,2)\n')).toThrow(FormatError);
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n(1,1,9007199254740993)\n')).toThrow(
        FormatError
      );
    });

    it('rejects a header without =', () => {
      expect(() => SparseMatrix.fromText('rows 2\ncols=2\n')).toThrow('Input has wrong format (line 1)');
    });

    it('reports the offending line number', () => {
      expect(() => SparseMatrix.fromText('rows=2\ncols=2\n\n(0,0)\n')).toThrow(
        'Input has wrong format (line 4)'
      );
    });
  });

  describe('serialization', () => {
    it('writes header and entries', () => {
      const m = new SparseMatrix(2, 3);
      m.set(1, 2, 5);
      m.set(0, 0, -1);
      expect(m.toText()).toBe('rows=2\ncols=3\n(1, 2, 5)\n(0, 0, -1)\n');
      expect(formatMatrixText(m)).toBe(m.toText());
      expect(String(m)).toBe(m.toText());
    });

    it('writes an empty matrix', () => {
      expect(new SparseMatrix(0, 0).toText()).toBe('rows=0\ncols=0\n');
    });

    it('groups entries by row', () => {
      const m = SparseMatrix.fromText('rows=3\ncols=3\n(2,0,1)\n(0,1,2)\n(2,2,3)\n');
      expect(m.toText()).toBe('rows=3\ncols=3\n(2, 0, 1)\n(2, 2, 3)\n(0, 1, 2)\n');
    });

    it('round-trips serialized text exactly', () => {
      const m = new SparseMatrix(4, 5);
      m.set(3, 4, 12);
      m.set(0, 2, -6);
      m.set(3, 0, 1);
      m.set(1, 1, 0);
      const text = m.toText();
      const reloaded = SparseMatrix.fromText(text);
      expect(reloaded.toText()).toBe(text);
      expect(reloaded.equals(m)).toBe(true);
      expect(reloaded.rows).toBe(4);
      expect(reloaded.cols).toBe(5);
    });
  });
});
