/**
 * Filesystem side of the CLI: loading operands and persisting results.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { SparseMatrix } from '../sparse/index.js';
import type { Operation } from './operation.js';

/**
 * Read and parse a matrix file.
 *
 * @throws FormatError if the file content is malformed
 */
export async function readMatrixFile(filePath: string): Promise<SparseMatrix> {
  const content = await readFile(filePath, 'utf-8');
  return SparseMatrix.fromText(content);
}

/**
 * Result file name: `{first}_{op}_{second}_result.txt`, using each operand's
 * base name without its extension.
 */
export function resultFileName(firstPath: string, op: Operation, secondPath: string): string {
  const first = path.parse(firstPath).name;
  const second = path.parse(secondPath).name;
  return `${first}_${op}_${second}_result.txt`;
}

/**
 * Write a result matrix into `dir`, creating the directory if needed.
 * Returns the path written.
 */
export async function writeResult(dir: string, fileName: string, matrix: SparseMatrix): Promise<string> {
  await mkdir(dir, { recursive: true });
  const outputPath = path.join(dir, fileName);
  await writeFile(outputPath, matrix.toText(), 'utf-8');
  return outputPath;
}
