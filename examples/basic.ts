/**
 * Basic Usage Example
 *
 * Loads the sample matrices under examples/data and prints each operation.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import { readMatrixFile, DimensionMismatchError } from '../src/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const dataDir = path.join(__dirname, 'data');

async function basicExamples() {
  console.log('=== sparsemat Basic Examples ===\n');

  const A = await readMatrixFile(path.join(dataDir, 'a.txt'));
  const B = await readMatrixFile(path.join(dataDir, 'b.txt'));
  const C = await readMatrixFile(path.join(dataDir, 'c.txt'));

  console.log('--- A + B ---');
  console.log(A.add(B).toText());

  console.log('--- A - B ---');
  console.log(A.subtract(B).toText());

  console.log('--- A * C ---');
  console.log(A.multiply(C).toText());

  console.log('--- C * A (shape mismatch) ---');
  try {
    C.multiply(A);
  } catch (err) {
    if (!(err instanceof DimensionMismatchError)) throw err;
    console.log(err.message);
  }
  console.log();

  console.log('=== All examples completed ===\n');
}

basicExamples().catch(console.error);
