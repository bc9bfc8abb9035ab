#!/usr/bin/env node
/**
 * sparsemat command-line entry point.
 *
 * @example
 * ```sh
 * sparsemat --op add examples/data/a.txt examples/data/b.txt
 * printf 'add\na.txt\nb.txt\n' | sparsemat
 * ```
 */

import { main } from './app.js';

main(process.argv.slice(2), process.env, {
  input: process.stdin,
  output: process.stdout,
  logger: console,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch(console.error);
