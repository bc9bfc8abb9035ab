import type { CliConfig } from './config.js';
import { readMatrixFile, resultFileName, writeResult } from './files.js';
import { applyOperation, parseOperation } from './operation.js';
import type { SparseMatrix } from '../sparse/index.js';

/**
 * Ask the user a question and resolve with the raw answer.
 */
export type Prompt = (question: string) => Promise<string>;

/**
 * Output sink for CLI messages.
 */
export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

export interface RunDeps {
  prompt: Prompt;
  logger?: Logger;
}

export const PROMPTS = {
  operation: 'Enter the operation (add, subtract, multiply): ',
  firstPath: 'Enter the path for the first matrix file: ',
  secondPath: 'Enter the path for the second matrix file: ',
} as const;

async function valueOrPrompt(value: string | undefined, question: string, prompt: Prompt): Promise<string> {
  if (value !== undefined) return value.trim();
  return (await prompt(question)).trim();
}

function summarize(label: string, m: SparseMatrix): string {
  return `${label}: ${m.rows}×${m.cols}, ${m.nnz} stored entries`;
}

/**
 * Run one request: collect inputs, load both operands, apply the operation and
 * write the result. Resolves with the path of the written file.
 *
 * @throws InvalidOperationError, FormatError or DimensionMismatchError
 */
export async function runRequest(config: CliConfig, deps: RunDeps): Promise<string> {
  const logger = deps.logger ?? console;

  const opName = await valueOrPrompt(config.operation, PROMPTS.operation, deps.prompt);
  const firstPath = await valueOrPrompt(config.firstPath, PROMPTS.firstPath, deps.prompt);
  const secondPath = await valueOrPrompt(config.secondPath, PROMPTS.secondPath, deps.prompt);

  const op = parseOperation(opName);

  const first = await readMatrixFile(firstPath);
  const second = await readMatrixFile(secondPath);

  if (config.verbose) {
    logger.log(summarize(firstPath, first));
    logger.log(summarize(secondPath, second));
  }

  const result = applyOperation(op, first, second);

  if (config.verbose) {
    logger.log(summarize(op, result));
  }

  const outputPath = await writeResult(
    config.resultsDir,
    resultFileName(firstPath, op, secondPath),
    result
  );

  logger.log(`Result saved to ${outputPath}`);
  return outputPath;
}
