import { loadConfig, USAGE } from './config.js';
import { createLinePrompt } from './prompt.js';
import { runRequest } from './run.js';
import type { Logger } from './run.js';

/**
 * Streams and output sink the CLI talks to.
 */
export interface CliIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  logger: Logger;
}

/**
 * Run the CLI once. Errors are reported on the logger and turn into exit code 1.
 * Resolves with the exit code.
 */
export async function main(
  args: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  io: CliIo
): Promise<number> {
  const { logger } = io;
  const linePrompt = createLinePrompt(io.input, io.output);
  try {
    const config = loadConfig(args, env);
    if (config.help) {
      logger.log(USAGE);
      return 0;
    }
    await runRequest(config, { prompt: linePrompt.prompt, logger });
    return 0;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  } finally {
    linePrompt.close();
  }
}
