import { createInterface } from 'readline';
import type { Prompt } from './run.js';

export interface LinePrompt {
  prompt: Prompt;
  close(): void;
}

/**
 * Prompt backed by a line reader over `input`.
 *
 * Lines are consumed from one iterator created up front, so answers piped in
 * before a question is asked are kept for it. Running out of input rejects.
 */
export function createLinePrompt(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): LinePrompt {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.once('close', () => {
    closed = true;
  });

  return {
    prompt: async (question) => {
      output.write(question);
      const next = await lines.next();
      if (next.done === true) {
        throw new Error('Input ended before all answers were given');
      }
      return next.value;
    },
    close: () => {
      if (!closed) rl.close();
    },
  };
}
