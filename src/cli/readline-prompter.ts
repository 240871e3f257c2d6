/**
 * Prompter backed by a readable stream of lines (stdin in production).
 *
 * All lines are read through one async iterator, so answers that arrive
 * together in a single chunk (piped or pasted input) are queued for the
 * following questions instead of being dropped.
 */

import * as node_readline from "node:readline";
import type { Prompter } from "./prompt.js";

export function createReadlinePrompter(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Prompter {
  const rl = node_readline.createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  let done = false;

  return {
    async ask(question: string): Promise<string | undefined> {
      if (done) {
        return undefined;
      }
      output.write(question);
      const next = await lines.next();
      if (next.done === true) {
        done = true;
        return undefined;
      }
      return next.value;
    },
    close(): void {
      done = true;
      rl.close();
    },
  };
}
