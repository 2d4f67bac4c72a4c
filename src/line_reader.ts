// src/line_reader.ts

import * as readline from "readline";
import { Readable } from "stream";

/**
 * Line-by-line view of a socket. The handshake reads the first line from it
 * and the connection handler keeps reading from the same iterator, so no
 * bytes buffered after the handshake line are lost between the two.
 */
export interface LineReader {
  /** Resolves with the next line (terminator stripped), or null at end of stream. */
  next(): Promise<string | null>;
  close(): void;
}

export function createLineReader(input: Readable): LineReader {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  // The iterator must exist before the first 'line' event or lines are dropped.
  const lines = rl[Symbol.asyncIterator]();

  return {
    async next() {
      const result = await lines.next();
      return result.done ? null : result.value;
    },
    close() {
      rl.close();
    },
  };
}
