/**
 * Report Sinks
 */

import type { LineWriter } from '../types.js';

/**
 * Writes each report line to stdout through the console
 */
export const consoleWriter: LineWriter = {
  writeLine(line: string): void {
    console.log(line);
  },
};

/**
 * Line writer that keeps everything in memory
 */
export interface BufferWriter extends LineWriter {
  /** Lines written so far, in order */
  readonly lines: readonly string[];
  /** All lines joined with `\n` */
  toString(): string;
  clear(): void;
}

/**
 * Create an in-memory line writer
 *
 * Useful for embedding reports in other output and for asserting on layout.
 *
 * @returns BufferWriter with an empty line buffer
 */
export function createBufferWriter(): BufferWriter {
  const lines: string[] = [];

  return {
    lines,

    writeLine(line: string): void {
      lines.push(line);
    },

    toString(): string {
      return lines.join('\n');
    },

    clear(): void {
      lines.length = 0;
    },
  };
}
