/**
 * Line-oriented input sources.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { createInterface, type Interface } from "node:readline";

/**
 * Supplies input one line at a time.
 */
export interface LineSource {
  /**
   * Next line without its terminator, or null once the input has ended.
   */
  readLine(): Promise<string | null>;
  close(): void;
}

/**
 * Line source over a readable stream (stdin by default).
 *
 * Lines that arrive before they are asked for are buffered, so piped input
 * is consumed in order.
 */
export class StreamLineSource implements LineSource {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private ended = false;
  private closed = false;

  constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.rl.once("close", () => {
      this.closed = true;
    });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    if (this.ended) {
      return null;
    }
    const next = await this.lines.next();
    if (next.done) {
      this.ended = true;
      return null;
    }
    return next.value;
  }

  close(): void {
    this.ended = true;
    if (!this.closed) {
      this.rl.close();
    }
  }
}
