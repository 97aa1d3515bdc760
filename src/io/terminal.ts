/**
 * Console output for the interactive toolbox.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import chalk, { Chalk, type ChalkInstance } from "chalk";

/**
 * Destination for everything the toolbox prints.
 */
export interface Terminal {
  /** Write text as-is, without a line break (used for prompts). */
  write(text: string): void;
  /** Write a full line. */
  line(text?: string): void;
  /** Section heading such as "--- Result ---". */
  heading(text: string): void;
  success(text: string): void;
  /** Recoverable problem: bad input, an unavailable log file. */
  warn(text: string): void;
  error(text: string): void;
}

export interface ConsoleTerminalOptions {
  /**
   * Force styling on or off. By default chalk decides from the environment
   * (TTY detection, NO_COLOR, FORCE_COLOR, --no-color).
   */
  color?: boolean;
}

/**
 * Terminal writing to a Node.js stream (stdout by default), styled with chalk.
 */
export class ConsoleTerminal implements Terminal {
  private readonly stream: NodeJS.WritableStream;
  private readonly style: ChalkInstance;

  constructor(stream: NodeJS.WritableStream = process.stdout, options: ConsoleTerminalOptions = {}) {
    this.stream = stream;
    this.style = options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
  }

  write(text: string): void {
    this.stream.write(text);
  }

  line(text: string = ""): void {
    this.stream.write(`${text}\n`);
  }

  heading(text: string): void {
    this.line(this.style.bold.cyan(text));
  }

  success(text: string): void {
    this.line(this.style.green(text));
  }

  warn(text: string): void {
    this.line(this.style.yellow(text));
  }

  error(text: string): void {
    this.line(this.style.red(text));
  }
}
