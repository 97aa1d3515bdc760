/**
 * Error types raised by the toolbox.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

/**
 * A formula reached a degenerate state (for example a zero reciprocal sum in
 * a parallel combination). The calculation is abandoned; nothing is shown or
 * logged.
 */
export class ComputationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ComputationError";
  }
}

/**
 * The input stream closed while a value was still required. No further
 * interaction is possible, so this ends the program.
 */
export class EndOfInputError extends Error {
  constructor(message: string = "Input stream closed") {
    super(message);
    this.name = "EndOfInputError";
  }
}

/**
 * Invalid command-line flags or environment settings.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
