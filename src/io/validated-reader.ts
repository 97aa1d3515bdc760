/**
 * Validated console input.
 *
 * Every read shows its prompt, takes one line and repeats until the line
 * holds a valid value. A number must fill the whole line: leading
 * whitespace and trailing spaces or tabs are allowed, anything else after the
 * number is rejected. The only way out of the loop without a value is the end
 * of input, which raises EndOfInputError.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { EndOfInputError } from "../core/errors.ts";
import type { LineSource } from "./line-source.ts";
import type { Terminal } from "./terminal.ts";

// ============================================================================
// Parsing
// ============================================================================

export type ParseResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

const INTEGER_PREFIX = /^\s*([+-]?\d+)([\s\S]*)$/;
const DECIMAL_PREFIX = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)([\s\S]*)$/;
const TRAILING_BLANKS = /^[ \t]*$/;

/**
 * Parse an integer that must lie in [min, max].
 */
export function parseIntegerInput(text: string, min: number, max: number): ParseResult<number> {
  const match = INTEGER_PREFIX.exec(text);
  if (!match) {
    return { valid: false, error: "Please enter an integer." };
  }

  const [, digits = "", rest = ""] = match;
  if (!TRAILING_BLANKS.test(rest)) {
    return { valid: false, error: "Unexpected characters. Try again." };
  }

  const value = Number.parseInt(digits, 10);
  if (value < min || value > max) {
    return { valid: false, error: `Value must be between ${min} and ${max}.` };
  }

  return { valid: true, value };
}

/**
 * Parse a decimal number that must be strictly positive.
 */
export function parsePositiveDoubleInput(text: string): ParseResult<number> {
  const match = DECIMAL_PREFIX.exec(text);
  if (!match) {
    return { valid: false, error: "Enter a valid number." };
  }

  const [, number = "", rest = ""] = match;
  if (!TRAILING_BLANKS.test(rest)) {
    return { valid: false, error: "Invalid characters. Try again." };
  }

  const value = Number.parseFloat(number);
  if (!(value > 0)) {
    return { valid: false, error: "Value must be > 0." };
  }
  if (!Number.isFinite(value)) {
    return { valid: false, error: "Value is too large." };
  }

  return { valid: true, value };
}

/**
 * True for an answer starting with "y" or "Y".
 */
export function isAffirmative(answer: string): boolean {
  return answer.startsWith("y") || answer.startsWith("Y");
}

// ============================================================================
// Reader
// ============================================================================

export class ValidatedReader {
  private readonly source: LineSource;
  private readonly terminal: Terminal;

  constructor(source: LineSource, terminal: Terminal) {
    this.source = source;
    this.terminal = terminal;
  }

  /**
   * Read an integer in [min, max], re-prompting until one is entered.
   *
   * @throws EndOfInputError if the input ends first
   */
  async readInt(prompt: string, min: number, max: number): Promise<number> {
    return this.readUntilValid(prompt, (line) => parseIntegerInput(line, min, max));
  }

  /**
   * Read a number greater than zero, re-prompting until one is entered.
   *
   * @throws EndOfInputError if the input ends first
   */
  async readPositiveDouble(prompt: string): Promise<number> {
    return this.readUntilValid(prompt, parsePositiveDoubleInput);
  }

  /**
   * Ask a yes/no question. Anything but an answer starting with y/Y,
   * including the end of input, counts as no.
   */
  async confirm(prompt: string): Promise<boolean> {
    this.terminal.write(prompt);
    const answer = await this.source.readLine();
    if (answer === null) {
      this.terminal.line();
      return false;
    }
    return isAffirmative(answer);
  }

  private async readUntilValid<T>(
    prompt: string,
    parse: (line: string) => ParseResult<T>
  ): Promise<T> {
    for (;;) {
      this.terminal.write(prompt);

      const line = await this.source.readLine();
      if (line === null) {
        throw new EndOfInputError();
      }

      const result = parse(line);
      if (result.valid) {
        return result.value;
      }
      this.terminal.warn(result.error);
    }
  }
}
