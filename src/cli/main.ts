/**
 * Toolbox entry point: wires configuration, console streams and the log
 * file to the menus, and maps the outcome to a process exit status.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import chalk from "chalk";
import { loadConfig, USAGE, type ToolboxConfig } from "../config.ts";
import { ConfigError, EndOfInputError } from "../core/errors.ts";
import { StreamLineSource } from "../io/line-source.ts";
import { ConsoleTerminal } from "../io/terminal.ts";
import { ValidatedReader } from "../io/validated-reader.ts";
import { FileResultLog } from "../log/result-log.ts";
import { runToolbox } from "./toolbox.ts";

export const EXIT_CODES = {
  OK: 0,
  INPUT_CLOSED: 1,
  USAGE: 64,
  INTERNAL_ERROR: 70,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface MainOptions {
  /** Command-line arguments after the script name */
  args?: readonly string[];
  env?: Record<string, string | undefined>;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Force colored output on or off (default: detect) */
  color?: boolean;
}

export async function main(options: MainOptions = {}): Promise<ExitCode> {
  const output = options.output ?? process.stdout;
  const terminal = new ConsoleTerminal(output, { color: options.color });

  let config: ToolboxConfig;
  try {
    config = loadConfig(options.env ?? process.env, options.args ?? process.argv.slice(2));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`Invalid configuration: ${error.message}`));
      console.error(USAGE);
      return EXIT_CODES.USAGE;
    }
    throw error;
  }

  if (config.help) {
    terminal.line(USAGE);
    return EXIT_CODES.OK;
  }

  const source = new StreamLineSource(options.input ?? process.stdin);
  const reader = new ValidatedReader(source, terminal);
  const log = new FileResultLog(config.logFile);

  try {
    await runToolbox({ reader, terminal, log });
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof EndOfInputError) {
      terminal.line();
      terminal.error("Input error. Exiting.");
      return EXIT_CODES.INPUT_CLOSED;
    }
    console.error("Internal error:", error);
    return EXIT_CODES.INTERNAL_ERROR;
  } finally {
    source.close();
  }
}
