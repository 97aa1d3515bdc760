/**
 * Shared state and helpers for the interactive menus.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { ComputationError } from "../core/errors.ts";
import type { ValidatedReader } from "../io/validated-reader.ts";
import type { Terminal } from "../io/terminal.ts";
import type { ResultLog } from "../log/result-log.ts";
import { formatResistance } from "../utils/number-format.ts";

export interface ToolboxContext {
  reader: ValidatedReader;
  terminal: Terminal;
  log: ResultLog;
}

/**
 * Print a menu: a blank line, the title, then one line per option.
 */
export function showMenu(terminal: Terminal, title: string, options: readonly string[]): void {
  terminal.line();
  terminal.heading(title);
  for (const option of options) {
    terminal.line(option);
  }
}

/**
 * "Approx resistance: 3.9 kΩ"
 */
export function printResistance(terminal: Terminal, ohms: number): void {
  terminal.line(`Approx resistance: ${formatResistance(ohms)}`);
}

/**
 * Run a calculation. A ComputationError is reported as "Math error." and
 * gives undefined, so the caller shows and logs nothing.
 */
export function computeOrReport<T>(terminal: Terminal, compute: () => T): T | undefined {
  try {
    return compute();
  } catch (error) {
    if (error instanceof ComputationError) {
      terminal.error("Math error.");
      return undefined;
    }
    throw error;
  }
}

/**
 * Ask whether to keep a result and append it to the log on a yes.
 * A log that cannot be written is reported and otherwise ignored.
 */
export async function offerToSave(ctx: ToolboxContext, summary: string): Promise<void> {
  ctx.terminal.line();
  const save = await ctx.reader.confirm(`Save this result to "${ctx.log.location}"? (y/n): `);

  if (!save) {
    ctx.terminal.line("Not saved.");
    return;
  }

  const result = ctx.log.append(summary);
  if (result.ok) {
    ctx.terminal.success("Saved.");
  } else {
    ctx.terminal.warn(`Could not open log file. (${result.reason})`);
  }
}
