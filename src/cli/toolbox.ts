/**
 * Top-level toolbox menu.
 *
 * Each module menu returns to this one when the user picks 0; there is no
 * way to jump straight from one module to another.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import type { ToolboxContext } from "./context.ts";
import { resistorColorCodeMenu } from "./menus/resistor-color-code.ts";
import { seriesParallelCalculator } from "./menus/series-parallel.ts";
import { rcTransientCalculator } from "./menus/rc-transient.ts";
import { ohmsLawCalculator } from "./menus/ohms-law.ts";
import { signalMenu } from "./menus/signal.ts";
import { logToolsMenu } from "./menus/log-tools.ts";

interface ToolboxModule {
  title: string;
  run: (ctx: ToolboxContext) => Promise<void>;
}

export const TOOLBOX_MODULES: readonly ToolboxModule[] = [
  { title: "Resistor Color Code", run: resistorColorCodeMenu },
  { title: "Series/Parallel Resistors", run: seriesParallelCalculator },
  { title: "RC Charge/Discharge", run: rcTransientCalculator },
  { title: "Ohm’s Law & Power", run: ohmsLawCalculator },
  { title: "Signal Generation/Analysis", run: signalMenu },
  { title: "File/Log Tools", run: logToolsMenu },
];

const BANNER = "====================================";

/**
 * Run the toolbox until the user chooses 0 at the top level.
 *
 * @throws EndOfInputError if the input ends while a choice or value is needed
 */
export async function runToolbox(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;

  for (;;) {
    terminal.line();
    terminal.heading(BANNER);
    terminal.heading("     Electrical Engineering Toolbox");
    terminal.heading(BANNER);
    TOOLBOX_MODULES.forEach((entry, i) => terminal.line(`${i + 1}. ${entry.title}`));
    terminal.line("0. Exit");

    const choice = await reader.readInt("Select: ", 0, TOOLBOX_MODULES.length);
    if (choice === 0) {
      return;
    }

    const selected = TOOLBOX_MODULES[choice - 1];
    if (selected) {
      await selected.run(ctx);
    }
  }
}
