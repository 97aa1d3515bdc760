/**
 * Series/parallel resistor calculator.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { combineResistances, type ConnectionMode } from "../../core/circuits/index.ts";
import { TOOLBOX_LIMITS } from "../../config.ts";
import { networkSummary } from "../../utils/summaries.ts";
import {
  computeOrReport,
  offerToSave,
  printResistance,
  showMenu,
  type ToolboxContext,
} from "../context.ts";

const MODE_TITLES: Record<ConnectionMode, string> = {
  series: "--- Series Result ---",
  parallel: "--- Parallel Result ---",
};

export async function seriesParallelCalculator(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;
  const { MIN_RESISTORS, MAX_RESISTORS } = TOOLBOX_LIMITS;

  terminal.line();
  terminal.heading("==== Series / Parallel Resistors ====");

  const count = await reader.readInt(
    `Number of resistors (${MIN_RESISTORS}–${MAX_RESISTORS}): `,
    MIN_RESISTORS,
    MAX_RESISTORS
  );

  const resistances: number[] = [];
  for (let i = 1; i <= count; i++) {
    resistances.push(await reader.readPositiveDouble(`Enter R${i} (Ω): `));
  }

  showMenu(terminal, "Connection Type:", ["1. Series", "2. Parallel"]);
  const mode: ConnectionMode = (await reader.readInt("Select: ", 1, 2)) === 1 ? "series" : "parallel";

  const total = computeOrReport(terminal, () => combineResistances(resistances, mode));
  if (total === undefined) {
    return;
  }

  terminal.line();
  terminal.heading(MODE_TITLES[mode]);
  printResistance(terminal, total);

  await offerToSave(ctx, networkSummary(count, mode, total));
}
