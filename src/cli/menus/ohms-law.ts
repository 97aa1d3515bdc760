/**
 * Ohm's law and power calculator.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import {
  KNOWN_PAIRS,
  createKnownPair,
  solveOhmsLaw,
  type QuantityName,
} from "../../core/circuits/index.ts";
import { DisplayPrecision } from "../../core/constants.ts";
import { formatSignificant } from "../../utils/number-format.ts";
import { ohmsLawSummary } from "../../utils/summaries.ts";
import { computeOrReport, offerToSave, showMenu, type ToolboxContext } from "../context.ts";

const QUANTITY_PROMPTS: Record<QuantityName, string> = {
  voltage: "V(V): ",
  current: "I(A): ",
  resistance: "R(Ω): ",
  power: "P(W): ",
};

export async function ohmsLawCalculator(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;
  const g = (value: number) => formatSignificant(value, DisplayPrecision.VALUE);

  showMenu(terminal, "==== Ohm’s Law / Power ====", [
    "Choose known quantities:",
    ...KNOWN_PAIRS.map((pair, i) => `${i + 1}. ${pair.label}`),
  ]);

  const choice = await reader.readInt("Select: ", 1, KNOWN_PAIRS.length);
  const pair = KNOWN_PAIRS[choice - 1];
  if (pair === undefined) {
    throw new RangeError(`No known pair for choice ${choice}`);
  }

  const [firstName, secondName] = pair.quantities;
  const first = await reader.readPositiveDouble(QUANTITY_PROMPTS[firstName]);
  const second = await reader.readPositiveDouble(QUANTITY_PROMPTS[secondName]);

  const q = computeOrReport(terminal, () => solveOhmsLaw(createKnownPair(pair.kind, first, second)));
  if (q === undefined) {
    return;
  }

  terminal.line();
  terminal.heading("--- Result ---");
  terminal.line(`Voltage  V = ${g(q.voltage)} V`);
  terminal.line(`Current  I = ${g(q.current)} A`);
  terminal.line(`Resistance R = ${g(q.resistance)} Ω`);
  terminal.line(`Power     P = ${g(q.power)} W`);

  await offerToSave(ctx, ohmsLawSummary(q));
}
