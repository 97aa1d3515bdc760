/**
 * RC charging/discharging calculator.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import {
  rcVoltage,
  timeConstant,
  type RcCircuit,
  type RcMode,
} from "../../core/circuits/index.ts";
import { DisplayPrecision } from "../../core/constants.ts";
import { formatSignificant } from "../../utils/number-format.ts";
import { rcSummary } from "../../utils/summaries.ts";
import { computeOrReport, offerToSave, showMenu, type ToolboxContext } from "../context.ts";

const VOLTAGE_PROMPTS: Record<RcMode, string> = {
  charge: "Enter supply voltage V (V): ",
  discharge: "Enter initial voltage V0 (V): ",
};

const RESULT_TITLES: Record<RcMode, string> = {
  charge: "--- Charging Result ---",
  discharge: "--- Discharging Result ---",
};

export async function rcTransientCalculator(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;
  const g = (value: number) => formatSignificant(value, DisplayPrecision.VALUE);

  terminal.line();
  terminal.heading("==== RC Charging/Discharging ====");
  terminal.line("Use SI units: R(Ω), C(F), t(s)");
  terminal.line();

  const circuit: RcCircuit = {
    resistance: await reader.readPositiveDouble("Enter R (Ω): "),
    capacitance: await reader.readPositiveDouble("Enter C (F): "),
  };

  const tau = computeOrReport(terminal, () => timeConstant(circuit));
  if (tau === undefined) {
    return;
  }

  terminal.line();
  terminal.line(`Time constant τ = ${g(tau)} s`);

  showMenu(terminal, "Calculation mode:", [
    "1. Charging: Vc(t) = V(1 - e^(-t/RC))",
    "2. Discharging: Vc(t) = V0 e^(-t/RC)",
  ]);
  const mode: RcMode = (await reader.readInt("Select: ", 1, 2)) === 1 ? "charge" : "discharge";

  const time = await reader.readPositiveDouble("Enter time t (s): ");
  const voltage = await reader.readPositiveDouble(VOLTAGE_PROMPTS[mode]);
  const result = rcVoltage(mode, circuit, voltage, time);

  terminal.line();
  terminal.heading(RESULT_TITLES[mode]);
  terminal.line(`Vc(t = ${g(time)} s) = ${g(result)} V`);

  await offerToSave(ctx, rcSummary(mode, circuit, voltage, time, result));
}
