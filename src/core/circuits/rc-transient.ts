/**
 * RC charging and discharging transients.
 *
 * All quantities in SI units: R in ohms, C in farads, t in seconds, V in volts.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { ComputationError } from "../errors.ts";

export type RcMode = "charge" | "discharge";

export interface RcCircuit {
  /** Resistance in ohms */
  resistance: number;
  /** Capacitance in farads */
  capacitance: number;
}

/**
 * Time constant τ = R·C in seconds.
 *
 * @throws ComputationError if the product underflows to 0 or overflows
 */
export function timeConstant(circuit: RcCircuit): number {
  const tau = circuit.resistance * circuit.capacitance;
  if (tau === 0 || !Number.isFinite(tau)) {
    throw new ComputationError(`Time constant is ${tau}`);
  }
  return tau;
}

/**
 * Capacitor voltage while charging from 0 V towards the supply:
 * Vc(t) = V·(1 − e^(−t/RC)).
 */
export function rcChargeVoltage(
  circuit: RcCircuit,
  supplyVoltage: number,
  time: number
): number {
  return supplyVoltage * (1.0 - Math.exp(-time / timeConstant(circuit)));
}

/**
 * Capacitor voltage while discharging from V0: Vc(t) = V0·e^(−t/RC).
 */
export function rcDischargeVoltage(
  circuit: RcCircuit,
  initialVoltage: number,
  time: number
): number {
  return initialVoltage * Math.exp(-time / timeConstant(circuit));
}

/**
 * Capacitor voltage for either mode. `voltage` is the supply voltage when
 * charging and the initial voltage when discharging.
 */
export function rcVoltage(
  mode: RcMode,
  circuit: RcCircuit,
  voltage: number,
  time: number
): number {
  return mode === "charge"
    ? rcChargeVoltage(circuit, voltage, time)
    : rcDischargeVoltage(circuit, voltage, time);
}
