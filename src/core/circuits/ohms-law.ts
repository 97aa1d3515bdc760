/**
 * Ohm's law and power.
 *
 * Given two of voltage, current, resistance and power, derive the other two.
 * There is no general equation solver: each of the six known pairs has its
 * own fixed derivation, and every case returns all four quantities.
 *
 * | Known  | Derivation              |
 * |--------|-------------------------|
 * | V & R  | I = V/R, P = V·I        |
 * | V & I  | R = V/I, P = V·I        |
 * | V & P  | I = P/V, R = V/I        |
 * | I & R  | V = I·R, P = V·I        |
 * | I & P  | V = P/I, R = V/I        |
 * | R & P  | V = √(P·R), I = V/R     |
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { ComputationError } from "../errors.ts";

export interface ElectricalQuantities {
  /** Volts */
  voltage: number;
  /** Amperes */
  current: number;
  /** Ohms */
  resistance: number;
  /** Watts */
  power: number;
}

/**
 * The two known quantities, tagged by which pair they are.
 */
export type KnownPair =
  | { kind: "voltage-resistance"; voltage: number; resistance: number }
  | { kind: "voltage-current"; voltage: number; current: number }
  | { kind: "voltage-power"; voltage: number; power: number }
  | { kind: "current-resistance"; current: number; resistance: number }
  | { kind: "current-power"; current: number; power: number }
  | { kind: "resistance-power"; resistance: number; power: number };

export type KnownPairKind = KnownPair["kind"];

function deriveQuantities(known: KnownPair): ElectricalQuantities {
  switch (known.kind) {
    case "voltage-resistance": {
      const { voltage, resistance } = known;
      const current = voltage / resistance;
      return { voltage, current, resistance, power: voltage * current };
    }
    case "voltage-current": {
      const { voltage, current } = known;
      return { voltage, current, resistance: voltage / current, power: voltage * current };
    }
    case "voltage-power": {
      const { voltage, power } = known;
      const current = power / voltage;
      return { voltage, current, resistance: voltage / current, power };
    }
    case "current-resistance": {
      const { current, resistance } = known;
      const voltage = current * resistance;
      return { voltage, current, resistance, power: voltage * current };
    }
    case "current-power": {
      const { current, power } = known;
      const voltage = power / current;
      return { voltage, current, resistance: voltage / current, power };
    }
    case "resistance-power": {
      const { resistance, power } = known;
      const voltage = Math.sqrt(power * resistance);
      return { voltage, current: voltage / resistance, resistance, power };
    }
  }
}

/**
 * Derive all four quantities from a known pair of positive values.
 *
 * @throws ComputationError if a derived quantity overflows or underflows to 0
 *
 * @example
 * solveOhmsLaw({ kind: "voltage-resistance", voltage: 12, resistance: 4 });
 * // { voltage: 12, current: 3, resistance: 4, power: 36 }
 */
export function solveOhmsLaw(known: KnownPair): ElectricalQuantities {
  const quantities = deriveQuantities(known);
  for (const name of QUANTITY_NAMES) {
    const value = quantities[name];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ComputationError(`Derived ${name} is ${value}`);
    }
  }
  return quantities;
}

export type QuantityName = keyof ElectricalQuantities;

const QUANTITY_NAMES: readonly QuantityName[] = ["voltage", "current", "resistance", "power"];

/**
 * The six pairs in menu order, with the quantities each asks for.
 */
export const KNOWN_PAIRS: ReadonlyArray<{
  kind: KnownPairKind;
  label: string;
  quantities: readonly [QuantityName, QuantityName];
}> = [
  { kind: "voltage-resistance", label: "V & R", quantities: ["voltage", "resistance"] },
  { kind: "voltage-current", label: "V & I", quantities: ["voltage", "current"] },
  { kind: "voltage-power", label: "V & P", quantities: ["voltage", "power"] },
  { kind: "current-resistance", label: "I & R", quantities: ["current", "resistance"] },
  { kind: "current-power", label: "I & P", quantities: ["current", "power"] },
  { kind: "resistance-power", label: "R & P", quantities: ["resistance", "power"] },
];

/**
 * Build a known pair from its two values, given in the order listed in
 * KNOWN_PAIRS.
 */
export function createKnownPair(kind: KnownPairKind, first: number, second: number): KnownPair {
  switch (kind) {
    case "voltage-resistance":
      return { kind, voltage: first, resistance: second };
    case "voltage-current":
      return { kind, voltage: first, current: second };
    case "voltage-power":
      return { kind, voltage: first, power: second };
    case "current-resistance":
      return { kind, current: first, resistance: second };
    case "current-power":
      return { kind, current: first, power: second };
    case "resistance-power":
      return { kind, resistance: first, power: second };
  }
}
