/**
 * Global constants used across the toolbox.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

/**
 * Resistance display units
 */
export type ResistanceUnit = "Ω" | "kΩ" | "MΩ";

/**
 * Get multiplier to convert from a resistance unit to ohms
 */
export function getMultiplierToOhms(unit: ResistanceUnit): number {
  switch (unit) {
    case "MΩ":
      return 1e6;
    case "kΩ":
      return 1e3;
    case "Ω":
    default:
      return 1.0;
  }
}

/**
 * Scaled units in the order they are tried, largest first. A value is shown
 * in a unit once its magnitude reaches the unit's threshold.
 */
export const RESISTANCE_UNITS: ReadonlyArray<{
  symbol: ResistanceUnit;
  factor: number;
  threshold: number;
}> = [
  { symbol: "MΩ", factor: getMultiplierToOhms("MΩ"), threshold: 1e6 },
  { symbol: "kΩ", factor: getMultiplierToOhms("kΩ"), threshold: 1e3 },
];

/**
 * Mathematical constants
 */
export const MathConstants = {
  /** Full turn in radians */
  TWO_PI: 2 * Math.PI,
} as const;

/**
 * Significant digits used when printing results
 */
export const DisplayPrecision = {
  /** Calculated values and log summaries */
  VALUE: 6,

  /** Auto-scaled resistance ("Approx resistance: 3.9 kΩ") */
  RESISTANCE: 4,
} as const;
