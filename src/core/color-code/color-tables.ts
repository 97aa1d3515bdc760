/**
 * Resistor color-code lookup tables (4-band code).
 *
 * Band 1 and 2 carry digits, band 3 the multiplier and band 4 the tolerance.
 * The tables are frozen at load time and shared read-only.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

// ============================================================================
// Table entry types
// ============================================================================

export interface DigitBand {
  index: number;
  color: string;
}

export interface MultiplierBand {
  index: number;
  color: string;
  /** Short factor label, e.g. "x1k" */
  label: string;
  factor: number;
}

export interface ToleranceBand {
  index: number;
  color: string;
  /** Percentage text, e.g. "±5%" */
  tolerance: string;
}

// ============================================================================
// Tables
// ============================================================================

const DIGIT_COLORS = [
  "Black",
  "Brown",
  "Red",
  "Orange",
  "Yellow",
  "Green",
  "Blue",
  "Violet",
  "Grey",
  "White",
] as const;

export const DIGIT_BANDS: readonly DigitBand[] = Object.freeze(
  DIGIT_COLORS.map((color, index) => Object.freeze({ index, color }))
);

export const MULTIPLIER_BANDS: readonly MultiplierBand[] = Object.freeze(
  [
    { color: "Black", label: "x1", factor: 1.0 },
    { color: "Brown", label: "x10", factor: 10.0 },
    { color: "Red", label: "x100", factor: 100.0 },
    { color: "Orange", label: "x1k", factor: 1e3 },
    { color: "Yellow", label: "x10k", factor: 1e4 },
    { color: "Green", label: "x100k", factor: 1e5 },
    { color: "Blue", label: "x1M", factor: 1e6 },
    { color: "Violet", label: "x10M", factor: 1e7 },
    { color: "Grey", label: "x100M", factor: 1e8 },
    { color: "White", label: "x1G", factor: 1e9 },
    { color: "Gold", label: "x0.1", factor: 0.1 },
    { color: "Silver", label: "x0.01", factor: 0.01 },
  ].map((band, index) => Object.freeze({ index, ...band }))
);

export const TOLERANCE_BANDS: readonly ToleranceBand[] = Object.freeze(
  [
    { color: "Brown", tolerance: "±1%" },
    { color: "Red", tolerance: "±2%" },
    { color: "Green", tolerance: "±0.5%" },
    { color: "Blue", tolerance: "±0.25%" },
    { color: "Violet", tolerance: "±0.1%" },
    { color: "Grey", tolerance: "±0.05%" },
    { color: "Gold", tolerance: "±5%" },
    { color: "Silver", tolerance: "±10%" },
  ].map((band, index) => Object.freeze({ index, ...band }))
);

/** Highest multiplier index that decoding may select (White, x1G). */
export const MAX_DECODE_MULTIPLIER = 9;

// ============================================================================
// Lookups
// ============================================================================

function lookup<T>(table: readonly T[], index: number, what: string): T {
  const entry = Number.isInteger(index) ? table[index] : undefined;
  if (entry === undefined) {
    throw new RangeError(
      `${what} index must be an integer between 0 and ${table.length - 1}, got ${index}`
    );
  }
  return entry;
}

export function getDigitBand(index: number): DigitBand {
  return lookup(DIGIT_BANDS, index, "Digit band");
}

export function getMultiplierBand(index: number): MultiplierBand {
  return lookup(MULTIPLIER_BANDS, index, "Multiplier band");
}

export function getToleranceBand(index: number): ToleranceBand {
  return lookup(TOLERANCE_BANDS, index, "Tolerance band");
}

// ============================================================================
// Display names
// ============================================================================

/** "3 Orange" */
export function describeDigitBand(band: DigitBand): string {
  return `${band.index} ${band.color}`;
}

/** "2 Red x100" */
export function describeMultiplierBand(band: MultiplierBand): string {
  return `${band.index} ${band.color} ${band.label}`;
}

/** "0 Brown ±1%" */
export function describeToleranceBand(band: ToleranceBand): string {
  return `${band.index} ${band.color} ${band.tolerance}`;
}
