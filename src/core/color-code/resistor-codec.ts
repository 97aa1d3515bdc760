/**
 * Resistor color-code codec.
 *
 * Converts between a 4-band selection (digit, digit, multiplier, tolerance)
 * and a resistance in ohms, in both directions.
 *
 * ## Decoding a resistance
 *
 * The value is normalized to a two-digit base in [10, 100) by scaling by 10
 * and moving the multiplier index, which is held within [0, 9]: gold and
 * silver (fractional multipliers) are never selected when decoding. The base
 * is rounded half up; a base that rounds to 100 carries into the next
 * multiplier. Values whose rounded base falls outside the index bounds
 * (below 9.5 Ω, or from 99.5 GΩ up) still produce bands, flagged as outside
 * the nominal range.
 *
 * No tolerance is derived when decoding; the tolerance band remains a choice
 * for the caller.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import {
  getDigitBand,
  getMultiplierBand,
  getToleranceBand,
  MAX_DECODE_MULTIPLIER,
  type DigitBand,
  type MultiplierBand,
  type ToleranceBand,
} from "./color-tables.ts";

// ============================================================================
// Types
// ============================================================================

/**
 * Band indices chosen by the user.
 */
export interface BandSelection {
  readonly digit1: number;
  readonly digit2: number;
  readonly multiplier: number;
  readonly tolerance: number;
}

export interface EncodedResistor {
  readonly selection: BandSelection;
  readonly bands: {
    readonly digit1: DigitBand;
    readonly digit2: DigitBand;
    readonly multiplier: MultiplierBand;
    readonly tolerance: ToleranceBand;
  };
  /** Two-digit significand, digit1 * 10 + digit2 */
  readonly base: number;
  /** Resistance in ohms */
  readonly resistance: number;
  /** Tolerance text, e.g. "±5%" */
  readonly tolerance: string;
}

export interface DecodedResistor {
  readonly resistance: number;
  readonly digit1: DigitBand;
  readonly digit2: DigitBand;
  readonly multiplier: MultiplierBand;
  /**
   * False when the resistance could not be brought into a two-significant
   * digit base within the multiplier bounds; the bands are then the nearest
   * representable approximation.
   */
  readonly inNominalRange: boolean;
}

const BASE_MIN = 10;
const BASE_MAX = 100;

// ============================================================================
// Encode: bands -> resistance
// ============================================================================

/**
 * Resistance described by a band selection.
 *
 * @throws RangeError if any index falls outside its table
 *
 * @example
 * bandsToResistance({ digit1: 3, digit2: 9, multiplier: 2, tolerance: 0 }).resistance; // 3900
 */
export function bandsToResistance(selection: BandSelection): EncodedResistor {
  const digit1 = getDigitBand(selection.digit1);
  const digit2 = getDigitBand(selection.digit2);
  const multiplier = getMultiplierBand(selection.multiplier);
  const tolerance = getToleranceBand(selection.tolerance);

  const base = digit1.index * 10 + digit2.index;

  return {
    selection,
    bands: { digit1, digit2, multiplier, tolerance },
    base,
    resistance: base * multiplier.factor,
    tolerance: tolerance.tolerance,
  };
}

// ============================================================================
// Decode: resistance -> bands
// ============================================================================

/**
 * Nearest two-significant-digit band selection for a resistance.
 *
 * @param resistance - Resistance in ohms, expected to be positive
 * @throws RangeError if the resistance is negative or not finite
 *
 * @example
 * const bands = resistanceToBands(4700);
 * // bands.digit1.color === "Yellow", bands.digit2.color === "Violet",
 * // bands.multiplier.color === "Red"
 */
export function resistanceToBands(resistance: number): DecodedResistor {
  if (!Number.isFinite(resistance) || resistance < 0) {
    throw new RangeError(`Resistance must be a finite, non-negative number, got ${resistance}`);
  }

  let base = resistance;
  let multiplier = 0;

  while (base >= BASE_MAX && multiplier < MAX_DECODE_MULTIPLIER) {
    base /= 10;
    multiplier++;
  }
  while (base < BASE_MIN && multiplier > 0) {
    base *= 10;
    multiplier--;
  }

  let rounded = Math.floor(base + 0.5);
  let inNominalRange = rounded >= BASE_MIN;
  if (rounded >= BASE_MAX) {
    if (multiplier < MAX_DECODE_MULTIPLIER) {
      rounded = BASE_MIN;
      multiplier++;
    } else {
      // White is the last multiplier a decode may use; saturate at 99.
      rounded = BASE_MAX - 1;
      inNominalRange = false;
    }
  }

  return {
    resistance,
    digit1: getDigitBand(Math.floor(rounded / 10)),
    digit2: getDigitBand(rounded % 10),
    multiplier: getMultiplierBand(multiplier),
    inNominalRange,
  };
}

/**
 * Resistance represented by decoded bands (the approximation actually
 * encoded by the colors).
 */
export function decodedResistance(decoded: DecodedResistor): number {
  return (decoded.digit1.index * 10 + decoded.digit2.index) * decoded.multiplier.factor;
}
