/**
 * Number formatting shared by every calculator display and log line.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { DisplayPrecision, RESISTANCE_UNITS, type ResistanceUnit } from "../core/constants.ts";

/**
 * Strip trailing zeros (and a dangling decimal point) from the mantissa of a
 * formatted number.
 */
function stripTrailingZeros(text: string): string {
  if (!text.includes(".")) {
    return text;
  }
  return text.replace(/0+$/, "").replace(/\.$/, "");
}

// ============================================================================
// Exact rounding
// ============================================================================

/**
 * value = significand · 2^exponent, both exact.
 */
function binaryParts(value: number): { significand: bigint; exponent: number } {
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & 0xfffffffffffffn;
  return biased === 0
    ? { significand: fraction, exponent: -1074 }
    : { significand: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * Integer part of magnitude · 10^power, and whether the dropped fraction is
 * exactly one half.
 */
function scaleExactly(magnitude: number, power: number): { truncated: bigint; halfway: boolean } {
  const { significand, exponent } = binaryParts(magnitude);
  let numerator = significand;
  let denominator = 1n;

  if (exponent >= 0) {
    numerator <<= BigInt(exponent);
  } else {
    denominator <<= BigInt(-exponent);
  }
  if (power >= 0) {
    numerator *= 10n ** BigInt(power);
  } else {
    denominator *= 10n ** BigInt(-power);
  }

  return {
    truncated: numerator / denominator,
    halfway: (2n * numerator) % (2n * denominator) === denominator,
  };
}

/**
 * Significand digits and decimal exponent of a positive magnitude rounded to
 * `precision` significant digits, halfway cases going to the even digit.
 */
function roundSignificant(magnitude: number, precision: number): { digits: string; exponent: number } {
  // toExponential settles the exponent after rounding (9.9999995 -> 1.00000e+1)
  // but resolves exact ties upwards.
  const [mantissa = "", exponentText = "0"] = magnitude.toExponential(precision - 1).split("e");
  const rounded = { digits: mantissa.replace(".", ""), exponent: Number.parseInt(exponentText, 10) };

  const exponent = Number.parseInt(magnitude.toExponential().split("e")[1] ?? "0", 10);
  const { truncated, halfway } = scaleExactly(magnitude, precision - 1 - exponent);
  if (halfway && truncated % 2n === 0n) {
    return { digits: truncated.toString(), exponent };
  }
  return rounded;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a number with a fixed count of significant digits in general
 * notation.
 *
 * Fixed notation is used while the decimal exponent X satisfies
 * -4 <= X < digits; exponential notation otherwise, with at least two
 * exponent digits. Trailing zeros are removed. A value exactly halfway
 * between two candidates rounds to the even one (1.0625 -> "1.062" at four
 * digits).
 *
 * @example
 * formatSignificant(3900, 6);    // "3900"
 * formatSignificant(1e-6, 6);    // "1e-06"
 * formatSignificant(3.16060279, 6); // "3.1606"
 */
export function formatSignificant(value: number, digits: number = 6): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (value === 0) {
    return "0";
  }

  const precision = Math.max(1, Math.floor(digits));
  const sign = value < 0 ? "-" : "";
  const rounded = roundSignificant(Math.abs(value), precision);
  const { exponent } = rounded;

  if (exponent < -4 || exponent >= precision) {
    const mantissa = stripTrailingZeros(`${rounded.digits.slice(0, 1)}.${rounded.digits.slice(1)}`);
    const exponentSign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${mantissa}e${exponentSign}${magnitude}`;
  }

  const fixed =
    exponent >= 0
      ? `${rounded.digits.slice(0, exponent + 1)}.${rounded.digits.slice(exponent + 1)}`
      : `0.${"0".repeat(-exponent - 1)}${rounded.digits}`;
  return `${sign}${stripTrailingZeros(fixed)}`;
}

/**
 * Pick the display unit for a resistance: MΩ from 1e6, kΩ from 1e3, else Ω.
 */
export function scaleResistance(ohms: number): { value: number; unit: ResistanceUnit } {
  const magnitude = Math.abs(ohms);
  for (const unit of RESISTANCE_UNITS) {
    if (magnitude >= unit.threshold) {
      return { value: ohms / unit.factor, unit: unit.symbol };
    }
  }
  return { value: ohms, unit: "Ω" };
}

/**
 * Resistance auto-scaled to Ω/kΩ/MΩ with four significant digits.
 *
 * @example
 * formatResistance(3900); // "3.9 kΩ"
 */
export function formatResistance(ohms: number): string {
  const { value, unit } = scaleResistance(ohms);
  return `${formatSignificant(value, DisplayPrecision.RESISTANCE)} ${unit}`;
}
