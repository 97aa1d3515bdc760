/**
 * Series and parallel combination of resistors.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { ComputationError } from "../errors.ts";

export type ConnectionMode = "series" | "parallel";

/**
 * Equivalent resistance of resistors in series: the sum of the values.
 *
 * @throws ComputationError if no resistors are given, or the sum overflows
 */
export function seriesResistance(resistances: readonly number[]): number {
  if (resistances.length === 0) {
    throw new ComputationError("No resistors provided");
  }

  const total = resistances.reduce((sum, r) => sum + r, 0);
  if (!Number.isFinite(total)) {
    throw new ComputationError(`Series total is ${total}`);
  }

  return total;
}

/**
 * Equivalent resistance of resistors in parallel: 1 / Σ(1/Rᵢ).
 *
 * @throws ComputationError if no resistors are given, or the reciprocal sum
 * is zero or not finite
 */
export function parallelResistance(resistances: readonly number[]): number {
  if (resistances.length === 0) {
    throw new ComputationError("No resistors provided");
  }

  const inverseSum = resistances.reduce((total, r) => total + 1 / r, 0);
  if (inverseSum === 0 || !Number.isFinite(inverseSum)) {
    throw new ComputationError(`Reciprocal sum is ${inverseSum}`);
  }

  return 1 / inverseSum;
}

/**
 * Combine resistors in the given connection mode.
 */
export function combineResistances(
  resistances: readonly number[],
  mode: ConnectionMode
): number {
  switch (mode) {
    case "series":
      return seriesResistance(resistances);
    case "parallel":
      return parallelResistance(resistances);
  }
}
