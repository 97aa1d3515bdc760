/**
 * Tests for series and parallel combination
 */

import { describe, test, expect } from "vitest";
import {
  seriesResistance,
  parallelResistance,
  combineResistances,
} from "../../../src/core/circuits/resistor-network.ts";
import { ComputationError } from "../../../src/core/errors.ts";

describe("seriesResistance", () => {
  test("10, 20 and 30 Ω in series is 60 Ω", () => {
    expect(seriesResistance([10, 20, 30])).toBe(60);
  });

  test("N equal resistors give N·R", () => {
    expect(seriesResistance([100, 100, 100, 100])).toBe(400);
  });

  test("a single resistor is itself", () => {
    expect(seriesResistance([47])).toBe(47);
  });

  test("rejects an empty list", () => {
    expect(() => seriesResistance([])).toThrow(ComputationError);
  });

  test("a total that overflows is a computation error", () => {
    expect(() => seriesResistance([1e308, 1e308])).toThrow(ComputationError);
  });
});

describe("parallelResistance", () => {
  test("10, 20 and 30 Ω in parallel is 60/11 Ω", () => {
    expect(parallelResistance([10, 20, 30])).toBeCloseTo(5.4545, 4);
    expect(parallelResistance([10, 20, 30])).toBeCloseTo(60 / 11, 10);
  });

  test("N equal resistors give R/N", () => {
    expect(parallelResistance([100, 100, 100, 100])).toBeCloseTo(25, 10);
    expect(parallelResistance([330, 330])).toBeCloseTo(165, 10);
  });

  test("is never larger than the smallest resistor", () => {
    expect(parallelResistance([1, 1e6])).toBeLessThan(1);
  });

  test("a zero reciprocal sum is a computation error", () => {
    expect(() => parallelResistance([Infinity, Infinity])).toThrow(ComputationError);
  });

  test("rejects an empty list", () => {
    expect(() => parallelResistance([])).toThrow(ComputationError);
  });
});

describe("combineResistances", () => {
  test("dispatches on the connection mode", () => {
    expect(combineResistances([10, 20, 30], "series")).toBe(60);
    expect(combineResistances([10, 20, 30], "parallel")).toBeCloseTo(60 / 11, 10);
  });
});
