/**
 * Tests for toolbox constants
 */

import { describe, test, expect } from "vitest";
import {
  MathConstants,
  DisplayPrecision,
  RESISTANCE_UNITS,
  getMultiplierToOhms,
} from "../../src/core/constants.ts";

describe("Math Constants", () => {
  test("TWO_PI is a full turn", () => {
    expect(MathConstants.TWO_PI).toBeCloseTo(2 * Math.PI, 12);
  });
});

describe("Display precision", () => {
  test("values use six significant digits, resistance four", () => {
    expect(DisplayPrecision.VALUE).toBe(6);
    expect(DisplayPrecision.RESISTANCE).toBe(4);
  });
});

describe("getMultiplierToOhms", () => {
  test("converts display units to ohms", () => {
    expect(getMultiplierToOhms("Ω")).toBe(1);
    expect(getMultiplierToOhms("kΩ")).toBe(1e3);
    expect(getMultiplierToOhms("MΩ")).toBe(1e6);
  });
});

describe("RESISTANCE_UNITS", () => {
  test("are ordered largest first", () => {
    expect(RESISTANCE_UNITS.map((u) => u.symbol)).toEqual(["MΩ", "kΩ"]);
  });

  test("thresholds match the unit factors", () => {
    for (const unit of RESISTANCE_UNITS) {
      expect(unit.threshold).toBe(unit.factor);
    }
  });
});
