/**
 * Tests for the shared menu helpers
 */

import { describe, test, expect } from "vitest";
import { computeOrReport, offerToSave, printResistance, showMenu } from "../../src/cli/context.ts";
import { ComputationError } from "../../src/core/errors.ts";
import { createTestContext } from "../helpers/fakes.ts";

describe("showMenu", () => {
  test("prints a blank line, the title and each option", () => {
    const { terminal } = createTestContext([]);

    showMenu(terminal, "Waveform:", ["1. Square", "2. Triangle"]);

    expect(terminal.output).toBe("\nWaveform:\n1. Square\n2. Triangle\n");
  });
});

describe("printResistance", () => {
  test("auto-scales the value", () => {
    const { terminal } = createTestContext([]);

    printResistance(terminal, 4.7e6);

    expect(terminal.output).toBe("Approx resistance: 4.7 MΩ\n");
  });
});

describe("offerToSave", () => {
  test("the typed answer ends the prompt line", async () => {
    const { ctx, terminal, log } = createTestContext(["y"]);

    await offerToSave(ctx, "summary");

    expect(terminal.lines).toEqual(["", 'Save this result to "memory.log"? (y/n): y', "Saved.", ""]);
    expect(log.entries).toEqual(["summary"]);
  });

  test("anything but yes is not saved", async () => {
    const { ctx, terminal, log } = createTestContext(["no"]);

    await offerToSave(ctx, "summary");

    expect(terminal.lines).toContain("Not saved.");
    expect(log.entries).toEqual([]);
  });

  test("end of input is not saved", async () => {
    const { ctx, terminal, log } = createTestContext([]);

    await offerToSave(ctx, "summary");

    expect(terminal.lines).toContain("Not saved.");
    expect(log.entries).toEqual([]);
  });
});

describe("computeOrReport", () => {
  test("returns the result of a successful calculation", () => {
    const { terminal } = createTestContext([]);

    expect(computeOrReport(terminal, () => 42)).toBe(42);
    expect(terminal.errors).toEqual([]);
  });

  test("reports a computation error as a math error", () => {
    const { terminal } = createTestContext([]);

    const result = computeOrReport(terminal, () => {
      throw new ComputationError("degenerate");
    });

    expect(result).toBeUndefined();
    expect(terminal.errors).toEqual(["Math error."]);
  });

  test("other errors propagate", () => {
    const { terminal } = createTestContext([]);

    expect(() =>
      computeOrReport(terminal, () => {
        throw new RangeError("bug");
      })
    ).toThrow(RangeError);
    expect(terminal.errors).toEqual([]);
  });
});
