/**
 * Tests for the series/parallel calculator
 */

import { describe, test, expect } from "vitest";
import { seriesParallelCalculator } from "../../../src/cli/menus/series-parallel.ts";
import { createTestContext } from "../../helpers/fakes.ts";

describe("seriesParallelCalculator", () => {
  test("series total", async () => {
    const { ctx, terminal, log } = createTestContext(["3", "10", "20", "30", "1", "y"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.lines).toContain("--- Series Result ---");
    expect(terminal.lines).toContain("Approx resistance: 60 Ω");
    expect(log.entries).toEqual(["Series/Parallel: n=3, mode=series → 60 Ω"]);
  });

  test("parallel total", async () => {
    const { ctx, terminal, log } = createTestContext(["3", "10", "20", "30", "2", "y"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.lines).toContain("--- Parallel Result ---");
    expect(terminal.lines).toContain("Approx resistance: 5.455 Ω");
    expect(log.entries).toEqual(["Series/Parallel: n=3, mode=parallel → 5.45455 Ω"]);
  });

  test("prompts for each resistor in turn", async () => {
    const { ctx, terminal } = createTestContext(["2", "1000", "2200", "1", "n"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.output).toContain("Enter R1 (Ω): ");
    expect(terminal.output).toContain("Enter R2 (Ω): ");
    expect(terminal.output).not.toContain("Enter R3 (Ω): ");
    expect(terminal.lines).toContain("Approx resistance: 3.2 kΩ");
  });

  test("resistor count and values are validated", async () => {
    const { ctx, terminal } = createTestContext(["0", "11", "1", "-5", "470", "3", "2", "n"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.warnings).toEqual([
      "Value must be between 1 and 10.",
      "Value must be between 1 and 10.",
      "Value must be > 0.",
      "Value must be between 1 and 2.",
    ]);
    expect(terminal.lines).toContain("Approx resistance: 470 Ω");
  });

  test("a series total that overflows is a math error", async () => {
    const { ctx, terminal, log, source } = createTestContext(["2", "1e308", "1e308", "1"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.errors).toEqual(["Math error."]);
    expect(terminal.output).not.toContain("Approx resistance");
    expect(terminal.output).not.toContain("Save this result");
    expect(log.entries).toEqual([]);
    expect(source.remaining).toEqual([]);
  });

  test("values that overflow the reciprocal sum are a math error", async () => {
    const { ctx, terminal, log } = createTestContext(["1", "1e-320", "2"]);

    await seriesParallelCalculator(ctx);

    expect(terminal.errors).toEqual(["Math error."]);
    expect(log.entries).toEqual([]);
  });
});
