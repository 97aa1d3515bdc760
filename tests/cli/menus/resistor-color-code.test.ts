/**
 * Tests for the resistor color code menu
 */

import { describe, test, expect } from "vitest";
import { resistorColorCodeMenu } from "../../../src/cli/menus/resistor-color-code.ts";
import { createTestContext } from "../../helpers/fakes.ts";

describe("resistorColorCodeMenu", () => {
  test("color to resistance shows and saves the result", async () => {
    const { ctx, terminal, log, source } = createTestContext(["1", "3", "9", "2", "0", "y", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.lines).toContain("Bands: 3 Orange | 9 White | 2 Red x100 | 0 Brown ±1%");
    expect(terminal.lines).toContain("Approx resistance: 3.9 kΩ");
    expect(terminal.lines).toContain("Tolerance: ±1%");
    expect(terminal.lines).toContain("Saved.");
    expect(log.entries).toEqual(["[Color→Resistance] (3,9,m=2,t=0) = 3900 Ω, tol ±1%"]);
    expect(source.remaining).toEqual([]);
  });

  test("band indices are range checked", async () => {
    const { ctx, terminal, log } = createTestContext(["1", "10", "1", "0", "12", "3", "8", "5", "n", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.warnings).toEqual([
      "Value must be between 0 and 9.",
      "Value must be between 0 and 11.",
      "Value must be between 0 and 7.",
    ]);
    expect(terminal.lines).toContain("Bands: 1 Brown | 0 Black | 3 Orange x1k | 5 Grey ±0.05%");
    expect(terminal.lines).toContain("Approx resistance: 10 kΩ");
    expect(terminal.lines).toContain("Not saved.");
    expect(log.entries).toEqual([]);
  });

  test("resistance to color suggests the bands", async () => {
    const { ctx, terminal, log } = createTestContext(["2", "4700", "y", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.lines).toContain("Approx resistance: 4.7 kΩ");
    expect(terminal.lines).toContain("Band 1: 4 Yellow");
    expect(terminal.lines).toContain("Band 2: 7 Violet");
    expect(terminal.lines).toContain("Band 3: 2 Red x100");
    expect(terminal.lines).toContain("Band 4: (choose based on component tolerance)");
    expect(terminal.warnings).toEqual([]);
    expect(log.entries).toEqual(["[Resistance→Color] R=4700 → (4,7,m=2)"]);
  });

  test("resistance below the code range is flagged", async () => {
    const { ctx, terminal } = createTestContext(["2", "0.5", "n", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.lines).toContain("Approx resistance: 0.5 Ω");
    expect(terminal.lines).toContain("Band 1: 0 Black");
    expect(terminal.lines).toContain("Band 2: 1 Brown");
    expect(terminal.lines).toContain("Band 3: 0 Black x1");
    expect(terminal.warnings).toEqual([
      "Note: outside the two-digit color code range (10 Ω to 99 GΩ); these bands give 1 Ω.",
    ]);
  });

  test("no range note when the value rounds up to 10 Ω", async () => {
    const { ctx, terminal, log } = createTestContext(["2", "9.96", "y", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.lines).toContain("Band 1: 1 Brown");
    expect(terminal.lines).toContain("Band 2: 0 Black");
    expect(terminal.warnings).toEqual([]);
    expect(log.entries).toEqual(["[Resistance→Color] R=9.96 → (1,0,m=0)"]);
  });

  test("show tables lists every band", async () => {
    const { ctx, terminal } = createTestContext(["3", "0"]);

    await resistorColorCodeMenu(ctx);

    expect(terminal.lines).toContain("=== Resistor Color Code Tables ===");
    expect(terminal.lines).toContain("9 White");
    expect(terminal.lines).toContain("11 Silver x0.01");
    expect(terminal.lines).toContain("7 Silver ±10%");
    expect(terminal.lines).toContain("  Band 4: tolerance");
  });

  test("a log that cannot be written is reported", async () => {
    const { ctx, terminal, log } = createTestContext(["2", "4700", "y", "0"]);
    log.available = false;

    await resistorColorCodeMenu(ctx);

    expect(terminal.warnings).toEqual(["Could not open log file. (unavailable)"]);
  });
});
