/**
 * Tests for the signal generation/analysis menu
 */

import { describe, test, expect } from "vitest";
import { signalMenu } from "../../../src/cli/menus/signal.ts";
import { createTestContext } from "../../helpers/fakes.ts";

describe("signalMenu", () => {
  test("period and angular frequency", async () => {
    const { ctx, terminal, log } = createTestContext(["1", "50", "y", "0"]);

    await signalMenu(ctx);

    expect(terminal.lines).toContain("Period T = 0.02 s");
    expect(terminal.lines).toContain("Angular freq ω = 314.159 rad/s");
    expect(log.entries).toEqual(["Signal: f=50 Hz, T=0.02 s, ω=314.159 rad/s"]);
  });

  test("sine samples", async () => {
    const { ctx, terminal, log } = createTestContext(["2", "1", "2", "4", "4", "y", "0"]);

    await signalMenu(ctx);

    const header = terminal.lines.indexOf("n\t t(s)\t\t x[n]");
    expect(header).toBeGreaterThan(-1);
    expect(terminal.lines[header + 1]).toBe("0\t 0\t 0");
    expect(terminal.lines[header + 2]).toBe("1\t 0.25\t 2");
    expect(terminal.lines[header + 4]?.startsWith("3\t 0.75\t ")).toBe(true);
    expect(log.entries).toEqual(["Sine: f=1 Hz, A=2, fs=4 Hz, N=4"]);
  });

  test("square samples", async () => {
    const { ctx, terminal, log } = createTestContext(["3", "1", "1", "3", "4", "4", "y", "0"]);

    await signalMenu(ctx);

    const header = terminal.lines.indexOf("n\t t(s)\t\t x[n]");
    expect(terminal.lines.slice(header + 1, header + 5)).toEqual([
      "0\t 0\t 3",
      "1\t 0.25\t 3",
      "2\t 0.5\t -3",
      "3\t 0.75\t -3",
    ]);
    expect(log.entries).toEqual(["Square: f=1 Hz, A=3, fs=4 Hz, N=4"]);
  });

  test("triangle samples", async () => {
    const { ctx, terminal } = createTestContext(["3", "2", "1", "2", "4", "4", "n", "0"]);

    await signalMenu(ctx);

    const header = terminal.lines.indexOf("n\t t(s)\t\t x[n]");
    expect(terminal.lines.slice(header + 1, header + 5)).toEqual([
      "0\t 0\t 0",
      "1\t 0.25\t 2",
      "2\t 0.5\t 0",
      "3\t 0.75\t -2",
    ]);
  });

  test("sample count is limited", async () => {
    const { ctx, terminal } = createTestContext(["2", "1", "1", "10", "101", "0", "1", "n", "0"]);

    await signalMenu(ctx);

    expect(terminal.warnings).toEqual([
      "Value must be between 1 and 100.",
      "Value must be between 1 and 100.",
    ]);
    const header = terminal.lines.indexOf("n\t t(s)\t\t x[n]");
    expect(terminal.lines[header + 1]).toBe("0\t 0\t 0");
    expect(terminal.lines[header + 2]).toBe("");
  });

  test("a frequency with no finite period is a math error", async () => {
    const { ctx, terminal, log } = createTestContext(["1", "1e-320", "0"]);

    await signalMenu(ctx);

    expect(terminal.errors).toEqual(["Math error."]);
    expect(terminal.output).not.toContain("Period T");
    expect(log.entries).toEqual([]);
  });

  test("sample times that overflow are a math error", async () => {
    const { ctx, terminal, log } = createTestContext(["2", "1", "1", "1e-320", "2", "0"]);

    await signalMenu(ctx);

    expect(terminal.errors).toEqual(["Math error."]);
    expect(terminal.lines).not.toContain("n\t t(s)\t\t x[n]");
    expect(log.entries).toEqual([]);
  });
});
