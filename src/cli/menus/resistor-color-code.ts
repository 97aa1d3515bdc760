/**
 * Resistor color code menu: bands to resistance, resistance to bands, and
 * the reference tables.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import {
  DIGIT_BANDS,
  MULTIPLIER_BANDS,
  TOLERANCE_BANDS,
  bandsToResistance,
  resistanceToBands,
  decodedResistance,
  describeDigitBand,
  describeMultiplierBand,
  describeToleranceBand,
} from "../../core/color-code/index.ts";
import type { Terminal } from "../../io/terminal.ts";
import { TOOLBOX_LIMITS } from "../../config.ts";
import { formatResistance } from "../../utils/number-format.ts";
import {
  colorToResistanceSummary,
  resistanceToColorSummary,
} from "../../utils/summaries.ts";
import { offerToSave, printResistance, showMenu, type ToolboxContext } from "../context.ts";

// ============================================================================
// Tables
// ============================================================================

function printDigitTable(terminal: Terminal): void {
  showMenu(terminal, "== Digit Color Table (Band 1 & 2) ==", DIGIT_BANDS.map(describeDigitBand));
}

function printMultiplierTable(terminal: Terminal): void {
  showMenu(
    terminal,
    "== Multiplier Color Table (Band 3) ==",
    MULTIPLIER_BANDS.map(describeMultiplierBand)
  );
}

function printToleranceTable(terminal: Terminal): void {
  showMenu(
    terminal,
    "== Tolerance Color Table (Band 4) ==",
    TOLERANCE_BANDS.map(describeToleranceBand)
  );
}

export function printColorTables(terminal: Terminal): void {
  terminal.line();
  terminal.heading("=== Resistor Color Code Tables ===");
  printDigitTable(terminal);
  printMultiplierTable(terminal);
  printToleranceTable(terminal);
  terminal.line();
  terminal.line("4-band meaning:");
  terminal.line("  Band 1: 1st digit");
  terminal.line("  Band 2: 2nd digit");
  terminal.line("  Band 3: multiplier");
  terminal.line("  Band 4: tolerance");
}

// ============================================================================
// Color -> resistance
// ============================================================================

export async function colorToResistance(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;
  const maxDigit = TOOLBOX_LIMITS.MAX_DIGIT_INDEX;
  const maxMultiplier = TOOLBOX_LIMITS.MAX_MULTIPLIER_INDEX;
  const maxTolerance = TOOLBOX_LIMITS.MAX_TOLERANCE_INDEX;

  terminal.line();
  terminal.heading("=== Color → Resistance (4-band) ===");

  printDigitTable(terminal);
  const digit1 = await reader.readInt(`Select Band 1 (0–${maxDigit}): `, 0, maxDigit);
  const digit2 = await reader.readInt(`Select Band 2 (0–${maxDigit}): `, 0, maxDigit);

  printMultiplierTable(terminal);
  const multiplier = await reader.readInt(`Select Multiplier (0–${maxMultiplier}): `, 0, maxMultiplier);

  printToleranceTable(terminal);
  const tolerance = await reader.readInt(`Select Tolerance (0–${maxTolerance}): `, 0, maxTolerance);

  const encoded = bandsToResistance({ digit1, digit2, multiplier, tolerance });
  const { bands } = encoded;

  terminal.line();
  terminal.heading("--- Result ---");
  terminal.line(
    `Bands: ${describeDigitBand(bands.digit1)} | ${describeDigitBand(bands.digit2)} | ` +
      `${describeMultiplierBand(bands.multiplier)} | ${describeToleranceBand(bands.tolerance)}`
  );
  printResistance(terminal, encoded.resistance);
  terminal.line(`Tolerance: ${encoded.tolerance}`);

  await offerToSave(ctx, colorToResistanceSummary(encoded));
}

// ============================================================================
// Resistance -> color
// ============================================================================

export async function resistanceToColor(ctx: ToolboxContext): Promise<void> {
  const { reader, terminal } = ctx;

  terminal.line();
  terminal.heading("=== Resistance → Color (approx) ===");
  terminal.line("Uses two significant digits.");

  const resistance = await reader.readPositiveDouble("Enter resistance (Ω): ");
  const decoded = resistanceToBands(resistance);

  terminal.line();
  terminal.heading("--- Suggested Colors ---");
  printResistance(terminal, resistance);
  terminal.line(`Band 1: ${describeDigitBand(decoded.digit1)}`);
  terminal.line(`Band 2: ${describeDigitBand(decoded.digit2)}`);
  terminal.line(`Band 3: ${describeMultiplierBand(decoded.multiplier)}`);
  terminal.line("Band 4: (choose based on component tolerance)");

  if (!decoded.inNominalRange) {
    terminal.warn(
      `Note: outside the two-digit color code range (10 Ω to 99 GΩ); ` +
        `these bands give ${formatResistance(decodedResistance(decoded))}.`
    );
  }

  await offerToSave(ctx, resistanceToColorSummary(decoded));
}

// ============================================================================
// Menu
// ============================================================================

export async function resistorColorCodeMenu(ctx: ToolboxContext): Promise<void> {
  for (;;) {
    showMenu(ctx.terminal, "== Resistor Color Code Tool ==", [
      "1. Color → Resistance",
      "2. Resistance → Color",
      "3. Show Tables",
      "0. Back",
    ]);

    const choice = await ctx.reader.readInt("Select: ", 0, 3);
    switch (choice) {
      case 0:
        return;
      case 1:
        await colorToResistance(ctx);
        break;
      case 2:
        await resistanceToColor(ctx);
        break;
      case 3:
        printColorTables(ctx.terminal);
        break;
    }
  }
}
