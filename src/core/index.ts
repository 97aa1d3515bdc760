/**
 * Core functionality for the EE toolbox
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

// Constants and units
export * from "./constants.ts";

// Error types
export * from "./errors.ts";

// Resistor color code (tables and codec)
export * from "./color-code/index.ts";

// Circuit formulas (series/parallel, RC, Ohm's law)
export * from "./circuits/index.ts";

// Signal analysis and sampling
export * from "./signal/index.ts";
