/**
 * EE Toolbox - Electrical Engineering Calculators
 *
 * Resistor color codes, series/parallel networks, RC transients, Ohm's law
 * and signal sampling, with an interactive console front end and a text log
 * of saved results.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

// Core exports
export * from "./core/index.ts";

// Formatting and log summaries
export * from "./utils/index.ts";

// Console input/output
export * from "./io/index.ts";

// Result log
export {
  FileResultLog,
  type ResultLog,
  type LogWriteResult,
  type LogViewResult,
} from "./log/result-log.ts";

// Configuration and entry point
export { loadConfig, TOOLBOX_LIMITS, DEFAULT_LOG_FILE, type ToolboxConfig } from "./config.ts";
export { runToolbox } from "./cli/toolbox.ts";
export { main, EXIT_CODES, type ExitCode, type MainOptions } from "./cli/main.ts";

// Version info
export const VERSION = "0.1.0";
