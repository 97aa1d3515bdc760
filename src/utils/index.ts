/**
 * Formatting utilities
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

export * from "./number-format.ts";
export * from "./summaries.ts";
