/**
 * Toolbox configuration.
 *
 * Settings come from the environment and command-line flags and are checked
 * with a zod schema. Fixed input limits live in TOOLBOX_LIMITS.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "./core/errors.ts";
import {
  DIGIT_BANDS,
  MULTIPLIER_BANDS,
  TOLERANCE_BANDS,
} from "./core/color-code/index.ts";
import { MAX_SAMPLE_COUNT } from "./core/signal/index.ts";

// ============================================================================
// Input limits
// ============================================================================

export const TOOLBOX_LIMITS = {
  // Series/parallel calculator
  MIN_RESISTORS: 1,
  MAX_RESISTORS: 10,

  // Sample generation
  MIN_SAMPLES: 1,
  MAX_SAMPLES: MAX_SAMPLE_COUNT,

  // Color-code band indices (inclusive)
  MAX_DIGIT_INDEX: DIGIT_BANDS.length - 1,
  MAX_MULTIPLIER_INDEX: MULTIPLIER_BANDS.length - 1,
  MAX_TOLERANCE_INDEX: TOLERANCE_BANDS.length - 1,
} as const;

export const DEFAULT_LOG_FILE = "calc_log.txt";

/** Environment variable naming the log file */
export const LOG_FILE_ENV = "EE_TOOLBOX_LOG_FILE";

// ============================================================================
// Settings
// ============================================================================

const ConfigSchema = z.object({
  logFile: z
    .string()
    .trim()
    .min(1, "Log file path must not be empty")
    .default(DEFAULT_LOG_FILE),
  help: z.boolean().default(false),
});

export type ToolboxConfig = z.infer<typeof ConfigSchema>;

export const USAGE = `Usage: ee-toolbox [--log-file <path>]

Interactive electrical-engineering calculators.

Options:
  --log-file <path>  File that saved results are appended to
                     (default: ${DEFAULT_LOG_FILE}, or $${LOG_FILE_ENV})
  -h, --help         Show this help and exit`;

/**
 * Build the configuration from environment variables and command-line
 * arguments (without the node and script entries). Flags win over the
 * environment.
 *
 * @throws ConfigError for unknown flags or invalid values
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  args: readonly string[]
): ToolboxConfig {
  let values: { "log-file"?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: [...args],
      options: {
        "log-file": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  const parsed = ConfigSchema.safeParse({
    logFile: values["log-file"] ?? (env[LOG_FILE_ENV] || undefined),
    help: values.help,
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }

  return parsed.data;
}
