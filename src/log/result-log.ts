/**
 * Append-only text log of calculation results.
 *
 * One summary per line; file order is chronological order. Each operation
 * opens, uses and closes the file on its own, and no lock is taken, so two
 * toolbox processes writing the same file may interleave their lines.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { appendFileSync, readFileSync, writeFileSync } from "node:fs";

// ============================================================================
// Results
// ============================================================================

export type LogWriteResult = { ok: true } | { ok: false; reason: string };

export type LogViewResult =
  | { status: "ok"; contents: string }
  | { status: "unavailable"; reason: string };

/**
 * Persistent store of result summaries.
 */
export interface ResultLog {
  /** Human-readable location, shown in prompts ("calc_log.txt"). */
  readonly location: string;
  append(summary: string): LogWriteResult;
  view(): LogViewResult;
  clear(): LogWriteResult;
}

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// File-backed log
// ============================================================================

export class FileResultLog implements ResultLog {
  readonly location: string;

  constructor(path: string) {
    this.location = path;
  }

  append(summary: string): LogWriteResult {
    try {
      appendFileSync(this.location, `${summary}\n`, "utf8");
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: describeFailure(error) };
    }
  }

  view(): LogViewResult {
    try {
      return { status: "ok", contents: readFileSync(this.location, "utf8") };
    } catch (error) {
      return { status: "unavailable", reason: describeFailure(error) };
    }
  }

  clear(): LogWriteResult {
    try {
      writeFileSync(this.location, "", "utf8");
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: describeFailure(error) };
    }
  }
}
