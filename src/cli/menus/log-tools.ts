/**
 * File/log tools: view or clear the result log.
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { showMenu, type ToolboxContext } from "../context.ts";

export function viewLog(ctx: ToolboxContext): void {
  const { terminal } = ctx;
  const result = ctx.log.view();

  if (result.status === "unavailable") {
    terminal.warn("No file or cannot open (maybe empty).");
    return;
  }

  terminal.line();
  terminal.heading("--- File Start ---");
  terminal.write(result.contents);
  if (result.contents.length > 0 && !result.contents.endsWith("\n")) {
    terminal.line();
  }
  terminal.heading("--- File End ---");
}

export function clearLog(ctx: ToolboxContext): void {
  const result = ctx.log.clear();
  if (result.ok) {
    ctx.terminal.success("File cleared.");
  } else {
    ctx.terminal.warn(`Failed to clear file. (${result.reason})`);
  }
}

export async function logToolsMenu(ctx: ToolboxContext): Promise<void> {
  for (;;) {
    showMenu(ctx.terminal, "==== File & Log Tools ====", [
      `Current log file: "${ctx.log.location}"`,
      "1. View file",
      "2. Clear file",
      "0. Back",
    ]);

    const choice = await ctx.reader.readInt("Select: ", 0, 2);
    switch (choice) {
      case 0:
        return;
      case 1:
        viewLog(ctx);
        break;
      case 2:
        clearLog(ctx);
        break;
    }
  }
}
