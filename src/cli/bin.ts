#!/usr/bin/env tsx
/**
 * ee-toolbox command
 *
 * Copyright (C) 2026, EE Toolbox Contributors.
 * License: GPL-3.0
 */

import { main } from "./main.ts";

process.exitCode = await main();
