#!/usr/bin/env node

/**
 * Game Data Finder CLI entry point
 */

import { runCli } from "./program.js";
import { createProcessIo } from "./lib/io.js";

process.exitCode = await runCli(process.argv.slice(2), createProcessIo());
