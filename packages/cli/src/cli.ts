#!/usr/bin/env node

/**
 * prioset CLI entry point
 */

import { processIo } from "./lib/io.js";
import { runProgram } from "./program.js";

process.exitCode = await runProgram(process.argv.slice(2), processIo);
