#!/usr/bin/env node

/**
 * logbook - CLI
 */

import { runCli } from "./program.js";

process.exitCode = runCli(process.argv.slice(2));
