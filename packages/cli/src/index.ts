#!/usr/bin/env node
/**
 * hitch CLI - demo host for the hitch dispatcher
 */

import { runCli } from "./cli.js";

// Keep the script path at index 0; hitch dispatches on index 1
process.exitCode = runCli(process.argv.slice(1));
