/**
 * CLI entry logic
 */

import { run } from "@hitch/core";
import type { CliOptions } from "../types.js";
import { createCli } from "./app.js";
import { defaultIo } from "./io.js";

/**
 * Run hitch with a full argument vector (script path at index 0).
 * Returns the process exit code.
 */
export const runCli = (
  argv: readonly string[],
  options: CliOptions = {}
): number => {
  const io = options.io ?? defaultIo;

  const app = createCli({ ...options, io });
  if (!app.ok) {
    io.err(`Error: ${app.error}`);
    return 1;
  }

  try {
    run(app.value, argv, io.out);
    return 0;
  } catch (error) {
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
};
