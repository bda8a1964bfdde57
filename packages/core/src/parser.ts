/**
 * Process argument splitting
 */

import type { ParsedArgs } from "./types.js";

/**
 * Split a full argument vector into the subcommand token and the remaining
 * arguments. Index 0 is the program path and is skipped. Nothing is
 * interpreted as a flag.
 */
export const parseArgs = (argv: readonly string[]): ParsedArgs => {
  const token = argv[1];
  const args = argv.slice(2);

  return token === undefined ? { args } : { token, args };
};
