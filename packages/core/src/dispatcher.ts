/**
 * Command dispatcher
 */

import type { App, Dispatch, Writer } from "./types.js";
import { findCommand } from "./app.js";
import { showHelp } from "./help.js";
import { defaultWriter } from "./output.js";
import { parseArgs } from "./parser.js";

/**
 * Dispatch a full argument vector (program path at index 0).
 *
 * Calls the action registered under `argv[1]` with the arguments after it,
 * or writes help when the token is missing or unknown. Errors thrown by the
 * action are not caught.
 */
export const run = (
  app: App,
  argv: readonly string[],
  write: Writer = defaultWriter
): Dispatch => {
  const { token, args } = parseArgs(argv);

  if (token === undefined) {
    showHelp(app, write);
    return { kind: "help", reason: "missing" };
  }

  const command = findCommand(app, token);
  if (!command) {
    showHelp(app, write);
    return { kind: "help", reason: "unknown", token };
  }

  command.action(args);
  return { kind: "action", command: command.name, args };
};
