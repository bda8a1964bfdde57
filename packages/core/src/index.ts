/**
 * hitch - Public API
 */

export type {
  Action,
  App,
  AppMeta,
  Command,
  Dispatch,
  ParsedArgs,
  Result,
  Writer,
} from "./types.js";
export { buildApp, createApp, findCommand, register } from "./app.js";
export { parseArgs } from "./parser.js";
export { renderHelp, showHelp } from "./help.js";
export { run } from "./dispatcher.js";
export { defaultWriter } from "./output.js";
export {
  helpCommand,
  versionCommand,
  withStandardCommands,
} from "./standard-commands.js";
