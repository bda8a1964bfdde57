/**
 * Opt-in `help` and `version` commands.
 *
 * hitch reserves no names and parses no flags, so a host that wants these
 * conventions registers them like any other command.
 */

import type { App, AppMeta, Command, Result, Writer } from "./types.js";
import { register } from "./app.js";
import { showHelp } from "./help.js";
import { defaultWriter } from "./output.js";

/**
 * `help` command. The app is looked up when the command runs, so it can be
 * bound to a registry that already contains it.
 */
export const helpCommand = (
  getApp: () => App,
  write: Writer = defaultWriter
): Command => {
  const app = getApp();
  return {
    name: "help",
    usage: `${app.name} help`,
    description: "Show this help",
    action: () => showHelp(getApp(), write),
  };
};

/**
 * `version` command
 */
export const versionCommand = (
  meta: AppMeta,
  write: Writer = defaultWriter
): Command => ({
  name: "version",
  usage: `${meta.name} version`,
  description: "Show version",
  action: () => write(`${meta.name} v${meta.version}`),
});

/**
 * Register `help` and `version` on an app.
 * The returned app is sealed, so `help` always lists every command.
 */
export const withStandardCommands = (
  app: App,
  write: Writer = defaultWriter
): Result<App, string> => {
  let bound = app;
  const withHelp = register(
    app,
    helpCommand(() => bound, write)
  );
  if (!withHelp.ok) {
    return withHelp;
  }

  const withVersion = register(withHelp.value, versionCommand(app, write));
  if (!withVersion.ok) {
    return withVersion;
  }

  bound = Object.freeze({ ...withVersion.value, sealed: true });
  return { ok: true, value: bound };
};
