/**
 * Command registry
 *
 * Every operation returns a new frozen App and leaves its input untouched.
 */

import type { App, AppMeta, Command, Result } from "./types.js";

/**
 * Create an app with no commands
 */
export const createApp = (meta: AppMeta): App =>
  Object.freeze({ ...meta, commands: Object.freeze([]) });

/**
 * Find a command by exact name, in registration order
 */
export const findCommand = (
  app: App,
  token: string
): Command | undefined => app.commands.find((c) => c.name === token);

/**
 * Append a command to the registry.
 * Names must be non-empty and unique, and the app must not be sealed.
 */
export const register = (app: App, command: Command): Result<App, string> => {
  if (app.sealed) {
    return {
      ok: false,
      error: `Cannot register '${command.name}': app is sealed by its help command`,
    };
  }

  if (command.name.length === 0) {
    return { ok: false, error: "Command name must not be empty" };
  }

  if (findCommand(app, command.name)) {
    return {
      ok: false,
      error: `Command '${command.name}' is already registered`,
    };
  }

  return {
    ok: true,
    value: Object.freeze({
      ...app,
      commands: Object.freeze([...app.commands, command]),
    }),
  };
};

/**
 * Build an app from metadata and a command list, stopping at the first
 * registration error
 */
export const buildApp = (
  meta: AppMeta,
  commands: readonly Command[]
): Result<App, string> => {
  let app = createApp(meta);
  for (const command of commands) {
    const result = register(app, command);
    if (!result.ok) {
      return result;
    }
    app = result.value;
  }
  return { ok: true, value: app };
};
