/**
 * hitch command registry
 */

import { buildApp, withStandardCommands } from "@hitch/core";
import type { App, Result } from "@hitch/core";
import { echoCommand } from "../commands/echo.js";
import { helloCommand } from "../commands/hello.js";
import { sumCommand } from "../commands/sum.js";
import type { CliOptions } from "../types.js";
import { renderBanner } from "./banner.js";
import { NAME, VERSION } from "./constants.js";
import { defaultIo } from "./io.js";

/**
 * Build the hitch app
 */
export const createCli = (options: CliOptions = {}): Result<App, string> => {
  const { out } = options.io ?? defaultIo;

  const base = buildApp(
    {
      name: NAME,
      displayName: renderBanner(options.color),
      usage: `${NAME} <command> [args...]`,
      version: VERSION,
      description: "Demo host for the hitch dispatcher",
    },
    [helloCommand(out), sumCommand(out), echoCommand(out)]
  );
  if (!base.ok) {
    return base;
  }

  return withStandardCommands(base.value, out);
};
