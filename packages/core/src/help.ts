/**
 * Help output
 */

import type { App, Command, Writer } from "./types.js";
import { defaultWriter } from "./output.js";

const formatCommand = (command: Command, width: number): string => {
  const line = `  ${command.name.padEnd(width)}  ${command.usage}`;
  return command.description ? `${line} - ${command.description}` : line;
};

/**
 * Render the help text of an app
 */
export const renderHelp = (app: App): string => {
  const lines: string[] = [];

  if (app.displayName) {
    lines.push(app.displayName, "");
  }

  lines.push(`${app.name} v${app.version}`);
  if (app.description) {
    lines.push(app.description);
  }
  if (app.author) {
    lines.push(`Author: ${app.author}`);
  }

  lines.push("", "USAGE:", `  ${app.usage}`);

  if (app.commands.length > 0) {
    const width = Math.max(...app.commands.map((c) => c.name.length));
    lines.push("", "COMMANDS:");
    for (const command of app.commands) {
      lines.push(formatCommand(command, width));
    }
  }

  return lines.join("\n");
};

/**
 * Show help message
 */
export const showHelp = (app: App, write: Writer = defaultWriter): void => {
  write(renderHelp(app));
};
