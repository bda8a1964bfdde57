/**
 * hitch echo - Print arguments back
 */

import type { Command, Writer } from "@hitch/core";

export const echoCommand = (write: Writer): Command => ({
  name: "echo",
  usage: "hitch echo [words...]",
  action: (args) => write(args.join(" ")),
});
