/**
 * hitch hello - Greet each name given
 */

import type { Command, Writer } from "@hitch/core";

export const helloCommand = (write: Writer): Command => ({
  name: "hello",
  usage: "hitch hello [names...]",
  description: "Greet each name, or the world",
  action: (args) => {
    const names = args.length > 0 ? args : ["world"];
    for (const name of names) {
      write(`Hello, ${name}!`);
    }
  },
});
