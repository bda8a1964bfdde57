/**
 * hitch sum - Add numbers
 */

import type { Command, Writer } from "@hitch/core";

/**
 * Parse a numeric argument. Throws on anything `Number` would not read as a
 * finite number, including the empty string.
 */
export const parseNumber = (arg: string): number => {
  const value = arg.trim() === "" ? Number.NaN : Number(arg);
  if (!Number.isFinite(value)) {
    throw new Error(`Not a number: '${arg}'`);
  }
  return value;
};

export const sumCommand = (write: Writer): Command => ({
  name: "sum",
  usage: "hitch sum <numbers...>",
  description: "Print the sum of the numbers",
  action: (args) => {
    const total = args.map(parseNumber).reduce((acc, n) => acc + n, 0);
    write(String(total));
  },
});
