/**
 * Type definitions for the hitch demo CLI
 */

import type { Writer } from "@hitch/core";

/**
 * Output channels
 */
export type CliIo = {
  readonly out: Writer;
  readonly err: Writer;
};

export type CliOptions = {
  readonly io?: CliIo;
  readonly color?: boolean;
};
