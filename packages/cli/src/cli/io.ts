/**
 * Process output channels
 */

import type { CliIo } from "../types.js";

export const defaultIo: CliIo = {
  out: (text) => {
    console.log(text);
  },
  err: (text) => {
    console.error(text);
  },
};
