/**
 * Default output sink
 */

import type { Writer } from "./types.js";

export const defaultWriter: Writer = (text) => {
  console.log(text);
};
