/**
 * CLI registry and entry logic
 * Re-exports from cli/ subdirectory
 */

export {
  NAME,
  VERSION,
  renderBanner,
  createCli,
  runCli,
  defaultIo,
} from "./cli/index.js";
