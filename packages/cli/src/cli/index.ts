/**
 * CLI - Public API
 */

export { NAME, VERSION } from "./constants.js";
export { renderBanner } from "./banner.js";
export { createCli } from "./app.js";
export { runCli } from "./dispatcher.js";
export { defaultIo } from "./io.js";
