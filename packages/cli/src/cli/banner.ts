/**
 * Help banner
 */

import pc from "picocolors";

export const renderBanner = (color: boolean = pc.isColorSupported): string => {
  const c = pc.createColors(color);
  return `${c.bold(c.cyan("hitch"))} ${c.dim("- tiny subcommand dispatcher")}`;
};
