import chalk from "chalk";
import { hostname } from "node:os";

export const VERSION = "0.1.0";

export function printBanner(): void {
  console.log("");
  console.log(chalk.bold("  host-snapshot") + chalk.dim(` v${VERSION} | ${hostname()}`));
}
