import chalk from "chalk";

export interface Logger {
  warn(message: string): void;
  debug(message: string): void;
}

// stdout carries the report, so diagnostics go to stderr
export const consoleLogger: Logger = {
  warn(message: string) {
    console.error(chalk.yellow(message));
  },
  debug(message: string) {
    if (process.env.DEBUG) {
      console.error(chalk.dim(message));
    }
  },
};

export const silentLogger: Logger = {
  warn() {},
  debug() {},
};
