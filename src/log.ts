import chalk from "chalk";

export type Logger = {
  success(message: string): void;
  /** Expected, recoverable outcome the user should see on stdout. */
  notice(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export const consoleLogger: Logger = {
  success: (message) => console.log(chalk.green(message)),
  notice: (message) => console.log(chalk.yellow(message)),
  warn: (message) => console.warn(chalk.yellow(message)),
  error: (message) => console.error(chalk.red(message))
};
