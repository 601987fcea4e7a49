import fs from "node:fs";
import { Command, InvalidArgumentError } from "commander";

import { convertStatement } from "./convert.js";
import { Logger, consoleLogger } from "./log.js";

export const VERSION = "0.1.0";

function readableFile(value: string): string {
  try {
    fs.accessSync(value, fs.constants.R_OK);
  } catch {
    throw new InvalidArgumentError(`Input file does not exist or is not readable: ${value}`);
  }
  if (!fs.statSync(value).isFile()) throw new InvalidArgumentError(`Input is not a file: ${value}`);
  return value;
}

export function createProgram(logger: Logger = consoleLogger): Command {
  const program = new Command();

  program
    .name("bank2ledger")
    .description("Convert a bank CSV export (PayPal, Easybank, Livebank, Elba) into ledger CSV.")
    .version(VERSION)
    .argument("<input>", "Bank export file; the dialect is picked from its file name", readableFile)
    .argument("<output>", "Ledger CSV to write (overwritten)")
    .action(async (input: string, output: string) => {
      await convertStatement({ input, output, logger });
    });

  return program;
}
