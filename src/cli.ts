#!/usr/bin/env node
import { createProgram } from "./program.js";
import { consoleLogger } from "./log.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    consoleLogger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 1;
  });
