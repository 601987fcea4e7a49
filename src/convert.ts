import { DIALECTS, Dialect, detectDialect } from "./dialects.js";
import { UnknownFormatError } from "./errors.js";
import { writeLedgerCsv } from "./export.js";
import { readDialectRows } from "./io.js";
import { Logger, consoleLogger } from "./log.js";
import { PARSERS } from "./parsers/index.js";

export type ConversionResult =
  | { status: "written"; dialect: Dialect; count: number }
  | { status: "unrecognized"; message: string };

/**
 * Detect, read, parse, write. Every row is converted before the output file
 * is opened, so a malformed row leaves no partial output behind.
 */
export async function convertStatement(args: {
  input: string;
  output: string;
  logger?: Logger;
}): Promise<ConversionResult> {
  const logger = args.logger ?? consoleLogger;

  let dialect: Dialect;
  try {
    dialect = detectDialect(args.input);
  } catch (err) {
    if (!(err instanceof UnknownFormatError)) throw err;
    logger.notice(err.message);
    return { status: "unrecognized", message: err.message };
  }

  const rows = await readDialectRows(args.input, dialect);
  const records = PARSERS[dialect](rows, { file: args.input, warn: logger.warn });
  await writeLedgerCsv(args.output, records);

  logger.success(`OK: wrote ${records.length} ${DIALECTS[dialect].label} records -> ${args.output}`);
  return { status: "written", dialect, count: records.length };
}
