import { parseGroupedDecimal, splitAmount } from "../amount.js";
import { RawRow } from "../io.js";
import { LedgerRecord, createLedgerRecord } from "../schema.js";
import { consoleLogger } from "../log.js";
import { ParseOptions, field, mapRows, parseDottedDate } from "./common.js";
import { extractBookingReference, renderEasybankDescription } from "./easybank-description.js";

/**
 * Easybank export (Windows-1252, no header).
 * Observed format: account; description; booking date; value date; amount; currency
 */
export function parseEasybankCsv(rows: RawRow[], opts: ParseOptions): LedgerRecord[] {
  const warn = opts.warn ?? consoleLogger.warn;

  return mapRows(rows, opts, (r, row) => {
    const raw = field(r, 1, "description");
    const date = parseDottedDate(field(r, 2, "date"));
    const amount = parseGroupedDecimal(field(r, 4, "amount"));

    return createLedgerRecord({
      sequenceNumber: extractBookingReference(raw),
      date,
      description: renderEasybankDescription(raw, (message) => warn(`line ${row.line}: ${message}`)),
      ...splitAmount(amount)
    });
  });
}
