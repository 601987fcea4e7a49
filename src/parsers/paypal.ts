import { parseCommaDecimal, splitAmount } from "../amount.js";
import { DIALECTS } from "../dialects.js";
import { RawRow } from "../io.js";
import { LedgerRecord, createLedgerRecord } from "../schema.js";
import { ParseOptions, field, mapRows, parseDottedDate } from "./common.js";

/**
 * PayPal activity download (German locale).
 * Fields after quote splitting: date, time, time zone, name, type, status,
 * currency, gross, ...
 */
export function parsePaypalCsv(rows: RawRow[], opts: ParseOptions): LedgerRecord[] {
  return mapRows(rows.slice(DIALECTS.paypal.headerRows), opts, (r) => {
    const date = parseDottedDate(field(r, 0, "date"));
    const description = field(r, 3, "name");
    const amount = parseCommaDecimal(field(r, 7, "gross amount"));

    return createLedgerRecord({ date, description, ...splitAmount(amount) });
  });
}
