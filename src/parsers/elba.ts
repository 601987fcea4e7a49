import { parseCommaDecimal, splitAmount } from "../amount.js";
import { RawRow } from "../io.js";
import { LedgerRecord, createLedgerRecord } from "../schema.js";
import { ParseOptions, collapseWhitespace, field, mapRows, parseDottedDate } from "./common.js";

/**
 * Raiffeisen ELBA export (ISO-8859-1, no header).
 * Observed format, every line terminated by a trailing ";":
 *  - booking date (DD.MM.YYYY)
 *  - description
 *  - value date
 *  - amount ("-12,50")
 *  - currency
 */
export function parseElbaCsv(rows: RawRow[], opts: ParseOptions): LedgerRecord[] {
  return mapRows(rows, opts, (fields) => {
    const r = fields.length > 0 && fields[fields.length - 1] === "" ? fields.slice(0, -1) : fields;

    const date = parseDottedDate(field(r, 0, "date"));
    const description = collapseWhitespace(field(r, 1, "description").replace(/^"+|"+$/g, ""));
    const amount = parseCommaDecimal(field(r, 3, "amount"));

    return createLedgerRecord({ date, description, ...splitAmount(amount) });
  });
}
