import { parseGroupedDecimal, splitAmount } from "../amount.js";
import { DIALECTS } from "../dialects.js";
import { RawRow } from "../io.js";
import { LedgerRecord, ZERO_AMOUNT, createLedgerRecord } from "../schema.js";
import { ParseOptions, field, mapRows, parseIsoDate } from "./common.js";

const DESCRIPTION_FROM = 8;

/**
 * Livebank CSV (UTF-8, one header line).
 * Date in field 3 (YYYY-MM-DD), amount in field 7, purpose lines from field 8 on.
 * Zero-amount rows are balance notices and are dropped.
 */
export function parseLivebankCsv(rows: RawRow[], opts: ParseOptions): LedgerRecord[] {
  return mapRows(rows.slice(DIALECTS.livebank.headerRows), opts, (r) => {
    const amountRaw = field(r, 7, "amount");
    if (amountRaw === ZERO_AMOUNT) return null;

    const date = parseIsoDate(field(r, 3, "date"));
    const amount = parseGroupedDecimal(amountRaw);
    const description = r.slice(DESCRIPTION_FROM).join(", ").replace(/"/g, "");

    return createLedgerRecord({ date, description, ...splitAmount(amount) });
  });
}
