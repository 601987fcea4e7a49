import { DialectEncoding } from "./dialects.js";
import { writeEncodedText } from "./io.js";
import { LedgerRecord, LedgerRecordsSchema } from "./schema.js";

/** UTF-8 holds every character any of the input dialects can carry. */
export const OUTPUT_ENCODING: DialectEncoding = "utf-8";

export function formatLedgerLine(r: LedgerRecord): string {
  return [r.sequenceNumber, r.date.replace(/-/g, "."), r.description, r.credit, r.debit].map(quote).join(",");
}

export function formatLedgerCsv(records: LedgerRecord[]): string {
  return records.map((r) => formatLedgerLine(r) + "\n").join("");
}

export async function writeLedgerCsv(filePath: string, records: LedgerRecord[]): Promise<void> {
  // Validate before writing.
  const parsed = LedgerRecordsSchema.parse(records);
  await writeEncodedText(filePath, formatLedgerCsv(parsed), OUTPUT_ENCODING);
}

function quote(v: string): string {
  return `"${v.replace(/"/g, '""')}"`;
}
