import { RowParseError } from "../errors.js";
import { RawRow } from "../io.js";
import { LedgerRecord } from "../schema.js";

export type ParseOptions = {
  file?: string;
  /** Receives soft, per-row notices; the row is still converted. */
  warn?: (message: string) => void;
};

export type DialectParser = (rows: RawRow[], opts: ParseOptions) => LedgerRecord[];

/** Runs `convert` on every row, attaching file and line to any failure. */
export function mapRows(
  rows: RawRow[],
  opts: ParseOptions,
  convert: (fields: string[], row: RawRow) => LedgerRecord | null
): LedgerRecord[] {
  const out: LedgerRecord[] = [];
  for (const row of rows) {
    let record: LedgerRecord | null;
    try {
      record = convert(row.fields, row);
    } catch (err) {
      if (err instanceof RowParseError) throw err;
      throw new RowParseError(opts.file, row.line, err instanceof Error ? err.message : String(err));
    }
    if (record) out.push(record);
  }
  return out;
}

export function field(fields: string[], index: number, name: string): string {
  const v = fields[index];
  if (v === undefined) throw new Error(`missing ${name} (field ${index}, row has ${fields.length})`);
  return v;
}

/** DD.MM.YYYY -> YYYY-MM-DD */
export function parseDottedDate(s: string): string {
  const m = s.trim().match(/^(\d{2})\.(\d{2})\.(\d{4})$/);
  if (!m) throw new Error(`Unsupported date format: ${s}`);
  return checkedIsoDate(m[3], m[2], m[1], s);
}

/** YYYY-MM-DD, validated as a calendar date. */
export function parseIsoDate(s: string): string {
  const m = s.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) throw new Error(`Unsupported date format: ${s}`);
  return checkedIsoDate(m[1], m[2], m[3], s);
}

function checkedIsoDate(yyyy: string, mm: string, dd: string, raw: string): string {
  const d = new Date(Date.UTC(Number(yyyy), Number(mm) - 1, Number(dd)));
  if (d.getUTCFullYear() !== Number(yyyy) || d.getUTCMonth() !== Number(mm) - 1 || d.getUTCDate() !== Number(dd)) {
    throw new Error(`Invalid calendar date: ${raw}`);
  }
  return `${yyyy}-${mm}-${dd}`;
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}
