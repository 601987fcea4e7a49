import fs from "node:fs/promises";
import path from "node:path";
import iconv from "iconv-lite";
import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";
import { DIALECTS, Dialect, DialectEncoding } from "./dialects.js";

const ParsedRecordsSchema = z.array(
  z.object({
    record: z.array(z.string()),
    info: z.object({ lines: z.number().int() })
  })
);

/** One tokenized input line; `line` is 1-based in the source file. */
export type RawRow = {
  line: number;
  fields: string[];
};

export async function readText(filePath: string, encoding: DialectEncoding): Promise<string> {
  const buf = await fs.readFile(filePath);
  return iconv.decode(buf, encoding);
}

/** Reads the whole file with the dialect's encoding and splits it into rows. */
export async function readDialectRows(filePath: string, dialect: Dialect): Promise<RawRow[]> {
  const config = DIALECTS[dialect];
  const text = await readText(filePath, config.encoding);
  return config.delimiter === '"' ? splitQuoteDelimited(text) : parseSemicolonCsv(text);
}

export function parseSemicolonCsv(text: string): RawRow[] {
  const records: unknown = parseCsv(text, {
    delimiter: ";",
    bom: true,
    info: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true
  });
  return ParsedRecordsSchema.parse(records).map(({ record, info }) => ({ line: info.lines, fields: record }));
}

/**
 * PayPal exports every field in quotes; splitting on the quote character
 * leaves the separators behind as one-character fragments.
 */
export function splitQuoteDelimited(text: string): RawRow[] {
  const rows: RawRow[] = [];
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    if (lines[i].trim() === "") continue;
    rows.push({ line: i + 1, fields: lines[i].split('"').filter((f) => f.length > 1) });
  }
  return rows;
}

export async function ensureDirForFile(filePath: string) {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
}

export async function writeEncodedText(filePath: string, text: string, encoding: DialectEncoding) {
  await ensureDirForFile(filePath);
  await fs.writeFile(filePath, iconv.encode(text, encoding));
}
