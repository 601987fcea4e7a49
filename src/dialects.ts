import { UnknownFormatError } from "./errors.js";

export type Dialect = "paypal" | "easybank" | "livebank" | "elba";

/** Encoding names as understood by iconv-lite. */
export type DialectEncoding = "latin1" | "windows-1252" | "utf-8";

export type DialectConfig = {
  label: string;
  encoding: DialectEncoding;
  /** `"` means quote-delimited fragments rather than quoted CSV fields. */
  delimiter: ";" | '"';
  /** Leading lines that carry no transactions. */
  headerRows: number;
  /** Tested against the lower-cased input path. */
  match: (lowerPath: string) => boolean;
};

/**
 * Known export dialects, in detection order: the first match wins.
 * PayPal comes first because its export keeps the default download name,
 * which may sit in a directory or file name mentioning another bank.
 */
export const DIALECTS: Record<Dialect, DialectConfig> = {
  paypal: {
    label: "PayPal",
    encoding: "utf-8",
    delimiter: '"',
    headerRows: 1,
    match: (p) => p.endsWith("download.csv")
  },
  easybank: {
    label: "Easybank",
    encoding: "windows-1252",
    delimiter: ";",
    headerRows: 0,
    match: (p) => p.includes("easybank")
  },
  livebank: {
    label: "Livebank",
    encoding: "utf-8",
    delimiter: ";",
    headerRows: 1,
    match: (p) => p.includes("livebank")
  },
  elba: {
    label: "Elba",
    encoding: "latin1",
    delimiter: ";",
    headerRows: 0,
    match: (p) => p.includes("elba")
  }
};

const DETECTION_ORDER: readonly Dialect[] = ["paypal", "easybank", "livebank", "elba"];

export function detectDialect(filePath: string): Dialect {
  const lowered = filePath.toLowerCase();
  for (const dialect of DETECTION_ORDER) {
    if (DIALECTS[dialect].match(lowered)) return dialect;
  }
  throw new UnknownFormatError(filePath);
}
