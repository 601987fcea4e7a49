import { ZERO_AMOUNT } from "./schema.js";

export type AmountSplit = {
  credit: string;
  debit: string;
};

/**
 * Two-column representation of a signed amount.
 * Zero and negative values land on the debit side.
 */
export function splitAmount(value: number): AmountSplit {
  if (value <= 0) return { credit: ZERO_AMOUNT, debit: formatAmount(Math.abs(value)) };
  return { credit: formatAmount(value), debit: ZERO_AMOUNT };
}

/** "1234,50": two fraction digits, comma separator, no sign. */
export function formatAmount(value: number): string {
  return Math.abs(value).toFixed(2).replace(".", ",");
}

/** Parses "-12,50" / "+12,50" / "12". */
export function parseCommaDecimal(s: string): number {
  const cleaned = s.trim();
  if (!/^[+-]?\d+(?:,\d+)?$/.test(cleaned)) throw new Error(`Unsupported amount: ${s}`);
  return Number(cleaned.replace(",", "."));
}

/** Parses amounts with dot thousands grouping, e.g. "-1.234,50". */
export function parseGroupedDecimal(s: string): number {
  const cleaned = s.trim();
  if (!/^[+-]?(?:\d{1,3}(?:\.\d{3})+|\d+)(?:,\d+)?$/.test(cleaned)) {
    throw new Error(`Unsupported amount: ${s}`);
  }
  return Number(cleaned.replace(/\./g, "").replace(",", "."));
}
