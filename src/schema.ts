import { z } from "zod";

export const ZERO_AMOUNT = "0,00";

/** Fixed-point amount as the ledger expects it: "1234,50". */
const AmountString = z.string().regex(/^\d+,\d{2}$/);

/**
 * One transaction as the ledger import reads it.
 * Exactly one side carries the amount; the other stays "0,00".
 */
export const LedgerRecordSchema = z
  .object({
    /** Booking reference, when the bank provides one. */
    sequenceNumber: z.string().default(""),
    /** ISO date (YYYY-MM-DD). */
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
    description: z.string(),
    credit: AmountString,
    debit: AmountString
  })
  .refine((r) => r.credit === ZERO_AMOUNT || r.debit === ZERO_AMOUNT, {
    message: "credit and debit cannot both be non-zero"
  });

export const LedgerRecordsSchema = z.array(LedgerRecordSchema);

export type LedgerRecord = z.infer<typeof LedgerRecordSchema>;

export function createLedgerRecord(fields: {
  sequenceNumber?: string;
  date: string;
  description: string;
  credit: string;
  debit: string;
}): LedgerRecord {
  return {
    sequenceNumber: fields.sequenceNumber ?? "",
    date: fields.date,
    description: fields.description,
    credit: fields.credit,
    debit: fields.debit
  };
}
