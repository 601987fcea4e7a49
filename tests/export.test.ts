import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import iconv from "iconv-lite";
import { formatLedgerLine, writeLedgerCsv } from "../src/export.js";
import { createLedgerRecord } from "../src/schema.js";

describe("formatLedgerLine", () => {
  it("quotes every field, doubles embedded quotes and dots the date", () => {
    const line = formatLedgerLine(
      createLedgerRecord({ date: "2024-01-02", description: 'Say "hi"', credit: "1,00", debit: "0,00" })
    );
    expect(line).toBe('"","2024.01.02","Say ""hi""","1,00","0,00"');
  });
});

describe("writeLedgerCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "bank2ledger-export-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes UTF-8 into a fresh directory, overwriting old content", async () => {
    const out = path.join(dir, "nested", "ledger.csv");
    await fs.mkdir(path.dirname(out), { recursive: true });
    await fs.writeFile(out, "old content that is longer than the new one\n".repeat(10));

    await writeLedgerCsv(out, [
      createLedgerRecord({ sequenceNumber: "7", date: "2024-03-01", description: "Café", credit: "0,00", debit: "3,20" })
    ]);

    const buf = await fs.readFile(out);
    expect(iconv.decode(buf, "utf-8")).toBe('"7","2024.03.01","Café","0,00","3,20"\n');
    expect(buf.includes(Buffer.from([0xc3, 0xa9]))).toBe(true);
  });

  it("refuses records with both sides set", async () => {
    const out = path.join(dir, "bad.csv");
    const bad = createLedgerRecord({ date: "2024-03-01", description: "x", credit: "1,00", debit: "1,00" });
    await expect(writeLedgerCsv(out, [bad])).rejects.toThrow("credit and debit cannot both be non-zero");
    expect(existsSync(out)).toBe(false);
  });
});
