import { describe, it, expect } from "vitest";
import { formatAmount, parseCommaDecimal, parseGroupedDecimal, splitAmount } from "../src/amount.js";

describe("splitAmount", () => {
  it("puts negative amounts on the debit side", () => {
    expect(splitAmount(-12.5)).toEqual({ credit: "0,00", debit: "12,50" });
  });

  it("puts positive amounts on the credit side", () => {
    expect(splitAmount(1234.5)).toEqual({ credit: "1234,50", debit: "0,00" });
  });

  it("treats zero as a debit of 0,00", () => {
    expect(splitAmount(0)).toEqual({ credit: "0,00", debit: "0,00" });
  });

  it("reproduces the absolute value of a two-decimal amount", () => {
    for (const s of ["0,07", "-0,07", "19,99", "-1234,56", "100,10"]) {
      const { credit, debit } = splitAmount(parseCommaDecimal(s));
      const nonZero = credit === "0,00" ? debit : credit;
      expect(nonZero).toBe(s.replace("-", ""));
    }
  });
});

describe("formatAmount", () => {
  it("always prints two fraction digits without sign", () => {
    expect(formatAmount(3)).toBe("3,00");
    expect(formatAmount(-0.5)).toBe("0,50");
    expect(formatAmount(1000000)).toBe("1000000,00");
  });
});

describe("parseCommaDecimal", () => {
  it("parses signed comma decimals", () => {
    expect(parseCommaDecimal("-12,50")).toBe(-12.5);
    expect(parseCommaDecimal("+3,1")).toBe(3.1);
    expect(parseCommaDecimal(" 7 ")).toBe(7);
  });

  it("rejects grouping, empty and non-numeric input", () => {
    expect(() => parseCommaDecimal("1.234,50")).toThrow("Unsupported amount: 1.234,50");
    expect(() => parseCommaDecimal("")).toThrow("Unsupported amount");
    expect(() => parseCommaDecimal("abc")).toThrow("Unsupported amount: abc");
  });
});

describe("parseGroupedDecimal", () => {
  it("drops dot thousands separators", () => {
    expect(parseGroupedDecimal("-1.234,56")).toBe(-1234.56);
    expect(parseGroupedDecimal("1.000.000,00")).toBe(1000000);
    expect(parseGroupedDecimal("1234,56")).toBe(1234.56);
  });

  it("rejects misplaced separators", () => {
    expect(() => parseGroupedDecimal("1.23,00")).toThrow("Unsupported amount: 1.23,00");
    expect(() => parseGroupedDecimal("12,00 EUR")).toThrow("Unsupported amount");
  });
});
