import { collapseWhitespace } from "./common.js";

/**
 * Shapes an Easybank description field can take.
 * Card rows are pipe-separated; giro rows embed a booking token such as
 * "MC/000012345" followed by counterparty details.
 */
export type EasybankDescription =
  | { kind: "card"; merchant: string; place: string; detail?: string }
  | { kind: "plain"; prefix: string }
  | { kind: "iban-bic"; prefix: string; freeText: string; iban: string; bic: string }
  | { kind: "legacy-account"; prefix: string; vendor: string; accountNumber: string; bankCode: string }
  | { kind: "unrecognized"; reason: string };

const BOOKING_TOKEN = /([A-Z]{2})\/(\d{9})/;
const IBAN_BIC = /^([A-Z]{6}[A-Z0-9]{2}\S*)\s+([A-Z]{2}\d{10,34})\s+(.*)$/;
const LEGACY_ACCOUNT = /^(.*?)\s*(\d{5,})\s+(\d{6,})\s*(.*)$/;

export function classifyEasybankDescription(raw: string): EasybankDescription {
  if (raw.includes("|")) {
    const parts = raw.split("|");
    if (parts.length === 2) return { kind: "card", merchant: parts[0], place: parts[1] };
    if (parts.length === 3) return { kind: "card", merchant: parts[0], place: parts[1], detail: parts[2] };
    return { kind: "unrecognized", reason: `card description has ${parts.length} segments` };
  }

  const token = BOOKING_TOKEN.exec(raw);
  if (!token) return { kind: "plain", prefix: raw.trim() };

  const prefix = raw.slice(0, token.index).trim();
  const suffix = raw.slice(token.index + token[0].length).trim();
  if (suffix === "") return { kind: "plain", prefix };

  const ibanBic = IBAN_BIC.exec(suffix);
  if (ibanBic) {
    return { kind: "iban-bic", prefix, bic: ibanBic[1], iban: ibanBic[2], freeText: ibanBic[3].trim() };
  }

  const legacy = LEGACY_ACCOUNT.exec(suffix);
  if (legacy) {
    const leading = legacy[1].trim();
    const trailing = legacy[4].trim();
    return {
      kind: "legacy-account",
      prefix,
      vendor: leading !== "" ? leading : trailing,
      bankCode: legacy[2],
      accountNumber: legacy[3]
    };
  }

  return { kind: "unrecognized", reason: "unknown counterparty details" };
}

/** Booking number without leading zeros ("AB/000012345" -> "12345"), or "". */
export function extractBookingReference(raw: string): string {
  if (raw.includes("|")) return "";
  const token = BOOKING_TOKEN.exec(raw);
  return token ? String(Number(token[2])) : "";
}

export function renderEasybankDescription(raw: string, warn: (message: string) => void): string {
  const d = classifyEasybankDescription(raw);
  if (d.kind === "unrecognized") {
    warn(`Easybank: ${d.reason}, keeping raw description: ${raw}`);
    return collapseWhitespace(raw);
  }
  return collapseWhitespace(formatDescription(d));
}

function formatDescription(d: Exclude<EasybankDescription, { kind: "unrecognized" }>): string {
  switch (d.kind) {
    case "card":
      return d.detail === undefined ? `${d.merchant} (${d.place})` : `${d.merchant} - ${d.place} (${d.detail})`;
    case "plain":
      return d.prefix;
    case "iban-bic":
      return `${d.prefix}: ${d.freeText} (${d.iban} ${d.bic})`;
    case "legacy-account":
      return `${d.prefix}: ${d.vendor} (${d.accountNumber} ${d.bankCode})`;
  }
}
