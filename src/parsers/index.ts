import { Dialect } from "../dialects.js";
import { DialectParser } from "./common.js";
import { parseEasybankCsv } from "./easybank.js";
import { parseElbaCsv } from "./elba.js";
import { parseLivebankCsv } from "./livebank.js";
import { parsePaypalCsv } from "./paypal.js";

export const PARSERS: Record<Dialect, DialectParser> = {
  paypal: parsePaypalCsv,
  easybank: parseEasybankCsv,
  livebank: parseLivebankCsv,
  elba: parseElbaCsv
};
