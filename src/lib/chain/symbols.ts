import type { OptionType } from "@/src/lib/types";

export type ParsedOptionSymbol = {
  underlying: string;
  optionType: OptionType;
  strike: number;
  expiry: string;
};

const MONTHS = ["JAN", "FEB", "MAR", "APR", "MAY", "JUN", "JUL", "AUG", "SEP", "OCT", "NOV", "DEC"];

// C-BTC-128400-290825
const DELTA_PATTERN = /^(?<cp>[CP])-(?<root>[A-Z0-9]+)-(?<strike>\d+(?:\.\d+)?)-(?<ddmmyy>\d{6})$/;
// BTC-29AUG25-128400-C
const DATED_PATTERN =
  /^(?<root>[A-Z0-9]+)-(?<day>\d{1,2})(?<mon>[A-Z]{3})(?<yy>\d{2})-(?<strike>\d+(?:\.\d+)?)-(?<cp>[CP])$/;

const toIsoDate = (year: number, month: number, day: number) => {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
};

const toOptionType = (cp: string): OptionType => (cp === "P" ? "put" : "call");

export const parseOptionSymbol = (symbol: string): ParsedOptionSymbol | null => {
  const normalized = symbol.trim().toUpperCase();

  const delta = DELTA_PATTERN.exec(normalized);
  if (delta?.groups) {
    const { cp, root, strike, ddmmyy } = delta.groups;
    const expiry = toIsoDate(
      2000 + Number(ddmmyy.slice(4, 6)),
      Number(ddmmyy.slice(2, 4)),
      Number(ddmmyy.slice(0, 2))
    );
    if (!expiry) return null;
    return { underlying: root, optionType: toOptionType(cp), strike: Number(strike), expiry };
  }

  const dated = DATED_PATTERN.exec(normalized);
  if (dated?.groups) {
    const { root, day, mon, yy, strike, cp } = dated.groups;
    const monthIndex = MONTHS.indexOf(mon);
    if (monthIndex === -1) return null;
    const expiry = toIsoDate(2000 + Number(yy), monthIndex + 1, Number(day));
    if (!expiry) return null;
    return { underlying: root, optionType: toOptionType(cp), strike: Number(strike), expiry };
  }

  return null;
};
