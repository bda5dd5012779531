import type { PricingMode, Quote } from "@/src/lib/types";

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export const parseDecimal = (value: unknown): number | undefined => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
};

// Both sides or nothing: a one-sided book never stands in for the mid.
export const computeMidPrice = (quote: Quote): number | undefined => {
  const bid = parseDecimal(quote.bestBid);
  const ask = parseDecimal(quote.bestAsk);
  if (bid === undefined || ask === undefined) return undefined;
  return (bid + ask) / 2;
};

export const priceFor = (quote: Quote | undefined, mode: PricingMode): number | undefined => {
  if (!quote) return undefined;
  return mode === "mark" ? parseDecimal(quote.markPrice) : computeMidPrice(quote);
};
