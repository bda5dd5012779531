export type OptionType = "call" | "put";

export type PricingMode = "mid" | "mark";

export type Instrument = {
  symbol: string;
  underlying: string;
  optionType: OptionType;
  strike: number;
  settlementTime: string;
  instrumentId: string;
};

export type Quote = {
  bestBid?: number | string | null;
  bestAsk?: number | string | null;
  markPrice?: number | string | null;
};

// The signal is aborted once the lookup's time budget runs out.
export type QuoteLookup = (
  instrument: Instrument,
  signal: AbortSignal
) => Promise<Quote | undefined> | Quote | undefined;

// Loose record as delivered by a catalog fetcher, before resolution.
export type CatalogRecord = {
  symbol?: string | null;
  underlying?: string | null;
  contractType?: string | null;
  strike?: number | string | null;
  settlementTime?: string | null;
  instrumentId?: string | number | null;
};
