import type { Instrument, PricingMode } from "./options";

export type ChainRow = {
  strike: number;
  callPrice?: number;
  putPrice?: number;
  callSymbol?: string;
  putSymbol?: string;
};

export type MalformedInstrumentCode =
  | "MISSING_SYMBOL"
  | "UNKNOWN_UNDERLYING"
  | "UNKNOWN_OPTION_TYPE"
  | "INVALID_STRIKE"
  | "INVALID_SETTLEMENT_TIME";

export type DroppedInstrument = {
  symbol: string;
  reason: MalformedInstrumentCode;
};

export type NearestExpirySelection =
  | { status: "ok"; expiry: string; instruments: Instrument[] }
  | { status: "empty"; instruments: [] };

export type ChainRequest = {
  underlying: string;
  pricingMode: PricingMode;
  now?: Date;
  futureOnly?: boolean;
  quoteTimeoutMs?: number;
};

export type ChainResponse =
  | {
      status: "ok";
      underlying: string;
      expiry: string;
      pricingMode: PricingMode;
      rows: ChainRow[];
      dropped: DroppedInstrument[];
      generatedAt: string;
    }
  | {
      status: "empty";
      underlying: string;
      pricingMode: PricingMode;
      rows: [];
      dropped: DroppedInstrument[];
      message: string;
      generatedAt: string;
    };
