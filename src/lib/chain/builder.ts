import type { Instrument, PricingMode, Quote, QuoteLookup } from "@/src/lib/types";
import type { ChainRow } from "@/src/lib/types/chain";
import { ChainPreconditionError } from "@/src/lib/errors";
import { createLogger } from "@/src/lib/logger";
import { priceFor } from "./pricing";

export const DEFAULT_QUOTE_TIMEOUT_MS = 5000;

export type StrikePair = {
  call?: Instrument;
  put?: Instrument;
};

export type BuildChainOptions = {
  timeoutMs?: number;
};

const logger = createLogger("Chain");

// First instrument per (type, strike) wins; later ones are logged and skipped.
export const pairByStrike = (instruments: Instrument[]) => {
  const pairs = new Map<number, StrikePair>();
  const duplicates: Instrument[] = [];

  instruments.forEach((instrument) => {
    const pair = pairs.get(instrument.strike) ?? {};
    if (pair[instrument.optionType]) {
      duplicates.push(instrument);
      return;
    }
    pair[instrument.optionType] = instrument;
    pairs.set(instrument.strike, pair);
  });

  duplicates.forEach((instrument) => {
    logger.warn(
      `Ignoring duplicate ${instrument.optionType} at strike ${instrument.strike}: ${instrument.symbol}`
    );
  });

  return pairs;
};

export const assembleChainRows = (
  pairs: Map<number, StrikePair>,
  quotes: Map<Instrument, Quote | undefined>,
  pricingMode: PricingMode
): ChainRow[] => {
  const price = (instrument?: Instrument) =>
    instrument ? priceFor(quotes.get(instrument), pricingMode) : undefined;

  return Array.from(pairs.keys())
    .sort((a, b) => a - b)
    .map((strike) => {
      const { call, put } = pairs.get(strike) ?? {};
      return {
        strike,
        callPrice: price(call),
        putPrice: price(put),
        callSymbol: call?.symbol,
        putSymbol: put?.symbol
      };
    });
};

const withTimeout = <T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
) =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`Quote lookup timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    run(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (reason: unknown) => {
        clearTimeout(timer);
        reject(reason);
      }
    );
  });

const lookupQuote = async (
  instrument: Instrument,
  quoteLookup: QuoteLookup,
  timeoutMs: number
): Promise<Quote | undefined> => {
  try {
    return await withTimeout(
      (signal) => Promise.resolve().then(() => quoteLookup(instrument, signal)),
      timeoutMs
    );
  } catch (err) {
    logger.warn(
      `Quote unavailable for ${instrument.symbol}: ${err instanceof Error ? err.message : String(err)}`
    );
    return undefined;
  }
};

export const buildChain = async (
  instruments: Instrument[],
  quoteLookup: QuoteLookup,
  pricingMode: PricingMode,
  options: BuildChainOptions = {}
): Promise<ChainRow[]> => {
  if (!Array.isArray(instruments)) {
    throw new ChainPreconditionError("instruments must be an array.");
  }
  if (typeof quoteLookup !== "function") {
    throw new ChainPreconditionError("quoteLookup must be a function.");
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_QUOTE_TIMEOUT_MS;
  const pairs = pairByStrike(instruments);
  const chosen = Array.from(pairs.values()).flatMap((pair) =>
    [pair.call, pair.put].filter((item): item is Instrument => Boolean(item))
  );

  const settled = await Promise.all(
    chosen.map(async (instrument) => {
      const quote = await lookupQuote(instrument, quoteLookup, timeoutMs);
      return [instrument, quote] as const;
    })
  );

  return assembleChainRows(pairs, new Map(settled), pricingMode);
};
