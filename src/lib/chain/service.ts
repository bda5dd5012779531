import type { CatalogRecord, Instrument, Quote } from "@/src/lib/types";
import type { ChainRequest, ChainResponse } from "@/src/lib/types/chain";
import { CatalogUnavailableError } from "@/src/lib/errors";
import { createLogger } from "@/src/lib/logger";
import { buildChain } from "./builder";
import { selectNearestExpiryInstruments } from "./expiry";
import { resolveCatalog } from "./instruments";

export type ChainDataSource = {
  getOptionCatalog: () => Promise<CatalogRecord[]>;
  getQuote: (symbol: string, options?: { signal?: AbortSignal }) => Promise<Quote>;
};

const logger = createLogger("Chain");

export const loadOptionsChain = async (
  source: ChainDataSource,
  request: ChainRequest
): Promise<ChainResponse> => {
  const underlying = request.underlying.trim().toUpperCase();
  const now = request.now ?? new Date();

  let records: CatalogRecord[];
  try {
    records = await source.getOptionCatalog();
  } catch (err) {
    logger.error("Catalog fetch failed", err);
    throw new CatalogUnavailableError(
      `Option catalog unavailable: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  const { instruments, dropped } = resolveCatalog(records);
  if (dropped.length > 0) {
    logger.warn(`Dropped ${dropped.length} malformed instrument(s)`);
  }

  const selection = selectNearestExpiryInstruments(instruments, underlying, now, {
    futureOnly: request.futureOnly
  });

  if (selection.status === "empty") {
    return {
      status: "empty",
      underlying,
      pricingMode: request.pricingMode,
      rows: [],
      dropped,
      message: `No options found for ${underlying} at the nearest expiry.`,
      generatedAt: now.toISOString()
    };
  }

  const rows = await buildChain(
    selection.instruments,
    (instrument: Instrument, signal: AbortSignal) =>
      source.getQuote(instrument.symbol, { signal }),
    request.pricingMode,
    { timeoutMs: request.quoteTimeoutMs }
  );

  logger.debug(`Built ${rows.length} row(s) for ${underlying} ${selection.expiry}`);

  return {
    status: "ok",
    underlying,
    expiry: selection.expiry,
    pricingMode: request.pricingMode,
    rows,
    dropped,
    generatedAt: now.toISOString()
  };
};
