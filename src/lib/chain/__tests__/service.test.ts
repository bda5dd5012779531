import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CatalogRecord, Quote } from "@/src/lib/types";
import { CatalogUnavailableError } from "@/src/lib/errors";
import { configureLogger, resetLoggerConfig } from "@/src/lib/logger";
import { DeltaClient } from "@/src/lib/providers/delta";
import { loadOptionsChain, type ChainDataSource } from "../service";

const NOW = new Date("2025-08-20T00:00:00Z");

const makeRecord = (overrides: Partial<CatalogRecord>): CatalogRecord => ({
  symbol: "C-BTC-100000-300825",
  underlying: "BTC",
  contractType: "call_options",
  strike: "100000",
  settlementTime: "2025-08-30T12:00:00Z",
  instrumentId: 1,
  ...overrides
});

const makeSource = (
  records: CatalogRecord[] | Error,
  quotes: Record<string, Quote> = {}
): ChainDataSource => ({
  getOptionCatalog: () =>
    records instanceof Error ? Promise.reject(records) : Promise.resolve(records),
  getQuote: (symbol) => {
    const quote = quotes[symbol];
    return quote ? Promise.resolve(quote) : Promise.reject(new Error(`unknown ${symbol}`));
  }
});

describe("options chain service", () => {
  beforeEach(() => {
    configureLogger({ level: "error", enabled: [], disabled: [] });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetLoggerConfig();
    vi.restoreAllMocks();
    vi.unstubAllGlobals();
  });

  it("builds the nearest-expiry chain for an underlying", async () => {
    const source = makeSource(
      [
        makeRecord({}),
        makeRecord({ symbol: "P-BTC-100000-300825", contractType: "put_options", instrumentId: 2 }),
        makeRecord({
          symbol: "C-BTC-110000-260925",
          strike: "110000",
          settlementTime: "2025-09-26T12:00:00Z"
        }),
        makeRecord({ symbol: "C-ETH-4000-300825", underlying: "ETH", strike: "4000" })
      ],
      {
        "C-BTC-100000-300825": { bestBid: "10", bestAsk: "12" },
        "P-BTC-100000-300825": { bestBid: "8", bestAsk: "10" }
      }
    );

    const result = await loadOptionsChain(source, {
      underlying: "btc",
      pricingMode: "mid",
      now: NOW
    });

    expect(result).toEqual({
      status: "ok",
      underlying: "BTC",
      expiry: "2025-08-30T12:00:00.000Z",
      pricingMode: "mid",
      rows: [
        {
          strike: 100000,
          callPrice: 11,
          putPrice: 9,
          callSymbol: "C-BTC-100000-300825",
          putSymbol: "P-BTC-100000-300825"
        }
      ],
      dropped: [],
      generatedAt: "2025-08-20T00:00:00.000Z"
    });
  });

  it("reports malformed instruments without failing the chain", async () => {
    const source = makeSource(
      [makeRecord({}), makeRecord({ symbol: "BROKEN", contractType: null })],
      { "C-BTC-100000-300825": { bestBid: 1, bestAsk: 3 } }
    );

    const result = await loadOptionsChain(source, {
      underlying: "BTC",
      pricingMode: "mid",
      now: NOW
    });

    expect(result.status).toBe("ok");
    expect(result.rows).toHaveLength(1);
    expect(result.dropped).toEqual([{ symbol: "BROKEN", reason: "UNKNOWN_OPTION_TYPE" }]);
  });

  it("returns an explicit empty result for an empty catalog", async () => {
    const result = await loadOptionsChain(makeSource([]), {
      underlying: "BTC",
      pricingMode: "mark",
      now: NOW
    });

    expect(result).toEqual({
      status: "empty",
      underlying: "BTC",
      pricingMode: "mark",
      rows: [],
      dropped: [],
      message: "No options found for BTC at the nearest expiry.",
      generatedAt: "2025-08-20T00:00:00.000Z"
    });
  });

  it("keeps rows whose quotes could not be fetched", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const result = await loadOptionsChain(makeSource([makeRecord({})]), {
      underlying: "BTC",
      pricingMode: "mid",
      now: NOW
    });

    expect(result.rows).toEqual([
      { strike: 100000, callPrice: undefined, putPrice: undefined, callSymbol: "C-BTC-100000-300825" }
    ]);
  });

  it("escalates catalog failures", async () => {
    const promise = loadOptionsChain(makeSource(new Error("socket hang up")), {
      underlying: "BTC",
      pricingMode: "mid",
      now: NOW
    });

    await expect(promise).rejects.toBeInstanceOf(CatalogUnavailableError);
    await expect(promise).rejects.toThrow("Option catalog unavailable: socket hang up");
  });

  it("stops retrying a quote once its timeout has passed", async () => {
    const tickerCalls: string[] = [];
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string) => {
        const url = new URL(input);
        if (url.pathname === "/v2/products") {
          return new Response(
            JSON.stringify({
              success: true,
              result: [
                {
                  id: 1,
                  symbol: "C-BTC-100000-300825",
                  contract_type: "call_options",
                  strike_price: "100000",
                  settlement_time: "2025-08-30T12:00:00Z",
                  underlying_asset: { symbol: "BTC" }
                }
              ],
              meta: { after: null }
            }),
            { status: 200 }
          );
        }
        tickerCalls.push(url.pathname);
        return new Response("busy", { status: 503 });
      })
    );
    const client = new DeltaClient({
      baseUrl: "https://delta.test",
      maxRetries: 5,
      baseDelayMs: 40,
      catalogTtlMs: 0
    });

    const result = await loadOptionsChain(client, {
      underlying: "BTC",
      pricingMode: "mid",
      now: NOW,
      quoteTimeoutMs: 30
    });

    expect(result.rows).toEqual([
      { strike: 100000, callPrice: undefined, putPrice: undefined, callSymbol: "C-BTC-100000-300825" }
    ]);
    expect(tickerCalls).toHaveLength(1);

    await new Promise((resolve) => setTimeout(resolve, 200));
    expect(tickerCalls).toHaveLength(1);
  });
});
