import type { CatalogRecord, Quote } from "@/src/lib/types";
import { TtlCache } from "@/src/lib/cache/memory";
import { DeltaApiError } from "@/src/lib/errors";
import { createLogger } from "@/src/lib/logger";

const DEFAULT_BASE_URL = "https://api.delta.exchange";
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_CATALOG_TTL_MS = 60 * 1000;
const DEFAULT_PAGE_SIZE = 500;
const BASE_DELAY_MS = 250;
const MAX_PAGES = 50;
const OPTION_CONTRACT_TYPES = "call_options,put_options";

// Resolves early when the signal aborts so the caller can bail out.
const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });

const abortedError = (path: string) => new Error(`Delta API request aborted: ${path}`);

const logger = createLogger("Delta");

export type DeltaClientOptions = {
  baseUrl?: string;
  maxRetries?: number;
  catalogTtlMs?: number;
  pageSize?: number;
  baseDelayMs?: number;
};

type DeltaRequestOptions = {
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  signal?: AbortSignal;
};

type DeltaEnvelope<T> = {
  success?: boolean;
  result?: T;
  error?: unknown;
  meta?: { after?: string | null };
};

type DeltaProduct = {
  id?: number | string;
  symbol?: string;
  contract_type?: string;
  strike_price?: string | number | null;
  settlement_time?: string | null;
  underlying_asset?: { symbol?: string } | null;
};

type DeltaTicker = {
  symbol?: string;
  mark_price?: string | number | null;
  best_bid_price?: string | number | null;
  best_ask_price?: string | number | null;
  quotes?: {
    best_bid?: string | number | null;
    best_ask?: string | number | null;
  } | null;
};

const buildQuery = (query: DeltaRequestOptions["query"]) => {
  if (!query) return "";
  const params = new URLSearchParams();
  Object.entries(query).forEach(([key, value]) => {
    if (value === undefined) return;
    params.append(key, String(value));
  });
  const qs = params.toString();
  return qs ? `?${qs}` : "";
};

const toCatalogRecord = (product: DeltaProduct): CatalogRecord => ({
  symbol: product.symbol ?? null,
  underlying: product.underlying_asset?.symbol ?? null,
  contractType: product.contract_type ?? null,
  strike: product.strike_price ?? null,
  settlementTime: product.settlement_time ?? null,
  instrumentId: product.id ?? null
});

const toQuote = (ticker: DeltaTicker): Quote => ({
  bestBid: ticker.quotes?.best_bid ?? ticker.best_bid_price ?? null,
  bestAsk: ticker.quotes?.best_ask ?? ticker.best_ask_price ?? null,
  markPrice: ticker.mark_price ?? null
});

export class DeltaClient {
  private baseUrl: string;
  private maxRetries: number;
  private catalogTtlMs: number;
  private pageSize: number;
  private baseDelayMs: number;
  private catalogCache: TtlCache<CatalogRecord[]>;

  constructor(options: DeltaClientOptions = {}, cache = new TtlCache<CatalogRecord[]>()) {
    this.baseUrl = (options.baseUrl ?? process.env.DELTA_BASE_URL ?? DEFAULT_BASE_URL).replace(
      /\/+$/,
      ""
    );
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.catalogTtlMs = options.catalogTtlMs ?? DEFAULT_CATALOG_TTL_MS;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this.catalogCache = cache;
  }

  private async request<T>({
    path,
    query,
    signal
  }: DeltaRequestOptions): Promise<DeltaEnvelope<T>> {
    const url = `${this.baseUrl}${path}${buildQuery(query)}`;

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      if (signal?.aborted) throw abortedError(path);
      const response = await fetch(url, { headers: { Accept: "application/json" }, signal });

      if (response.ok) {
        const payload = (await response.json()) as DeltaEnvelope<T>;
        if (payload.success === false) {
          throw new DeltaApiError(response.status, JSON.stringify(payload.error ?? payload));
        }
        return payload;
      }

      const retryAfter = response.headers.get("retry-after");
      const shouldRetry =
        response.status === 429 || response.status >= 500 || response.status === 408;

      if (!shouldRetry || attempt === this.maxRetries) {
        const errorBody = await response.text();
        throw new DeltaApiError(response.status, errorBody);
      }

      const retryDelay = retryAfter
        ? Number(retryAfter) * 1000
        : this.baseDelayMs * 2 ** attempt;
      if (signal?.aborted) throw abortedError(path);
      logger.debug(`Retrying ${path} after ${response.status} (attempt ${attempt + 1})`);
      await sleep(Number.isFinite(retryDelay) ? retryDelay : this.baseDelayMs, signal);
    }

    throw new Error("Delta API request failed after retries.");
  }

  async getOptionCatalog(): Promise<CatalogRecord[]> {
    return this.catalogCache.wrap("options:live", this.catalogTtlMs, async () => {
      const records: CatalogRecord[] = [];
      let after: string | undefined;

      for (let page = 0; page < MAX_PAGES; page += 1) {
        const payload = await this.request<DeltaProduct[]>({
          path: "/v2/products",
          query: {
            contract_types: OPTION_CONTRACT_TYPES,
            states: "live",
            page_size: this.pageSize,
            after
          }
        });

        if (!Array.isArray(payload.result)) {
          throw new Error("Delta products response did not contain a result list.");
        }

        records.push(...payload.result.map(toCatalogRecord));
        after = payload.meta?.after ?? undefined;
        if (!after) break;
      }

      if (after) {
        throw new Error(`Delta products still paginating after ${MAX_PAGES} pages.`);
      }

      logger.debug(`Loaded ${records.length} option products`);
      return records;
    });
  }

  async getQuote(symbol: string, options: { signal?: AbortSignal } = {}): Promise<Quote> {
    const payload = await this.request<DeltaTicker>({
      path: `/v2/tickers/${encodeURIComponent(symbol)}`,
      signal: options.signal
    });
    return toQuote(payload.result ?? {});
  }
}
