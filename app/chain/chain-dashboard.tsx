"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import type { PricingMode } from "@/src/lib/types";
import type { ChainResponse, ChainRow } from "@/src/lib/types/chain";

const PRICING_MODES: Array<{ mode: PricingMode; label: string }> = [
  { mode: "mid", label: "Mid" },
  { mode: "mark", label: "Mark" }
];

const EMPTY_CELL = "--";

type FetchState = {
  data: ChainResponse | null;
  loading: boolean;
  error: string | null;
};

const priceFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

const strikeFormatter = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 8
});

export const formatPrice = (value?: number | null) =>
  value === undefined || value === null || !Number.isFinite(value)
    ? EMPTY_CELL
    : priceFormatter.format(value);

export const formatStrike = (value: number) => strikeFormatter.format(value);

const formatExpiry = (value: string) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;
  return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`;
};

export const normalizeUnderlying = (raw: string) => raw.trim().toUpperCase();

export const buildChainCsv = (rows: ChainRow[]) => {
  const headers = ["Strike", "Call", "Put", "Call Symbol", "Put Symbol"];
  const body = rows.map((row) => [
    row.strike,
    row.callPrice ?? "",
    row.putPrice ?? "",
    row.callSymbol ?? "",
    row.putSymbol ?? ""
  ]);
  return [headers, ...body].map((row) => row.join(",")).join("\n");
};

const downloadCsv = (content: string, filename: string) => {
  const blob = new Blob([content], { type: "text/csv;charset=utf-8;" });
  const url = URL.createObjectURL(blob);
  const link = document.createElement("a");
  link.href = url;
  link.download = filename;
  link.click();
  URL.revokeObjectURL(url);
};

export const OptionsChainTable = ({
  rows,
  pricingMode
}: {
  rows: ChainRow[];
  pricingMode: PricingMode;
}) => {
  const priceLabel = pricingMode === "mark" ? "mark" : "mid";

  return (
    <div className="overflow-hidden rounded-2xl border border-black/10 bg-white/90">
      <div className="max-h-[560px] overflow-auto">
        <table className="w-full text-left text-sm">
          <thead className="sticky top-0 bg-[#f8f5ef] text-[11px] uppercase tracking-[0.2em] text-black/50">
            <tr>
              <th className="px-4 py-3 text-right">Call ({priceLabel})</th>
              <th className="px-4 py-3 text-center">Strike</th>
              <th className="px-4 py-3">Put ({priceLabel})</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-black/5">
            {rows.map((row) => (
              <tr key={row.strike} className="transition hover:bg-black/5">
                <td
                  className="px-4 py-3 text-right text-black/70"
                  title={row.callSymbol}
                  data-testid={`call-${row.strike}`}
                >
                  {formatPrice(row.callPrice)}
                </td>
                <td className="px-4 py-3 text-center font-semibold text-ink">
                  {formatStrike(row.strike)}
                </td>
                <td
                  className="px-4 py-3 text-black/70"
                  title={row.putSymbol}
                  data-testid={`put-${row.strike}`}
                >
                  {formatPrice(row.putPrice)}
                </td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </div>
  );
};

export const ChainEmptyState = ({ message }: { message?: string }) => (
  <div className="rounded-2xl border border-dashed border-black/10 bg-white/80 p-8 text-center">
    <p className="text-sm font-semibold text-ink">No options found for this expiry/asset.</p>
    {message ? <p className="mt-2 text-xs text-black/60">{message}</p> : null}
  </div>
);

const ChainSummary = ({ data }: { data: ChainResponse }) => (
  <div className="flex flex-wrap items-center gap-4 rounded-2xl border border-black/10 bg-white/80 p-4 text-sm text-black/70">
    <span className="font-semibold text-ink">{data.underlying}</span>
    {data.status === "ok" ? <span>Expiry {formatExpiry(data.expiry)}</span> : null}
    <span>{data.rows.length} strikes</span>
    {data.dropped.length > 0 ? (
      <span className="text-amber-600">{data.dropped.length} malformed instruments skipped</span>
    ) : null}
  </div>
);

const LoadingSkeleton = () => (
  <div className="rounded-2xl border border-black/10 bg-white/80 p-6">
    <div className="space-y-4">
      {Array.from({ length: 6 }).map((_, index) => (
        <div
          key={`skeleton-${index}`}
          className="h-6 w-full animate-pulse rounded-full bg-black/5"
        />
      ))}
    </div>
  </div>
);

export const ChainDashboard = ({ initialUnderlying = "BTC" }: { initialUnderlying?: string }) => {
  const [underlyingInput, setUnderlyingInput] = useState(initialUnderlying);
  const [pricingMode, setPricingMode] = useState<PricingMode>("mid");
  const [{ data, loading, error }, setState] = useState<FetchState>({
    data: null,
    loading: false,
    error: null
  });

  const latestRequest = useRef(0);

  const loadChain = useCallback(async (underlying: string, mode: PricingMode) => {
    const normalized = normalizeUnderlying(underlying);
    if (!normalized) {
      setState((prev) => ({ ...prev, error: "Please enter an underlying asset." }));
      return;
    }

    // Only the most recent request may update the view.
    latestRequest.current += 1;
    const requestId = latestRequest.current;
    const isCurrent = () => requestId === latestRequest.current;

    setState((prev) => ({ ...prev, loading: true, error: null }));

    try {
      const params = new URLSearchParams({ underlying: normalized, mode });
      const res = await fetch(`/api/chain?${params.toString()}`);
      const payload = (await res.json()) as ChainResponse | { error?: string };
      if (!res.ok || !("status" in payload)) {
        throw new Error(
          "error" in payload && payload.error ? payload.error : "Unable to load options chain."
        );
      }
      if (!isCurrent()) return;
      setState({ data: payload, loading: false, error: null });
    } catch (err) {
      if (!isCurrent()) return;
      setState({
        data: null,
        loading: false,
        error: err instanceof Error ? err.message : "Unable to load options chain."
      });
    }
  }, []);

  useEffect(() => {
    void loadChain(initialUnderlying, "mid");
  }, [initialUnderlying, loadChain]);

  const handleModeChange = (mode: PricingMode) => {
    setPricingMode(mode);
    void loadChain(underlyingInput, mode);
  };

  const handleExport = () => {
    if (!data || data.rows.length === 0) return;
    const expiry = data.status === "ok" ? data.expiry.slice(0, 10) : "none";
    downloadCsv(buildChainCsv(data.rows), `${data.underlying}-${expiry}-chain.csv`);
  };

  return (
    <section className="mx-auto grid w-full max-w-[1100px] gap-6">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-6 shadow-sm">
        <p className="text-xs uppercase tracking-[0.35em] text-black/50">Options chain</p>
        <form
          className="mt-4 flex flex-wrap items-end gap-4"
          onSubmit={(event) => {
            event.preventDefault();
            void loadChain(underlyingInput, pricingMode);
          }}
        >
          <label className="flex flex-col gap-2 text-xs font-semibold uppercase tracking-[0.3em] text-black/50">
            Underlying
            <input
              value={underlyingInput}
              onChange={(event) => setUnderlyingInput(event.target.value)}
              onBlur={() => setUnderlyingInput(normalizeUnderlying(underlyingInput))}
              className="rounded-full border border-black/10 bg-white px-4 py-2 text-sm font-normal tracking-normal text-ink"
            />
          </label>
          <div className="flex gap-2">
            {PRICING_MODES.map(({ mode, label }) => (
              <button
                key={mode}
                type="button"
                aria-pressed={pricingMode === mode}
                onClick={() => handleModeChange(mode)}
                className={`rounded-full px-4 py-2 text-xs font-semibold transition ${
                  pricingMode === mode
                    ? "bg-ink text-white"
                    : "border border-black/10 bg-white text-black/60 hover:text-ink"
                }`}
              >
                {label}
              </button>
            ))}
          </div>
          <button
            type="submit"
            disabled={loading}
            className="rounded-full bg-ember px-5 py-2 text-xs font-semibold text-white disabled:opacity-60"
          >
            {loading ? "Loading..." : "Load chain"}
          </button>
          <button
            type="button"
            onClick={handleExport}
            disabled={!data || data.rows.length === 0}
            className="rounded-full border border-black/10 bg-white px-4 py-2 text-xs font-semibold text-black/70 disabled:opacity-60"
          >
            Export CSV
          </button>
        </form>
      </div>

      {error ? (
        <div
          role="alert"
          className="rounded-2xl border border-ember/30 bg-ember/10 p-4 text-sm text-ember"
        >
          {error}
        </div>
      ) : null}

      {loading && !data ? <LoadingSkeleton /> : null}

      {data ? <ChainSummary data={data} /> : null}

      {data?.status === "empty" ? <ChainEmptyState message={data.message} /> : null}
      {data?.status === "ok" ? (
        <OptionsChainTable rows={data.rows} pricingMode={data.pricingMode} />
      ) : null}
    </section>
  );
};
