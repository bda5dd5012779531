import { describe, expect, it } from "vitest";
import type { Instrument } from "@/src/lib/types";
import { selectNearestExpiryInstruments } from "../expiry";

const makeInstrument = (overrides: Partial<Instrument>): Instrument => ({
  symbol: overrides.symbol ?? "C-BTC-100000-300825",
  underlying: overrides.underlying ?? "BTC",
  optionType: overrides.optionType ?? "call",
  strike: overrides.strike ?? 100000,
  settlementTime: overrides.settlementTime ?? "2025-08-30T12:00:00.000Z",
  instrumentId: overrides.instrumentId ?? "1"
});

const NOW = new Date("2025-08-20T00:00:00Z");
const T1 = "2025-08-22T12:00:00.000Z";
const T2 = "2025-08-29T12:00:00.000Z";
const T3 = "2025-09-26T12:00:00.000Z";

describe("nearest expiry selection", () => {
  it("keeps every instrument that shares the nearest settlement time", () => {
    const catalog = [
      makeInstrument({ symbol: "A", settlementTime: T2 }),
      makeInstrument({ symbol: "B", settlementTime: T1 }),
      makeInstrument({ symbol: "C", settlementTime: T1, optionType: "put" }),
      makeInstrument({ symbol: "D", settlementTime: T3 })
    ];

    const result = selectNearestExpiryInstruments(catalog, "BTC", NOW);

    expect(result.status).toBe("ok");
    expect(result.instruments.map((instrument) => instrument.symbol)).toEqual(["B", "C"]);
    expect(result.status === "ok" && result.expiry).toBe(T1);
  });

  it("compares parsed timestamps rather than strings", () => {
    const catalog = [
      makeInstrument({ symbol: "A", settlementTime: "2025-08-22T12:00:00Z" }),
      makeInstrument({ symbol: "B", settlementTime: "2025-08-22T17:30:00+05:30" })
    ];

    const result = selectNearestExpiryInstruments(catalog, "BTC", NOW);
    expect(result.instruments.map((instrument) => instrument.symbol)).toEqual(["A", "B"]);
  });

  it("excludes later expiries entirely", () => {
    const catalog = [
      makeInstrument({ symbol: "C-T1", settlementTime: T1 }),
      makeInstrument({ symbol: "C-T2", settlementTime: T2 }),
      makeInstrument({ symbol: "P-T2", settlementTime: T2, optionType: "put" })
    ];

    const result = selectNearestExpiryInstruments(catalog, "BTC", NOW);
    expect(result.instruments.map((instrument) => instrument.symbol)).toEqual(["C-T1"]);
  });

  it("filters by underlying case-insensitively", () => {
    const catalog = [
      makeInstrument({ symbol: "ETH-1", underlying: "ETH", settlementTime: T1 }),
      makeInstrument({ symbol: "BTC-1", settlementTime: T2 })
    ];

    const result = selectNearestExpiryInstruments(catalog, " btc ", NOW);
    expect(result.instruments.map((instrument) => instrument.symbol)).toEqual(["BTC-1"]);
  });

  it("skips settled contracts unless asked to include them", () => {
    const expired = makeInstrument({ symbol: "OLD", settlementTime: "2025-08-19T12:00:00Z" });
    const atNow = makeInstrument({ symbol: "NOW", settlementTime: NOW.toISOString() });
    const live = makeInstrument({ symbol: "LIVE", settlementTime: T1 });

    expect(
      selectNearestExpiryInstruments([expired, atNow, live], "BTC", NOW).instruments
    ).toEqual([live]);
    expect(
      selectNearestExpiryInstruments([expired, atNow, live], "BTC", NOW, { futureOnly: false })
        .instruments
    ).toEqual([expired]);
  });

  it("ignores instruments with malformed settlement times", () => {
    const catalog = [
      makeInstrument({ symbol: "BAD", settlementTime: "not-a-date" }),
      makeInstrument({ symbol: "GOOD", settlementTime: T2 })
    ];

    const result = selectNearestExpiryInstruments(catalog, "BTC", NOW);
    expect(result.instruments.map((instrument) => instrument.symbol)).toEqual(["GOOD"]);
  });

  it("returns an empty selection for an empty catalog", () => {
    expect(selectNearestExpiryInstruments([], "BTC", NOW)).toEqual({
      status: "empty",
      instruments: []
    });
  });
});
