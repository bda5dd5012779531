import type { Instrument } from "@/src/lib/types";
import type { NearestExpirySelection } from "@/src/lib/types/chain";

export type ExpirySelectionOptions = {
  futureOnly?: boolean;
};

const parseTime = (value: string) => {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
};

export const selectNearestExpiryInstruments = (
  catalog: Instrument[],
  underlying: string,
  now: Date,
  options: ExpirySelectionOptions = {}
): NearestExpirySelection => {
  const futureOnly = options.futureOnly ?? true;
  const target = underlying.trim().toUpperCase();
  const nowMs = now.getTime();

  const candidates = catalog
    .map((instrument) => ({ instrument, time: parseTime(instrument.settlementTime) }))
    .filter(
      (entry): entry is { instrument: Instrument; time: number } =>
        entry.time !== null &&
        entry.instrument.underlying.toUpperCase() === target &&
        (!futureOnly || entry.time > nowMs)
    );

  if (candidates.length === 0) {
    return { status: "empty", instruments: [] };
  }

  const nearest = candidates.reduce((min, entry) => Math.min(min, entry.time), Infinity);

  return {
    status: "ok",
    expiry: new Date(nearest).toISOString(),
    instruments: candidates
      .filter((entry) => entry.time === nearest)
      .map((entry) => entry.instrument)
  };
};
