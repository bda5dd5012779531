import type { CatalogRecord, Instrument, OptionType } from "@/src/lib/types";
import type { DroppedInstrument, MalformedInstrumentCode } from "@/src/lib/types/chain";
import { parseDecimal } from "./pricing";
import { parseOptionSymbol } from "./symbols";

export type InstrumentResolution =
  | { ok: true; instrument: Instrument }
  | { ok: false; reason: MalformedInstrumentCode };

const EXPLICIT_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

const mapContractType = (value?: string | null): OptionType | null => {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  if (normalized === "call_options" || normalized === "call" || normalized === "c") return "call";
  if (normalized === "put_options" || normalized === "put" || normalized === "p") return "put";
  return null;
};

const parseSettlementTime = (value?: string | null) => {
  if (!value || !EXPLICIT_ZONE.test(value.trim())) return null;
  const parsed = new Date(value.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
};

export const resolveInstrument = (record: CatalogRecord): InstrumentResolution => {
  const symbol = record.symbol?.trim();
  if (!symbol) return { ok: false, reason: "MISSING_SYMBOL" };

  const parsed = parseOptionSymbol(symbol);

  const underlying = record.underlying?.trim().toUpperCase() || parsed?.underlying;
  if (!underlying) return { ok: false, reason: "UNKNOWN_UNDERLYING" };

  const optionType = mapContractType(record.contractType) ?? parsed?.optionType ?? null;
  if (!optionType) return { ok: false, reason: "UNKNOWN_OPTION_TYPE" };

  const structuredStrike = parseDecimal(record.strike);
  const strike =
    structuredStrike !== undefined && structuredStrike > 0 ? structuredStrike : parsed?.strike;
  if (strike === undefined || !(strike > 0)) return { ok: false, reason: "INVALID_STRIKE" };

  const settlementTime = parseSettlementTime(record.settlementTime);
  if (!settlementTime) return { ok: false, reason: "INVALID_SETTLEMENT_TIME" };

  return {
    ok: true,
    instrument: {
      symbol,
      underlying,
      optionType,
      strike,
      settlementTime,
      instrumentId: String(record.instrumentId ?? symbol)
    }
  };
};

export const resolveCatalog = (records: CatalogRecord[]) => {
  const instruments: Instrument[] = [];
  const dropped: DroppedInstrument[] = [];

  records.forEach((record) => {
    const result = resolveInstrument(record);
    if (result.ok) {
      instruments.push(result.instrument);
      return;
    }
    dropped.push({ symbol: record.symbol?.trim() || "(unknown)", reason: result.reason });
  });

  return { instruments, dropped };
};
