// src/pipeline/caps.ts
import {
  MARKET_CAP_ALIASES,
  SECTOR_ALIASES,
  TICKER_ALIASES,
  resolveColumn,
  toNumber,
  toText,
} from "../table/schema.js";
import type {
  CapBand,
  CapRecord,
  CombinedRow,
  RawTable,
  SignalRow,
} from "../types.js";
import type { DegradationKind } from "./stage.js";
import { normalizeTicker } from "./ticker.js";

/** Band floors, in millions. */
export const LARGE_CAP_MIN_M = 5000;
export const MID_CAP_MIN_M = 500;

/** A cap column whose median exceeds this is taken to be whole currency. */
export const RAW_CURRENCY_MEDIAN = 1_000_000;

export function median(values: readonly number[]): number | null {
  if (!values.length) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2
    ? sorted[mid]
    : (sorted[mid - 1] + sorted[mid]) / 2;
}

export type UnitInference = {
  values: (number | null)[];
  /** true when the column was read as whole currency and divided down */
  rescaled: boolean;
  median: number | null;
};

/**
 * Express cap values in millions. One decision for the whole column: if the
 * median of the non-null values is above 1,000,000 every value is divided by
 * 1,000,000, otherwise values are taken as millions already. A table made up
 * mostly of very small companies reported in whole currency can fall under
 * the threshold and stay unscaled.
 */
export function inferCapUnits(values: readonly (number | null)[]): UnitInference {
  const present = values.filter((v): v is number => v !== null);
  const med = median(present);
  const rescaled = med !== null && med > RAW_CURRENCY_MEDIAN;
  return {
    values: rescaled
      ? values.map((v) => (v === null ? null : v / RAW_CURRENCY_MEDIAN))
      : [...values],
    rescaled,
    median: med,
  };
}

function strictNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string" || !value.trim()) return null;
  const n = Number(value.trim());
  return Number.isFinite(n) ? n : null;
}

/** Cap band for a value in millions; anything non-numeric is Unclassified. */
export function capBand(value: unknown): CapBand {
  const x = strictNumber(value);
  if (x === null) return "Unclassified";
  if (x >= LARGE_CAP_MIN_M) return "Large-cap";
  if (x >= MID_CAP_MIN_M) return "Mid-cap";
  return "Micro-cap";
}

export type CapLookup = {
  /** one record per ticker, first occurrence in file order */
  records: CapRecord[];
  rescaled: boolean;
  issue?: { kind: DegradationKind; reason: string };
};

/**
 * Canonical cap records from whatever cap table is on disk. Column names are
 * resolved by alias; an unresolvable ticker or cap column leaves caps missing.
 */
export function loadCapLookup(table: RawTable | null): CapLookup {
  if (!table) {
    return {
      records: [],
      rescaled: false,
      issue: { kind: "MissingInput", reason: "no cap lookup table" },
    };
  }

  const tickerCol = resolveColumn(table.columns, TICKER_ALIASES);
  if (!tickerCol) {
    return {
      records: [],
      rescaled: false,
      issue: { kind: "SchemaAmbiguity", reason: "cap table has no ticker column" },
    };
  }
  const capCol = resolveColumn(table.columns, MARKET_CAP_ALIASES);
  const sectorCol = resolveColumn(table.columns, SECTOR_ALIASES);

  const raw = table.rows.map((r) => (capCol ? toNumber(r[capCol]) : null));
  const units = inferCapUnits(raw);

  const seen = new Set<string>();
  const records: CapRecord[] = [];
  table.rows.forEach((r, i) => {
    const ticker = normalizeTicker(r[tickerCol]);
    if (!ticker || seen.has(ticker)) return;
    seen.add(ticker);
    records.push({
      ticker,
      market_cap_m: units.values[i],
      sector: sectorCol ? toText(r[sectorCol]) : null,
    });
  });

  return {
    records,
    rescaled: units.rescaled,
    issue: !capCol
      ? { kind: "SchemaAmbiguity", reason: "cap table has no market-cap column" }
      : table.malformed
        ? { kind: "MalformedRow", reason: table.malformed }
        : undefined,
  };
}

const signalOf = (r: SignalRow): SignalRow => ({
  group: r.group,
  ticker: r.ticker,
  label: r.label,
  prob_pct: r.prob_pct,
  exp_move_pct: r.exp_move_pct,
  side: r.side,
  entry: r.entry,
  tp: r.tp,
  sl: r.sl,
  headline: r.headline,
  source: r.source,
});

/**
 * Left-join caps onto report rows and band them. Cap columns already on the
 * rows are discarded first, so a re-run never carries stale values.
 */
export function enrichWithCaps(
  rows: readonly (SignalRow | CombinedRow)[],
  records: readonly CapRecord[]
): CombinedRow[] {
  const byTicker = new Map<string, CapRecord>();
  for (const c of records) {
    if (!byTicker.has(c.ticker)) byTicker.set(c.ticker, c);
  }
  return rows.map((row) => {
    const base = signalOf(row);
    base.ticker = normalizeTicker(base.ticker);
    const cap = base.ticker ? byTicker.get(base.ticker) : undefined;
    const market_cap_m = cap?.market_cap_m ?? null;
    return {
      ...base,
      market_cap_m,
      sector: cap?.sector ?? null,
      cap_band: capBand(market_cap_m),
    };
  });
}
