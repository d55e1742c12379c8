// src/pipeline/combine.ts
import { readTable } from "../table/csv.js";
import { toNumber, toText } from "../table/schema.js";
import type { CapBand, CombinedRow, RawTable, SignalRow } from "../types.js";
import { MissingArtifactError } from "./stage.js";
import { normalizeTicker } from "./ticker.js";

/**
 * Swing rows then microcap rows, each side in its own order.
 * |combined| === |swing| + |micro| always.
 */
export function combineSignals(
  swing: readonly SignalRow[],
  micro: readonly SignalRow[]
): SignalRow[] {
  return [...swing, ...micro];
}

/** Sorted, de-duplicated, joinable tickers of a report. */
export function combinedTickers(rows: readonly { ticker: string }[]): string[] {
  const set = new Set(rows.map((r) => r.ticker).filter(Boolean));
  return [...set].sort();
}

const BANDS: readonly CapBand[] = [
  "Large-cap",
  "Mid-cap",
  "Micro-cap",
  "Unclassified",
];

const asBand = (v: string | undefined): CapBand =>
  BANDS.find((b) => b === v) ?? "Unclassified";

/** Typed rows back out of a persisted combined artifact. */
export function combinedFromTable(table: RawTable): CombinedRow[] {
  return table.rows.map((r) => ({
    group: r.group ?? "",
    ticker: normalizeTicker(r.ticker),
    label: r.label ?? "",
    prob_pct: toNumber(r.prob_pct),
    exp_move_pct: toNumber(r.exp_move_pct),
    side: r.side ?? "",
    entry: toNumber(r.entry),
    tp: toNumber(r.tp),
    sl: toNumber(r.sl),
    headline: toText(r.headline),
    source: r.source ?? "",
    market_cap_m: toNumber(r.market_cap_m),
    sector: toText(r.sector),
    cap_band: asBand(r.cap_band),
  }));
}

/** The persisted combined report; its absence is the one unrecoverable condition. */
export function readCombinedReport(path: string): CombinedRow[] {
  const table = readTable(path);
  if (!table) throw new MissingArtifactError(path);
  return combinedFromTable(table);
}
