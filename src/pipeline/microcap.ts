// src/pipeline/microcap.ts
import { ColumnMap, type SchemaMapping } from "../table/schema.js";
import type { RawTable, SignalRow } from "../types.js";
import { MICROCAP_GROUP } from "../types.js";
import { normalizeTicker } from "./ticker.js";

type MicrocapField = "ticker" | "exp_move_pct" | "entry" | "tp" | "sl" | "headline";

/** Scanner columns → canonical fields. A scanner `price` stands in for a missing entry. */
export const MICROCAP_MAPPING: SchemaMapping<MicrocapField> = {
  ticker: [{ column: "ticker" }, { column: "Ticker" }],
  exp_move_pct: [{ column: "gap_%" }, { column: "exp_move_pct" }],
  entry: [{ column: "entry" }, { column: "price" }],
  tp: [{ column: "tp" }],
  sl: [{ column: "sl" }],
  headline: [{ column: "headline" }],
};

/** Only for scanners without a headline column; a blank cell stays blank. */
export const NO_NEWS_HEADLINE = "Momentum (no news)";

/**
 * Scanner picks as canonical rows, at most `limit` of them in scanner order.
 * Absent or empty scanner output contributes nothing.
 */
export function adaptMicrocap(
  table: RawTable | null,
  limit = Number.POSITIVE_INFINITY
): SignalRow[] {
  if (!table || !table.rows.length) return [];
  const cols = new ColumnMap(table.columns, MICROCAP_MAPPING);
  return table.rows.slice(0, limit).map((row) => ({
    group: MICROCAP_GROUP,
    ticker: normalizeTicker(cols.text(row, "ticker")),
    label: "momentum",
    prob_pct: null,
    exp_move_pct: cols.number(row, "exp_move_pct"),
    side: "long",
    entry: cols.number(row, "entry"),
    tp: cols.number(row, "tp"),
    sl: cols.number(row, "sl"),
    headline: cols.rule("headline") ? cols.text(row, "headline") : NO_NEWS_HEADLINE,
    source: "microcap_scanner",
  }));
}
