// src/pipeline/swing.ts
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { ColumnMap, round1, type SchemaMapping } from "../table/schema.js";
import type { RawTable, SignalRow } from "../types.js";
import { SWING_GROUP } from "../types.js";
import { normalizeTicker } from "./ticker.js";

type SwingField = "ticker" | "prob_pct" | "exp_move_pct" | "entry" | "tp" | "sl";

/** Raw model columns → canonical fields, first present column wins. */
export const SWING_MAPPING: SchemaMapping<SwingField> = {
  ticker: [{ column: "Ticker" }, { column: "ticker" }],
  prob_pct: [
    { column: "MLProb", scale: 100 },
    { column: "prob_pct" },
    { column: "prob_%" },
  ],
  exp_move_pct: [{ column: "exp_move_pct" }, { column: "exp_move_%" }],
  entry: [{ column: "BuyPrice" }, { column: "Close" }, { column: "entry" }],
  tp: [{ column: "Target1" }, { column: "tp" }],
  sl: [{ column: "Stop" }, { column: "sl" }],
};

const CANDIDATE = /^trade_plan.*\.csv$/;

/**
 * Most recent raw model output, judged by file name. Assumes names sort
 * chronologically (e.g. trade_plan_2024-05-01.csv).
 */
export function latestCandidate(dir: string): string | undefined {
  if (!existsSync(dir)) return undefined;
  const files = readdirSync(dir)
    .filter((f) => CANDIDATE.test(f))
    .sort();
  const last = files.at(-1);
  return last ? join(dir, last) : undefined;
}

/** Map one raw model table into canonical swing rows; null input → zero rows. */
export function normalizeSwing(table: RawTable | null): SignalRow[] {
  if (!table) return [];
  const cols = new ColumnMap(table.columns, SWING_MAPPING);
  return table.rows.map((row) => ({
    group: SWING_GROUP,
    ticker: normalizeTicker(cols.text(row, "ticker")),
    label: "bullish",
    prob_pct: round1(cols.number(row, "prob_pct")),
    exp_move_pct: cols.number(row, "exp_move_pct"),
    side: "long",
    entry: cols.number(row, "entry"),
    tp: cols.number(row, "tp"),
    sl: cols.number(row, "sl"),
    headline: "Model swing pick",
    source: "model",
  }));
}
