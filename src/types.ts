/**
 * Shared types across the pipeline
 */

/** A table as read from or written to a CSV artifact. Cells stay strings until mapped. */
export type RawRecord = Record<string, string>;

export type RawTable = {
  columns: string[];
  rows: RawRecord[];
  /** set when parsing stopped early; rows hold what was read before that */
  malformed?: string;
};

export const SWING_GROUP = "Daily Swing (Large/Mid)";
export const MICROCAP_GROUP = "Intraday Spikes (Microcap)";

export type SignalGroup = typeof SWING_GROUP | typeof MICROCAP_GROUP;

/** Canonical signal row every adapter maps into before combination. */
export type SignalRow = {
  group: string;
  /** Canonical ticker; "" means the row never matches an enrichment join */
  ticker: string;
  label: string;
  prob_pct: number | null;
  exp_move_pct: number | null;
  side: string;
  entry: number | null;
  tp: number | null;
  sl: number | null;
  headline: string | null;
  source: string;
};

export const SIGNAL_COLUMNS = [
  "group",
  "ticker",
  "label",
  "prob_pct",
  "exp_move_pct",
  "side",
  "entry",
  "tp",
  "sl",
  "headline",
  "source",
] as const satisfies readonly (keyof SignalRow)[];

export type CapBand = "Large-cap" | "Mid-cap" | "Micro-cap" | "Unclassified";

export type CapRecord = {
  ticker: string;
  /** Always millions after ingestion, whatever unit the source used */
  market_cap_m: number | null;
  sector: string | null;
};

export type CombinedRow = SignalRow & {
  market_cap_m: number | null;
  sector: string | null;
  cap_band: CapBand;
};

export const COMBINED_COLUMNS = [
  ...SIGNAL_COLUMNS,
  "market_cap_m",
  "sector",
  "cap_band",
] as const satisfies readonly (keyof CombinedRow)[];

export type NewsEvent = {
  ticker: string;
  headline: string;
  source: string;
  /** epoch ms, UTC */
  ts: number;
  /** position in the merged log; explicit tie-break for equal timestamps */
  index: number;
};

export type Cell = string | number | null | undefined;

/** One row of a news feed table, as a fetcher writes it (`ts` is ISO 8601). */
export type EventRecord = {
  ticker: string;
  headline: string;
  source: string;
  ts: string;
  url?: string;
  domain?: string;
};
