// src/pipeline/emit.ts
import Table from "cli-table3";
import type { CombinedRow } from "../types.js";
import { MICROCAP_GROUP, SWING_GROUP } from "../types.js";

export const DISPLAY_COLUMNS = [
  "ticker",
  "cap_band",
  "label",
  "prob_pct",
  "exp_move_pct",
  "entry",
  "tp",
  "sl",
  "headline",
] as const satisfies readonly (keyof CombinedRow)[];

type DisplayColumn = (typeof DISPLAY_COLUMNS)[number];

/** decimals per numeric display column */
const PRECISION: Partial<Record<DisplayColumn, number>> = {
  prob_pct: 1,
  exp_move_pct: 1,
  entry: 2,
  tp: 2,
  sl: 2,
};

export const HEADLINE_BUDGET = 90;

/** Single line, at most `max` code points; cut text ends in "…". */
export function truncate(text: string | null, max = HEADLINE_BUDGET): string {
  if (!text) return "";
  const s = text.replace(/\r?\n/g, " ").trim();
  const chars = Array.from(s);
  return chars.length <= max ? s : `${chars.slice(0, max - 1).join("")}…`;
}

export function formatFixed(v: number | null, digits: number): string {
  return v === null ? "" : v.toFixed(digits);
}

type SortKey = "prob_pct" | "exp_move_pct";

/** Stable sort, descending by each key in turn, nulls last. */
export function sortSection(
  rows: readonly CombinedRow[],
  keys: readonly SortKey[]
): CombinedRow[] {
  return rows
    .map((row, i) => ({ row, i }))
    .sort((a, b) => {
      for (const k of keys) {
        const x = a.row[k];
        const y = b.row[k];
        if (x === y) continue;
        if (x === null) return 1;
        if (y === null) return -1;
        return y - x;
      }
      return a.i - b.i;
    })
    .map(({ row }) => row);
}

function cell(row: CombinedRow, col: DisplayColumn): string {
  const digits = PRECISION[col];
  const v = row[col];
  if (digits !== undefined && (typeof v === "number" || v === null))
    return formatFixed(v, digits);
  if (col === "headline") return truncate(row.headline);
  return v === null ? "" : String(v);
}

/** Formatted display cells for the first `top` rows. */
export function displayRows(rows: readonly CombinedRow[], top: number): string[][] {
  return rows.slice(0, top).map((r) => DISPLAY_COLUMNS.map((c) => cell(r, c)));
}

export function renderSection(
  title: string,
  rows: readonly CombinedRow[],
  top: number
): string {
  const head = `=== ${title} (rows=${rows.length}) ===`;
  if (!rows.length) return `${head}\nNone`;
  const table = new Table({
    head: [...DISPLAY_COLUMNS],
    style: { head: [], border: [] },
  });
  for (const r of displayRows(rows, top)) table.push(r);
  return `${head}\n${table.toString()}`;
}

export type ReportSection = "swing" | "micro" | "all";

export type RenderOptions = {
  topSwing: number;
  topMicro: number;
  section?: ReportSection;
};

/** Human-readable report; reads rows only, never writes. */
export function renderReport(
  rows: readonly CombinedRow[],
  { topSwing, topMicro, section = "all" }: RenderOptions
): string {
  const parts: string[] = [];
  if (section !== "micro") {
    const swing = sortSection(
      rows.filter((r) => r.group === SWING_GROUP),
      ["prob_pct", "exp_move_pct"]
    );
    parts.push(renderSection(SWING_GROUP, swing, topSwing));
  }
  if (section !== "swing") {
    const micro = sortSection(
      rows.filter((r) => r.group === MICROCAP_GROUP),
      ["exp_move_pct"]
    );
    parts.push(renderSection(MICROCAP_GROUP, micro, topMicro));
  }
  return parts.join("\n\n");
}
