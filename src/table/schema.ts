import type { Cell, RawRecord } from "../types.js";

/* ---------------- alias priority lists ---------------- */
export const TICKER_ALIASES = [
  "ticker",
  "Ticker",
  "symbol",
  "Symbol",
  "code",
  "Code",
] as const;

export const MARKET_CAP_ALIASES = [
  "market_cap_m",
  "market_cap",
  "marketCap",
  "MarketCap",
  "mktcap",
  "cap_m",
  "market_capitalization",
  "market_capitalisation",
  "MarketCapitalisation",
] as const;

export const SECTOR_ALIASES = [
  "sector",
  "Sector",
  "industry",
  "Industry",
  "GICS_Sector",
  "GICS Sector",
] as const;

/** First alias present in the header wins. */
export function resolveColumn(
  columns: readonly string[],
  aliases: readonly string[]
): string | undefined {
  return aliases.find((a) => columns.includes(a));
}

/* ---------------- tolerant cell parsing ---------------- */

/** "1,234.5" → 1234.5; blanks and junk → null. */
export function toNumber(v: Cell): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = v.replace(/[,\s]/g, "");
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function toText(v: Cell): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v);
  return s.trim() ? s : null;
}

const NAIVE_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** epoch ms, or null when unparseable; zone-less ISO stamps are read as UTC */
export function parseTimestamp(v: Cell): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  let s = v.trim();
  if (!s) return null;
  if (/^\d{4}-\d{2}-\d{2} \d/.test(s)) s = s.replace(" ", "T");
  if (NAIVE_ISO.test(s)) s = `${s}Z`;
  const ms = Date.parse(s);
  return Number.isNaN(ms) ? null : ms;
}

/* ---------------- ordered schema mapping ---------------- */

/** One acceptable source column for a canonical field; `scale` multiplies numeric values. */
export type ColumnRule = { column: string; scale?: number };

/** canonical field → candidate source columns, in priority order */
export type SchemaMapping<F extends string> = Record<F, readonly ColumnRule[]>;

/** A mapping bound to one table header; each field resolves once, on first use. */
export class ColumnMap<F extends string> {
  private readonly resolved = new Map<F, ColumnRule | undefined>();

  constructor(
    private readonly columns: readonly string[],
    private readonly mapping: SchemaMapping<F>
  ) {}

  rule(field: F): ColumnRule | undefined {
    if (!this.resolved.has(field)) {
      const hit = this.mapping[field].find((r) =>
        this.columns.includes(r.column)
      );
      this.resolved.set(field, hit);
    }
    return this.resolved.get(field);
  }

  number(row: RawRecord, field: F): number | null {
    const rule = this.rule(field);
    if (!rule) return null;
    const n = toNumber(row[rule.column]);
    return n === null ? null : n * (rule.scale ?? 1);
  }

  text(row: RawRecord, field: F): string | null {
    const rule = this.rule(field);
    return rule ? toText(row[rule.column]) : null;
  }
}

export const round1 = (n: number | null) =>
  n === null ? null : Math.round(n * 10) / 10;
