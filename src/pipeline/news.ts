// src/pipeline/news.ts
import {
  TICKER_ALIASES,
  parseTimestamp,
  resolveColumn,
  toText,
} from "../table/schema.js";
import type { NewsEvent, RawRecord, RawTable, SignalRow } from "../types.js";
import { normalizeTicker } from "./ticker.js";

export const DEFAULT_WINDOW_HOURS = 96;

/** Base columns of every event table; feeds may add more (url, domain). */
export const EVENT_COLUMNS = ["ticker", "headline", "source", "ts"] as const;

const HEADLINE_ALIASES = ["headline", "title", "Headline", "Title"] as const;
const SOURCE_ALIASES = ["source", "Source", "domain"] as const;
const TS_ALIASES = [
  "ts",
  "ts_utc",
  "published_at",
  "publishedAt",
  "date",
  "Date",
] as const;
/** a cell holding a JSON array of tickers, one event per element */
const TICKER_LIST_COLUMN = "tickers";

const rowKey = (columns: readonly string[], row: RawRecord) =>
  JSON.stringify(columns.map((c) => row[c] ?? ""));

/**
 * Row-wise union of event tables in the order given (callers pass API before
 * RSS before the previous log). Columns are the union in first-seen order;
 * exact duplicate rows are dropped, first kept.
 */
export function mergeEventTables(tables: readonly (RawTable | null)[]): RawTable {
  const present = tables.filter((t): t is RawTable => t !== null);
  const columns: string[] = [];
  for (const t of present) {
    for (const c of t.columns) if (!columns.includes(c)) columns.push(c);
  }
  if (!columns.length) columns.push(...EVENT_COLUMNS);

  const seen = new Set<string>();
  const rows: RawRecord[] = [];
  for (const t of present) {
    for (const r of t.rows) {
      const full: RawRecord = {};
      for (const c of columns) full[c] = r[c] ?? "";
      const key = rowKey(columns, full);
      if (seen.has(key)) continue;
      seen.add(key);
      rows.push(full);
    }
  }
  return { columns, rows };
}

function tickersOf(row: RawRecord, tickerCol: string | undefined): string[] {
  if (tickerCol) return [normalizeTicker(row[tickerCol])];
  const list = row[TICKER_LIST_COLUMN];
  if (!list) return [];
  try {
    const parsed: unknown = JSON.parse(list);
    return Array.isArray(parsed) ? parsed.map((t) => normalizeTicker(String(t))) : [];
  } catch {
    return [];
  }
}

/**
 * Typed events from a merged log. Rows with an unparseable timestamp or no
 * joinable ticker are dropped; the table itself never fails.
 */
export function parseEvents(table: RawTable): NewsEvent[] {
  const tickerCol = resolveColumn(table.columns, TICKER_ALIASES);
  if (!tickerCol && !table.columns.includes(TICKER_LIST_COLUMN)) return [];
  const headlineCol = resolveColumn(table.columns, HEADLINE_ALIASES);
  const sourceCol = resolveColumn(table.columns, SOURCE_ALIASES);
  const tsCol = resolveColumn(table.columns, TS_ALIASES);
  if (!tsCol) return [];

  const out: NewsEvent[] = [];
  table.rows.forEach((row, index) => {
    const ts = parseTimestamp(row[tsCol]);
    if (ts === null) return;
    const headline = headlineCol ? toText(row[headlineCol])?.trim() ?? "" : "";
    const source = sourceCol ? row[sourceCol]?.trim() ?? "" : "";
    for (const ticker of tickersOf(row, tickerCol)) {
      if (ticker) out.push({ ticker, headline, source, ts, index });
    }
  });
  return out;
}

/**
 * Freshest headline per ticker among events no older than `windowHours`.
 * Ordering is timestamp descending, then position in the log.
 */
export function latestHeadlines(
  events: readonly NewsEvent[],
  now: number,
  windowHours = DEFAULT_WINDOW_HOURS
): Map<string, NewsEvent> {
  const cutoff = now - windowHours * 3_600_000;
  const ordered = events
    .filter((e) => e.ts >= cutoff && e.headline)
    .sort((a, b) => b.ts - a.ts || a.index - b.index);
  const latest = new Map<string, NewsEvent>();
  for (const e of ordered) {
    if (!latest.has(e.ticker)) latest.set(e.ticker, e);
  }
  return latest;
}

/** `model` + event from `afr.com` → `model+news:afr.com` */
export function taggedSource(original: string, eventSource: string): string {
  const marker = eventSource ? `news:${eventSource}` : "news";
  return original ? `${original}+${marker}` : marker;
}

/**
 * Overwrite headline/source on rows that have a recent event; other rows
 * come back unchanged.
 */
export function enrichWithNews<R extends SignalRow>(
  rows: readonly R[],
  latest: ReadonlyMap<string, NewsEvent>
): R[] {
  return rows.map((row) => {
    const ev = row.ticker ? latest.get(row.ticker) : undefined;
    if (!ev) return row;
    return {
      ...row,
      headline: ev.headline,
      source: taggedSource(row.source, ev.source),
    };
  });
}
