// src/providers/rss.ts
import axios from "axios";
import * as cheerio from "cheerio";
import { existsSync, readFileSync } from "node:fs";
import { parseTimestamp } from "../table/schema.js";
import { normalizeTicker } from "../pipeline/ticker.js";
import { errorMessage } from "../pipeline/stage.js";
import type { EventRecord, RawTable } from "../types.js";
import { log } from "../logger.js";

export const DEFAULT_RSS_SOURCES = [
  "https://www.marketindex.com.au/news/rss.xml",
  "https://au.finance.yahoo.com/rss/",
  "https://www.afr.com/rss",
  "https://www.theaustralian.com.au/business/rss",
  "https://www.livewiremarkets.com/feeds/rss",
] as const;

const httpClient = axios.create({
  timeout: 15000,
  headers: { "User-Agent": "signal-combiner/0.1" },
});

/** Aliases shorter than this are too noisy to match on. */
const MIN_ALIAS_LEN = 3;

export type FeedItem = {
  title: string;
  link: string;
  /** epoch ms; null when the feed gave no usable date */
  ts: number | null;
  /** title, summary and categories, for ticker matching */
  text: string;
};

export type AliasMap = Map<string, Set<string>>;

export const normToken = (s: string) => s.toUpperCase().replace(/[^0-9A-Z]+/g, "");

/** One feed URL per line; blank lines and `#` comments skipped. Missing file → []. */
export function loadRssSources(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith("#"));
}

/** alias,ticker table → normalised alias → tickers. */
export function loadAliases(table: RawTable | null): AliasMap {
  const map: AliasMap = new Map();
  if (!table || !table.columns.includes("alias") || !table.columns.includes("ticker"))
    return map;
  for (const r of table.rows) {
    const alias = normToken(r.alias ?? "");
    const ticker = normalizeTicker(r.ticker);
    if (!alias || !ticker) continue;
    const set = map.get(alias) ?? new Set<string>();
    set.add(ticker);
    map.set(alias, set);
  }
  return map;
}

/** Tickers named in `text`, literally or through an alias of 3+ chars. */
export function matchTickers(
  text: string,
  tickers: ReadonlySet<string>,
  aliases: AliasMap = new Map()
): Set<string> {
  const s = normToken(text);
  const hits = new Set<string>();
  for (const tk of tickers) {
    if (tk && s.includes(tk)) hits.add(tk);
  }
  for (const [alias, tks] of aliases) {
    if (alias.length >= MIN_ALIAS_LEN && s.includes(alias)) {
      for (const t of tks) hits.add(t);
    }
  }
  return hits;
}

/** RSS <item> and Atom <entry> elements of one feed document. */
export function parseFeed(xml: string): FeedItem[] {
  const $ = cheerio.load(xml, { xml: true });
  const items: FeedItem[] = [];
  $("item, entry").each((_, el) => {
    const node = $(el);
    const title = node.children("title").first().text().trim();
    const linkEl = node.children("link").first();
    const link = (linkEl.attr("href") ?? linkEl.text()).trim();
    const stamp = node
      .children("pubDate, published, updated, dc\\:date")
      .first()
      .text();
    const summary = node.children("description, summary").first().text();
    const categories = node
      .children("category")
      .map((_, c) => $(c).attr("term") ?? $(c).text())
      .get()
      .join(" ");
    items.push({
      title,
      link,
      ts: parseTimestamp(stamp),
      text: [title, summary, categories].filter(Boolean).join(" "),
    });
  });
  return items;
}

export type FetchRssParams = {
  sources: readonly string[];
  aliases?: AliasMap;
  hours: number;
  now?: number;
};

const hostOf = (url: string) => {
  try {
    return new URL(url).hostname || "rss";
  } catch {
    return "rss";
  }
};

/**
 * In-window feed items matched to `tickers`, one row per (item, ticker).
 * A feed that fails is logged and skipped.
 */
export async function fetchRssNews(
  tickers: readonly string[],
  params: FetchRssParams
): Promise<EventRecord[]> {
  const universe = new Set(tickers.filter(Boolean));
  const cutoff = (params.now ?? Date.now()) - params.hours * 3_600_000;
  const rows: EventRecord[] = [];
  const seen = new Set<string>();

  for (const src of params.sources) {
    try {
      const { data } = await httpClient.get<string>(src, {
        responseType: "text",
      });
      const domain = hostOf(src);
      log.debug("[RSS] fetched", { src });
      for (const item of parseFeed(String(data))) {
        if (item.ts === null || item.ts < cutoff || !item.title) continue;
        const ts = new Date(item.ts).toISOString();
        for (const ticker of matchTickers(item.text, universe, params.aliases)) {
          const key = `${ticker}|${item.title}|${domain}|${ts}`;
          if (seen.has(key)) continue;
          seen.add(key);
          rows.push({
            ticker,
            headline: item.title,
            source: domain,
            ts,
            url: item.link,
            domain,
          });
        }
      }
    } catch (err) {
      log.warn(`[RSS] error ${src}`, { error: errorMessage(err) });
    }
  }
  log.info("[RSS] matched", { sources: params.sources.length, rows: rows.length });
  return rows;
}
