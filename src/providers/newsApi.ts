// src/providers/newsApi.ts
import axios from "axios";
import { z } from "zod";
import type { EventRecord } from "../types.js";
import { log } from "../logger.js";
import { errorMessage } from "../pipeline/stage.js";
import { runWithConcurrency } from "../utils/pool.js";

const NEWSAPI_URL = "https://newsapi.org/v2/everything";
const EODHD_URL = "https://eodhd.com/api/news";

const NewsApiResponse = z.object({
  articles: z
    .array(
      z.object({
        title: z.string().nullish(),
        publishedAt: z.string().nullish(),
        source: z.object({ name: z.string().nullish() }).nullish(),
      })
    )
    .nullish(),
});

const EodhdResponse = z.array(
  z.object({
    title: z.string().nullish(),
    date: z.string().nullish(),
    source: z.string().nullish(),
  })
);

export type FetchApiNewsParams = {
  newsApiKey?: string;
  eodhdKey?: string;
  /** look-back window */
  hours: number;
  /** concurrent tickers */
  workers?: number;
  now?: number;
};

/** NewsAPI everything-search for one ticker. */
export async function fetchNewsApi(
  ticker: string,
  apiKey: string,
  sinceMs: number,
  maxHits = 20
): Promise<EventRecord[]> {
  const { data } = await axios.get<unknown>(NEWSAPI_URL, {
    params: {
      q: `"${ticker} ASX" OR "${ticker}.AX"`,
      from: new Date(sinceMs).toISOString().slice(0, 10),
      language: "en",
      sortBy: "publishedAt",
      pageSize: maxHits,
      apiKey,
    },
    timeout: 20000,
  });
  const parsed = NewsApiResponse.safeParse(data);
  if (!parsed.success) return [];
  const out: EventRecord[] = [];
  for (const a of parsed.data.articles ?? []) {
    const headline = (a.title ?? "").trim();
    if (!headline) continue;
    out.push({
      ticker,
      headline,
      source: a.source?.name || "newsapi",
      ts: a.publishedAt || new Date().toISOString(),
    });
  }
  return out;
}

/** EODHD news for one ticker; tries SYM.AX first, then the bare symbol. */
export async function fetchEodhd(
  ticker: string,
  apiKey: string,
  sinceMs: number,
  maxHits = 50
): Promise<EventRecord[]> {
  const since = new Date(sinceMs).toISOString().slice(0, 10);
  for (const s of [`${ticker}.AX`, ticker]) {
    try {
      const { data } = await axios.get<unknown>(EODHD_URL, {
        params: { s, offset: 0, limit: maxHits, api_token: apiKey },
        timeout: 20000,
      });
      const parsed = EodhdResponse.safeParse(data);
      if (!parsed.success) continue;
      const rows: EventRecord[] = [];
      for (const a of parsed.data) {
        const headline = (a.title ?? "").trim();
        if (!headline) continue;
        const date = a.date ?? "";
        if (date && date.slice(0, 10) < since) continue;
        rows.push({
          ticker,
          headline,
          source: a.source || "eodhd",
          ts: date || new Date().toISOString(),
        });
      }
      if (rows.length) return rows;
    } catch (e) {
      log.warn("[NEWS] eodhd error", { symbol: s, error: errorMessage(e) });
    }
  }
  return [];
}

/**
 * Headlines for every ticker from whichever APIs have keys. `null` when no
 * key is configured, so the previous API table is left alone.
 */
export async function fetchApiNews(
  tickers: readonly string[],
  params: FetchApiNewsParams
): Promise<EventRecord[] | null> {
  const { newsApiKey, eodhdKey, hours, workers = 4 } = params;
  if (!newsApiKey && !eodhdKey) {
    log.warn("[NEWS] no NEWSAPI_KEY / EODHD_API_KEY — skipping API news");
    return null;
  }
  const sinceMs = (params.now ?? Date.now()) - hours * 3_600_000;
  const perTicker: EventRecord[][] = tickers.map(() => []);

  await runWithConcurrency(
    tickers,
    async (t, i) => {
      if (newsApiKey) {
        try {
          perTicker[i].push(...(await fetchNewsApi(t, newsApiKey, sinceMs)));
        } catch (e) {
          log.warn("[NEWS] newsapi error", { ticker: t, error: errorMessage(e) });
        }
      }
      if (eodhdKey) perTicker[i].push(...(await fetchEodhd(t, eodhdKey, sinceMs)));
    },
    workers
  );

  const out = perTicker.flat();
  log.info("[NEWS] api fetched", { tickers: tickers.length, rows: out.length });
  return out;
}
