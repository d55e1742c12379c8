import type { EventRecord } from "../types.js";
import { readTable, writeTable } from "../table/csv.js";
import { EVENT_COLUMNS } from "../pipeline/news.js";
import {
  degraded,
  errorMessage,
  ok,
  type StageResult,
} from "../pipeline/stage.js";
import { fetchApiNews } from "./newsApi.js";
import {
  DEFAULT_RSS_SOURCES,
  fetchRssNews,
  loadAliases,
  loadRssSources,
} from "./rss.js";
import { log } from "../logger.js";

export type FetchAllNewsParams = {
  apiPath: string;
  rssPath: string;
  rssSourcesPath: string;
  aliasesPath: string;
  newsApiKey?: string;
  eodhdKey?: string;
  hours: number;
  workers?: number;
  now?: number;
};

const RSS_COLUMNS = [...EVENT_COLUMNS, "url", "domain"] as const;

/**
 * Run news fetchers concurrently with error isolation. Each fetcher's table
 * is only rewritten when that fetcher succeeded, so a failure leaves its
 * previous output in place.
 */
export async function fetchAllNews(
  tickers: readonly string[],
  params: FetchAllNewsParams
): Promise<StageResult<{ api: number | null; rss: number | null }>> {
  const stage = "fetch-news";
  if (!tickers.length) {
    return degraded(stage, { api: null, rss: null }, "MissingInput", "no tickers");
  }

  const sources = loadRssSources(params.rssSourcesPath);
  const jobs: [Promise<EventRecord[] | null>, Promise<EventRecord[]>] = [
    fetchApiNews(tickers, params),
    fetchRssNews(tickers, {
      sources: sources.length ? sources : DEFAULT_RSS_SOURCES,
      aliases: loadAliases(readTable(params.aliasesPath)),
      hours: params.hours,
      now: params.now,
    }),
  ];
  const [api, rss] = await Promise.allSettled(jobs);

  const failures: string[] = [];
  let apiRows: number | null = null;
  let rssRows: number | null = null;

  if (api.status === "fulfilled") {
    if (api.value) {
      writeTable(params.apiPath, EVENT_COLUMNS, api.value);
      apiRows = api.value.length;
    }
  } else {
    log.warn("[NEWS] api provider error", api.reason);
    failures.push(`api: ${errorMessage(api.reason)}`);
  }

  if (rss.status === "fulfilled") {
    writeTable(params.rssPath, RSS_COLUMNS, rss.value);
    rssRows = rss.value.length;
  } else {
    log.warn("[NEWS] rss provider error", rss.reason);
    failures.push(`rss: ${errorMessage(rss.reason)}`);
  }

  const data = { api: apiRows, rss: rssRows };
  return failures.length
    ? degraded(stage, data, "UpstreamFailure", failures.join("; "))
    : ok(stage, data, (apiRows ?? 0) + (rssRows ?? 0));
}
