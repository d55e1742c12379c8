// src/providers/fmp.ts
import axios from "axios";
import { z } from "zod";
import { readTable, writeTable } from "../table/csv.js";
import { loadCapLookup } from "../pipeline/caps.js";
import {
  degraded,
  errorMessage,
  ok,
  type StageResult,
} from "../pipeline/stage.js";
import { normalizeTicker } from "../pipeline/ticker.js";
import type { CapRecord } from "../types.js";
import type { CapCacheDB } from "../db/CapCacheDB.js";
import { log } from "../logger.js";
import { chunk, runWithConcurrency } from "../utils/pool.js";

const PROFILE_URL = "https://financialmodelingprep.com/api/v3/profile/";

/** Canonical cap-lookup columns written back after a fetch. */
export const CAP_COLUMNS = ["ticker", "market_cap_m", "sector"] as const;

export type FetchCapsParams = {
  apiKey: string;
  /** exchange suffix FMP expects, e.g. ".AX" */
  suffix: string;
  /** concurrent profile requests */
  workers: number;
  /** symbols per request */
  chunkSize?: number;
};

export type FetchCapsResult = {
  records: CapRecord[];
  failedChunks: number;
};

const ProfileRow = z.object({
  symbol: z.string(),
  mktCap: z.union([z.number(), z.string()]).nullish(),
  sector: z.string().nullish(),
});

/** Map one FMP profile row; `mktCap` is whole currency. */
function mapProfileRow(d: unknown): CapRecord | null {
  const parsed = ProfileRow.safeParse(d);
  if (!parsed.success) return null;
  const { symbol, mktCap, sector } = parsed.data;
  const ticker = normalizeTicker(symbol);
  if (!ticker) return null;
  const cap = Number(mktCap ?? NaN);
  return {
    ticker,
    market_cap_m: Number.isFinite(cap) && cap > 0 ? cap / 1_000_000 : null,
    sector: sector?.trim() || null,
  };
}

/** Batched profile fetch; a failed chunk is logged and skipped. */
export async function fetchMarketCaps(
  tickers: readonly string[],
  params: FetchCapsParams
): Promise<FetchCapsResult> {
  const { apiKey, suffix, workers, chunkSize = 50 } = params;
  const records: CapRecord[] = [];
  let failedChunks = 0;

  await runWithConcurrency(
    chunk(tickers, chunkSize),
    async (syms) => {
      try {
        const { data } = await axios.get<unknown>(
          PROFILE_URL + syms.map((s) => `${s}${suffix}`).join(","),
          { params: { apikey: apiKey }, timeout: 8000 }
        );
        // Expected shape: [{ symbol: "CBA.AX", mktCap: 1.9e11, sector: "Financial Services" }, ...]
        if (Array.isArray(data)) {
          for (const row of data) {
            const rec = mapProfileRow(row);
            if (rec) records.push(rec);
          }
        }
      } catch (e) {
        failedChunks++;
        log.warn("[CAPS] error fetching market caps", {
          symbols: syms,
          error: errorMessage(e),
        });
      }
    },
    workers
  );
  return { records, failedChunks };
}

export type EnsureCapsOptions = {
  /** cap lookup artifact, read then rewritten */
  capsPath: string;
  apiKey?: string;
  suffix: string;
  workers: number;
  /** most tickers fetched in one run */
  max: number;
  cacheHours: number;
  cache?: CapCacheDB;
  now?: number;
};

export type EnsureCapsSummary = {
  missing: number;
  fromCache: number;
  fetched: number;
};

/**
 * Make sure the cap lookup covers `tickers`. Tickers absent from the lookup
 * (or present without a cap) are served from the cache when fresh, else
 * fetched. The lookup is rewritten merge-and-overwrite in millions.
 */
export async function ensureCaps(
  tickers: readonly string[],
  opts: EnsureCapsOptions
): Promise<StageResult<EnsureCapsSummary>> {
  const stage = "fetch-caps";
  const lookup = loadCapLookup(readTable(opts.capsPath));
  const known = new Map<string, CapRecord>();
  for (const r of lookup.records) known.set(r.ticker, r);

  const missing = tickers.filter((t) => t && known.get(t)?.market_cap_m == null);
  const summary: EnsureCapsSummary = { missing: missing.length, fromCache: 0, fetched: 0 };
  if (!missing.length) return ok(stage, summary, known.size);

  if (!opts.apiKey) {
    log.warn("[CAPS] FMP_API_KEY missing — caps stay as they are", {
      missing: missing.length,
    });
    return degraded(stage, summary, "MissingInput", "FMP_API_KEY missing");
  }

  const notBefore = (opts.now ?? Date.now()) - opts.cacheHours * 3_600_000;
  const found: CapRecord[] = [];
  const toFetch: string[] = [];
  for (const t of missing) {
    const hit = opts.cache?.fresh(t, notBefore);
    if (hit) {
      log.debug("[CAPS] cache hit", { ticker: t });
      found.push(hit);
    } else toFetch.push(t);
  }
  summary.fromCache = found.length;

  log.info("[CAPS] fetching", { tickers: Math.min(toFetch.length, opts.max) });
  const { records, failedChunks } = await fetchMarketCaps(
    toFetch.slice(0, opts.max),
    { apiKey: opts.apiKey, suffix: opts.suffix, workers: opts.workers }
  );
  opts.cache?.save(records, opts.now);
  summary.fetched = records.length;

  for (const r of [...found, ...records]) {
    if (known.get(r.ticker)?.market_cap_m == null) known.set(r.ticker, r);
  }
  writeTable(opts.capsPath, CAP_COLUMNS, [...known.values()]);
  log.info("[CAPS] wrote lookup", { path: opts.capsPath, rows: known.size });

  return failedChunks
    ? degraded(
        stage,
        summary,
        "UpstreamFailure",
        `${failedChunks} request(s) failed`,
        known.size
      )
    : ok(stage, summary, known.size);
}
