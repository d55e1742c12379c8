// src/pipeline/universe.ts
import { existsSync, readdirSync, readFileSync } from "node:fs";
import { readTable, writeTable } from "../table/csv.js";
import { log } from "../logger.js";
import { normalizeTicker } from "./ticker.js";

export type UniverseSource = "artifact" | "seed" | "price-cache" | "empty";

export type UniverseResult = {
  source: UniverseSource;
  tickers: string[];
};

export type UniversePaths = {
  /** pre-validated universe artifact (single `ticker` column) */
  universe: string;
  /** raw seed list, one ticker per line */
  universeSeed: string;
  /** directory holding cache_<SYM>.AX_ohlc.csv files */
  priceCacheDir: string;
};

const PRICE_CACHE_FILE = /^cache_([A-Z0-9]+)\.AX_ohlc\.csv$/;

function fromSeed(path: string): string[] {
  return readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .filter((line) => line.trim())
    .map(normalizeTicker)
    .filter(Boolean);
}

function fromPriceCache(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .sort()
    .map((name) => PRICE_CACHE_FILE.exec(name)?.[1])
    .filter((sym): sym is string => !!sym);
}

/**
 * Tradable universe from the best available source. The artifact, when it
 * exists, is reused untouched; every other source (re)writes it.
 */
export function resolveUniverse(paths: UniversePaths): UniverseResult {
  const existing = readTable(paths.universe);
  if (existing) {
    const tickers = existing.rows
      .map((r) => r.ticker ?? "")
      .filter(Boolean);
    log.info("[UNIVERSE] already present", {
      path: paths.universe,
      size: tickers.length,
    });
    return { source: "artifact", tickers };
  }

  let result: UniverseResult;
  if (existsSync(paths.universeSeed)) {
    result = { source: "seed", tickers: fromSeed(paths.universeSeed) };
  } else {
    const cached = fromPriceCache(paths.priceCacheDir);
    result = cached.length
      ? { source: "price-cache", tickers: cached }
      : { source: "empty", tickers: [] };
  }

  writeTable(
    paths.universe,
    ["ticker"],
    result.tickers.map((ticker) => ({ ticker }))
  );
  log.info("[UNIVERSE] built", {
    source: result.source,
    size: result.tickers.length,
  });
  return result;
}
