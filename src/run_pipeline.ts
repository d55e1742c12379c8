// src/run_pipeline.ts
import { cfg, artifactPaths, type Config } from "./config.js";
import { CapCacheDB } from "./db/CapCacheDB.js";
import { log } from "./logger.js";
import { enrichWithCaps, loadCapLookup } from "./pipeline/caps.js";
import { combineSignals, combinedTickers } from "./pipeline/combine.js";
import { runExternalStep } from "./pipeline/external.js";
import { adaptMicrocap } from "./pipeline/microcap.js";
import {
  enrichWithNews,
  latestHeadlines,
  mergeEventTables,
  parseEvents,
} from "./pipeline/news.js";
import {
  RunSummary,
  degraded,
  errorMessage,
  failed,
  ok,
} from "./pipeline/stage.js";
import { latestCandidate, normalizeSwing } from "./pipeline/swing.js";
import { resolveUniverse } from "./pipeline/universe.js";
import { ensureCaps } from "./providers/fmp.js";
import { fetchAllNews } from "./providers/index.js";
import { readTable, writeTable } from "./table/csv.js";
import type { CombinedRow } from "./types.js";
import { COMBINED_COLUMNS, SIGNAL_COLUMNS } from "./types.js";

export type PipelineOptions = {
  workDir: string;
  windowHours: number;
  topMicro: number;
  /** skip external collaborators and network fetchers; use artifacts on disk */
  offline?: boolean;
  /** "now" for the news window, epoch ms */
  now?: number;
  /** keys, commands and fetch limits; defaults to the process config */
  config?: Config;
};

export type PipelineResult = {
  summary: RunSummary;
  combined: CombinedRow[];
};

/**
 * One sequential run. Every stage persists its artifact before the next
 * starts; a stage that cannot get complete inputs degrades instead of
 * stopping the run.
 */
export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const conf = opts.config ?? cfg;
  const paths = artifactPaths(opts.workDir);
  const now = opts.now ?? Date.now();
  const summary = new RunSummary();
  const started = Date.now();
  log.info("[RUN] start", { workDir: paths.root, offline: !!opts.offline });

  /* ---------- universe ---------- */
  const universe = resolveUniverse(paths);
  summary.record(
    universe.source === "empty"
      ? degraded("universe", universe, "MissingInput", "no universe source found", 0)
      : ok("universe", universe, universe.tickers.length)
  );

  /* ---------- swing model ---------- */
  if (!opts.offline) {
    summary.record(
      await runExternalStep("model", conf.MODEL_CMD, { cwd: paths.root })
    );
  }
  const candidate = latestCandidate(paths.modelOutDir);
  const swingTable = candidate ? readTable(candidate) : null;
  const swing = normalizeSwing(swingTable);
  writeTable(paths.swingReport, SIGNAL_COLUMNS, swing);
  summary.record(
    !swingTable
      ? degraded("swing", swing, "MissingInput", "no trade_plan*.csv", 0)
      : swingTable.malformed
        ? degraded("swing", swing, "MalformedRow", swingTable.malformed, swing.length)
        : ok("swing", swing, swing.length)
  );

  /* ---------- microcap scanner ---------- */
  if (!opts.offline) {
    summary.record(
      await runExternalStep("scanner", conf.SCANNER_CMD, {
        cwd: paths.root,
        env: {
          UNIVERSE_CSV: paths.universe,
          CAPS_CSV: paths.caps,
          EVENTS_CSV: paths.events,
          OUT_CSV: paths.microcap,
          TOP: String(opts.topMicro),
        },
      })
    );
  }
  const microTable = readTable(paths.microcap);
  const micro = adaptMicrocap(microTable, opts.topMicro);
  summary.record(
    !microTable
      ? degraded("microcap", micro, "MissingInput", "no scanner output", 0)
      : microTable.malformed
        ? degraded("microcap", micro, "MalformedRow", microTable.malformed, micro.length)
        : ok("microcap", micro, micro.length)
  );

  /* ---------- combine ---------- */
  const signals = combineSignals(swing, micro);
  writeTable(paths.combined, SIGNAL_COLUMNS, signals);
  const tickers = combinedTickers(signals);
  writeTable(paths.combinedTickers, ["ticker"], tickers.map((ticker) => ({ ticker })));
  summary.record(ok("combine", signals, signals.length));

  /* ---------- caps ---------- */
  if (!opts.offline) {
    let cache: CapCacheDB | undefined;
    try {
      cache = new CapCacheDB(paths.capsDb);
      summary.record(
        await ensureCaps(tickers, {
          capsPath: paths.caps,
          apiKey: conf.FMP_API_KEY,
          suffix: conf.EXCHANGE_SUFFIX,
          workers: conf.CAPS_WORKERS,
          max: conf.CAPS_MAX,
          cacheHours: conf.CAPS_CACHE_HOURS,
          cache,
          now,
        })
      );
    } catch (err) {
      log.error("[CAPS] fetch stage error", { err: errorMessage(err) });
      summary.record(failed("fetch-caps", "UpstreamFailure", errorMessage(err)));
    } finally {
      cache?.close();
    }
  }
  const lookup = loadCapLookup(readTable(paths.caps));
  const banded = enrichWithCaps(signals, lookup.records);
  writeTable(paths.combined, COMBINED_COLUMNS, banded);
  summary.record(
    lookup.issue
      ? degraded("caps", banded, lookup.issue.kind, lookup.issue.reason, banded.length)
      : ok("caps", banded, banded.length)
  );
  if (lookup.rescaled) log.info("[CAPS] cap column read as whole currency; divided by 1e6");

  /* ---------- news ---------- */
  if (!opts.offline) {
    try {
      summary.record(
        await fetchAllNews(tickers, {
          apiPath: paths.newsApi,
          rssPath: paths.newsRss,
          rssSourcesPath: paths.rssSources,
          aliasesPath: paths.newsAliases,
          newsApiKey: conf.NEWSAPI_KEY,
          eodhdKey: conf.EODHD_API_KEY,
          hours: opts.windowHours,
          workers: conf.CAPS_WORKERS,
          now,
        })
      );
    } catch (err) {
      log.error("[NEWS] fetch stage error", { err: errorMessage(err) });
      summary.record(failed("fetch-news", "UpstreamFailure", errorMessage(err)));
    }
  }
  const eventTables = [
    readTable(paths.newsApi),
    readTable(paths.newsRss),
    readTable(paths.events),
  ];
  const merged = mergeEventTables(eventTables);
  writeTable(paths.events, merged.columns, merged.rows);
  const latest = latestHeadlines(parseEvents(merged), now, opts.windowHours);
  const combined = enrichWithNews(banded, latest);
  writeTable(paths.combined, COMBINED_COLUMNS, combined);
  const matched = combined.filter((r) => r.ticker && latest.has(r.ticker)).length;
  const broken = eventTables.find((t) => t?.malformed)?.malformed;
  summary.record(
    broken
      ? degraded("news", combined, "MalformedRow", broken, matched)
      : merged.rows.length
        ? ok("news", combined, matched)
        : degraded("news", combined, "MissingInput", "no news events", 0)
  );

  log.info("[RUN] end", { rows: combined.length, tookMs: Date.now() - started });
  return { summary, combined };
}
