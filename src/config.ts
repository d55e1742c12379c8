import "dotenv/config";
import { join, resolve } from "node:path";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Validate & normalize environment variables */
const EnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  WORK_DIR: z.string().default("."),
  NEWS_WINDOW_HOURS: z.coerce.number().positive().default(96),
  TOP_SWING: z.coerce.number().int().positive().default(12),
  TOP_MICRO: z.coerce.number().int().positive().default(50),
  CAPS_WORKERS: z.coerce.number().int().positive().default(8),
  CAPS_MAX: z.coerce.number().int().positive().default(10000),
  CAPS_CACHE_HOURS: z.coerce.number().nonnegative().default(24),
  CAPS_DB_PATH: z.string().default("data/fundamentals_cache.db"),
  EXCHANGE_SUFFIX: z.string().default(".AX"),
  FMP_API_KEY: optionalString,
  NEWSAPI_KEY: optionalString,
  EODHD_API_KEY: optionalString,
  MODEL_CMD: optionalString,
  SCANNER_CMD: optionalString,
});

export type Config = z.infer<typeof EnvSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Config {
  return EnvSchema.parse(env);
}

export const cfg: Config = loadConfig();

/** Every artifact the pipeline reads or writes, relative to one working directory. */
export function artifactPaths(workDir: string = cfg.WORK_DIR) {
  const root = resolve(workDir);
  return {
    root,
    universe: join(root, "data", "nextday_universe_valid.csv"),
    universeSeed: join(root, "universe_ax.txt"),
    priceCacheDir: root,
    modelOutDir: join(root, "out"),
    swingReport: join(root, "artifacts", "nextday_report.csv"),
    microcap: join(root, "artifacts", "microcap_candidates.csv"),
    combined: join(root, "artifacts", "nextday_combined.csv"),
    combinedTickers: join(root, "artifacts", "combined_tickers.csv"),
    caps: join(root, "data", "universe_caps.csv"),
    newsApi: join(root, "data", "news_api.csv"),
    newsRss: join(root, "data", "news_rss.csv"),
    events: join(root, "data", "events.csv"),
    rssSources: join(root, "data", "rss_sources.txt"),
    newsAliases: join(root, "data", "news_aliases.csv"),
    capsDb: resolve(root, cfg.CAPS_DB_PATH),
  };
}

export type ArtifactPaths = ReturnType<typeof artifactPaths>;
