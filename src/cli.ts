#!/usr/bin/env node
// src/cli.ts
import { Command, InvalidArgumentError } from "commander";
import { artifactPaths, cfg } from "./config.js";
import { log } from "./logger.js";
import { readCombinedReport } from "./pipeline/combine.js";
import { renderReport, type ReportSection } from "./pipeline/emit.js";
import { MissingArtifactError } from "./pipeline/stage.js";
import { resolveUniverse } from "./pipeline/universe.js";
import { runPipeline } from "./run_pipeline.js";

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return n;
}

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError("expected a positive number");
  }
  return n;
}

function section(value: string): ReportSection {
  if (value === "swing" || value === "micro" || value === "all") return value;
  throw new InvalidArgumentError("expected swing, micro or all");
}

const program = new Command();

program
  .name("signal-combiner")
  .description(
    "Combine swing-model and microcap-scanner picks into one report with cap bands and recent headlines"
  );

program
  .command("run")
  .description("run the whole pipeline and print the report")
  .option("-w, --work-dir <dir>", "working directory", cfg.WORK_DIR)
  .option("--window-hours <n>", "news recency window", positiveNumber, cfg.NEWS_WINDOW_HOURS)
  .option("--top-swing <n>", "swing rows to print", positiveInt, cfg.TOP_SWING)
  .option("--top-micro <n>", "microcap rows to keep", positiveInt, cfg.TOP_MICRO)
  .option("--offline", "skip external steps and fetchers; use artifacts on disk", false)
  .action(
    async (o: {
      workDir: string;
      windowHours: number;
      topSwing: number;
      topMicro: number;
      offline: boolean;
    }) => {
      const { summary, combined } = await runPipeline({
        workDir: o.workDir,
        windowHours: o.windowHours,
        topMicro: o.topMicro,
        offline: o.offline,
      });
      console.log(
        renderReport(combined, { topSwing: o.topSwing, topMicro: o.topMicro })
      );
      console.log(`\n=== Run summary ===\n${summary.lines().join("\n")}`);
      console.log(`\n[OK] wrote -> ${artifactPaths(o.workDir).combined}`);
    }
  );

program
  .command("show")
  .description("print the persisted combined report")
  .option("-w, --work-dir <dir>", "working directory", cfg.WORK_DIR)
  .option("-n, --top <n>", "rows per section", positiveInt)
  .option("-s, --section <name>", "swing | micro | all", section, "all")
  .action((o: { workDir: string; top?: number; section: ReportSection }) => {
    const rows = readCombinedReport(artifactPaths(o.workDir).combined);
    console.log(
      renderReport(rows, {
        topSwing: o.top ?? cfg.TOP_SWING,
        topMicro: o.top ?? cfg.TOP_MICRO,
        section: o.section,
      })
    );
  });

program
  .command("universe")
  .description("resolve the tradable universe from the best available source")
  .option("-w, --work-dir <dir>", "working directory", cfg.WORK_DIR)
  .action((o: { workDir: string }) => {
    const { source, tickers } = resolveUniverse(artifactPaths(o.workDir));
    console.log(`source=${source} size=${tickers.length}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof MissingArtifactError) {
    log.error(`${err.message} (run: signal-combiner run)`);
  } else {
    log.error("fatal:", err);
  }
  process.exitCode = 1;
});
