import { mkdtempSync, mkdirSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { SignalRow } from "../types.js";
import { SWING_GROUP } from "../types.js";

export function tmpDir(prefix = "signal-combiner-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function put(root: string, rel: string, content: string): string {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
  return path;
}

export const signal = (over: Partial<SignalRow> = {}): SignalRow => ({
  group: SWING_GROUP,
  ticker: "CBA",
  label: "bullish",
  prob_pct: null,
  exp_move_pct: null,
  side: "long",
  entry: null,
  tp: null,
  sl: null,
  headline: "Model swing pick",
  source: "model",
  ...over,
});
