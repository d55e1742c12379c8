// src/pipeline/ticker.ts
import type { Cell } from "../types.js";

const EXCHANGE_SUFFIX = /\.(AX|ASX)$/;
const NON_ALNUM = /[^0-9A-Z]+/g;

/**
 * Canonical ticker: uppercase, whitespace gone, trailing .AX/.ASX dropped,
 * then anything outside [0-9A-Z] removed. "" is a valid (unjoinable) result.
 */
export function normalizeTicker(input: Cell): string {
  if (input === null || input === undefined) return "";
  return String(input)
    .toUpperCase()
    .replace(/\s+/g, "")
    .replace(EXCHANGE_SUFFIX, "")
    .replace(NON_ALNUM, "");
}
