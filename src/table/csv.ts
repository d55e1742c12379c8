import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Cell, RawRecord, RawTable } from "../types.js";
import { log } from "../logger.js";

export const emptyTable = (columns: readonly string[] = []): RawTable => ({
  columns: [...columns],
  rows: [],
});

/**
 * Parse CSV text into header + string records. Short rows are padded with "".
 * Text the parser gives up on (e.g. a quote left open by a truncated write)
 * keeps the records read before it and sets `malformed`.
 */
export function parseTable(text: string): RawTable {
  const records: string[][] = [];
  let malformed: string | undefined;
  try {
    parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      on_record: (record: unknown) => {
        if (Array.isArray(record)) records.push(record.map(String));
        return null;
      },
    });
  } catch (err) {
    if (!(err instanceof CsvError)) throw err;
    malformed = `${err.code}: ${err.message}`;
  }
  if (!records.length) return malformed ? { ...emptyTable(), malformed } : emptyTable();
  const [header, ...body] = records;
  const columns = header.map((c) => c.trim());
  const rows = body.map((cells) => {
    const row: RawRecord = {};
    columns.forEach((c, i) => {
      if (!(c in row)) row[c] = cells[i] ?? "";
    });
    return row;
  });
  return malformed ? { columns, rows, malformed } : { columns, rows };
}

/** Read a CSV artifact; `null` when the file does not exist. */
export function readTable(path: string): RawTable | null {
  if (!existsSync(path)) return null;
  const table = parseTable(readFileSync(path, "utf-8"));
  if (table.malformed) {
    log.warn("[CSV] malformed", { path, rows: table.rows.length, error: table.malformed });
  }
  return table;
}

function formatCell(v: Cell): string {
  if (v === null || v === undefined) return "";
  if (typeof v === "number") return Number.isFinite(v) ? String(v) : "";
  return v;
}

export function formatTable(
  columns: readonly string[],
  rows: readonly Partial<Record<string, Cell>>[]
): string {
  const header = stringify([[...columns]]);
  if (!rows.length) return header;
  return header + stringify(rows.map((r) => columns.map((c) => formatCell(r[c]))));
}

/** Write a CSV artifact; the header is always written, even with zero rows. */
export function writeTable(
  path: string,
  columns: readonly string[],
  rows: readonly Partial<Record<string, Cell>>[]
): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, formatTable(columns, rows));
}
