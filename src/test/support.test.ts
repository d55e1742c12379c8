import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { formatTable, parseTable } from "../table/csv.js";
import { ColumnMap, parseTimestamp, toNumber } from "../table/schema.js";
import { chunk, runWithConcurrency } from "../utils/pool.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const conf = loadConfig({});
    expect(conf.NEWS_WINDOW_HOURS).toBe(96);
    expect(conf.TOP_SWING).toBe(12);
    expect(conf.TOP_MICRO).toBe(50);
    expect(conf.EXCHANGE_SUFFIX).toBe(".AX");
    expect(conf.FMP_API_KEY).toBeUndefined();
    expect(conf.LOG_LEVEL).toBe("info");
  });

  it("coerces numbers and treats blank keys as unset", () => {
    const conf = loadConfig({ NEWS_WINDOW_HOURS: "48", FMP_API_KEY: "  ", NEWSAPI_KEY: " test-key " });
    expect(conf.NEWS_WINDOW_HOURS).toBe(48);
    expect(conf.FMP_API_KEY).toBeUndefined();
    expect(conf.NEWSAPI_KEY).toBe("test-key");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ TOP_SWING: "abc" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});

describe("csv tables", () => {
  it("pads short rows and strips a BOM", () => {
    expect(parseTable("\uFEFFticker,headline\nBHP\n")).toEqual({
      columns: ["ticker", "headline"],
      rows: [{ ticker: "BHP", headline: "" }],
    });
  });

  it("keeps the rows read before an unterminated quote", () => {
    const table = parseTable('ticker,market_cap_m,sector\nCBA,120000,Financials\nBHP,150000,"Mater');
    expect(table.columns).toEqual(["ticker", "market_cap_m", "sector"]);
    expect(table.rows).toEqual([{ ticker: "CBA", market_cap_m: "120000", sector: "Financials" }]);
    expect(table.malformed).toMatch(/^CSV_QUOTE_NOT_CLOSED: /);
  });

  it("leaves well-formed tables unflagged", () => {
    expect(parseTable("ticker,market_cap_m,\nCBA,120000,\n").malformed).toBeUndefined();
  });

  it("writes a header even with no rows and quotes when needed", () => {
    expect(formatTable(["ticker", "headline"], [])).toBe("ticker,headline\n");
    expect(
      formatTable(["ticker", "headline", "prob_pct"], [
        { ticker: "BHP", headline: "Up, again", prob_pct: 81.2 },
        { ticker: "CBA", headline: null, prob_pct: null },
      ])
    ).toBe('ticker,headline,prob_pct\nBHP,"Up, again",81.2\nCBA,,\n');
  });
});

describe("cell parsing", () => {
  it("reads numbers tolerantly", () => {
    expect(toNumber("1,234.5")).toBe(1234.5);
    expect(toNumber(" ")).toBeNull();
    expect(toNumber("n/a")).toBeNull();
  });

  it("reads zone-less timestamps as UTC", () => {
    expect(parseTimestamp("2024-05-09 10:00")).toBe(Date.parse("2024-05-09T10:00:00Z"));
    expect(parseTimestamp("2024-05-09T10:00:00+10:00")).toBe(Date.parse("2024-05-09T00:00:00Z"));
    expect(parseTimestamp("garbage")).toBeNull();
  });

  it("resolves the first present column and applies its scale", () => {
    const cols = new ColumnMap(["prob_pct", "MLProb"], {
      prob: [{ column: "MLProb", scale: 100 }, { column: "prob_pct" }],
    });
    expect(cols.rule("prob")).toEqual({ column: "MLProb", scale: 100 });
    expect(cols.number({ MLProb: "0.5", prob_pct: "10" }, "prob")).toBe(50);
  });
});

describe("runWithConcurrency", () => {
  it("never runs more than the limit at once and visits every item", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];
    await runWithConcurrency(
      [1, 2, 3, 4, 5, 6, 7],
      async (n) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((r) => setTimeout(r, 5));
        seen.push(n);
        active--;
      },
      3
    );
    expect(peak).toBe(3);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("keeps going when a worker throws", async () => {
    const seen: number[] = [];
    await runWithConcurrency(
      [1, 2, 3],
      async (n) => {
        if (n === 2) throw new Error("boom");
        seen.push(n);
      },
      1
    );
    expect(seen).toEqual([1, 3]);
  });
});

describe("chunk", () => {
  it("splits into fixed-size groups", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});
