import { describe, expect, it } from "vitest";
import {
  EVENT_COLUMNS,
  enrichWithNews,
  latestHeadlines,
  mergeEventTables,
  parseEvents,
  taggedSource,
} from "../pipeline/news.js";
import { parseTable } from "../table/csv.js";
import type { NewsEvent } from "../types.js";
import { signal } from "./helpers.js";

const NOW = Date.parse("2024-05-10T00:00:00Z");
const hoursAgo = (h: number) => NOW - h * 3_600_000;

const event = (over: Partial<NewsEvent>): NewsEvent => ({
  ticker: "BHP",
  headline: "Headline",
  source: "afr.com",
  ts: NOW,
  index: 0,
  ...over,
});

describe("mergeEventTables", () => {
  it("unions columns in first-seen order and drops exact duplicates", () => {
    const api = parseTable(
      "ticker,headline,source,ts\nBHP,Output up,Reuters,2024-05-09T10:00:00Z\n"
    );
    const rss = parseTable(
      "ticker,headline,source,ts,url,domain\nCBA,Profit beat,afr.com,2024-05-09T11:00:00Z,https://afr.com/a,afr.com\n"
    );
    const previous = parseTable(
      "ticker,headline,source,ts,url,domain\nBHP,Output up,Reuters,2024-05-09T10:00:00Z,,\n"
    );
    const merged = mergeEventTables([api, rss, previous]);
    expect(merged.columns).toEqual(["ticker", "headline", "source", "ts", "url", "domain"]);
    expect(merged.rows).toEqual([
      {
        ticker: "BHP",
        headline: "Output up",
        source: "Reuters",
        ts: "2024-05-09T10:00:00Z",
        url: "",
        domain: "",
      },
      {
        ticker: "CBA",
        headline: "Profit beat",
        source: "afr.com",
        ts: "2024-05-09T11:00:00Z",
        url: "https://afr.com/a",
        domain: "afr.com",
      },
    ]);
  });

  it("falls back to the base event columns when nothing is present", () => {
    expect(mergeEventTables([null, null])).toEqual({
      columns: [...EVENT_COLUMNS],
      rows: [],
    });
  });
});

describe("parseEvents", () => {
  it("normalizes tickers and drops unusable rows", () => {
    const events = parseEvents(
      parseTable(
        [
          "ticker,headline,source,ts",
          "bhp.ax,Output up,Reuters,2024-05-09 10:00:00",
          "CBA,Bad stamp,afr.com,not-a-date",
          ",No ticker,afr.com,2024-05-09T10:00:00Z",
        ].join("\n")
      )
    );
    expect(events).toEqual([
      {
        ticker: "BHP",
        headline: "Output up",
        source: "Reuters",
        ts: Date.parse("2024-05-09T10:00:00Z"),
        index: 0,
      },
    ]);
  });

  it("reads aliased columns and a JSON ticker list", () => {
    const events = parseEvents(
      parseTable('ts_utc,title,tickers\n2024-05-09T08:00:00Z,Sector rally,"[""BHP"",""rio.ax""]"\n')
    );
    expect(events.map((e) => [e.ticker, e.headline, e.source, e.index])).toEqual([
      ["BHP", "Sector rally", "", 0],
      ["RIO", "Sector rally", "", 0],
    ]);
  });

  it("returns nothing without a timestamp column", () => {
    expect(parseEvents(parseTable("ticker,headline\nBHP,Hello\n"))).toEqual([]);
  });
});

describe("latestHeadlines", () => {
  it("picks the newest event per ticker", () => {
    const latest = latestHeadlines(
      [
        event({ headline: "older", ts: hoursAgo(10), index: 0 }),
        event({ headline: "newer", ts: hoursAgo(2), index: 1 }),
      ],
      NOW,
      96
    );
    expect(latest.get("BHP")?.headline).toBe("newer");
  });

  it("ignores events outside the window and keeps the cutoff itself", () => {
    const latest = latestHeadlines(
      [
        event({ ticker: "RIO", headline: "stale", ts: hoursAgo(97) }),
        event({ ticker: "CBA", headline: "edge", ts: hoursAgo(96) }),
      ],
      NOW,
      96
    );
    expect(latest.has("RIO")).toBe(false);
    expect(latest.get("CBA")?.headline).toBe("edge");
  });

  it("breaks timestamp ties by log position", () => {
    const latest = latestHeadlines(
      [
        event({ headline: "second", ts: hoursAgo(1), index: 1 }),
        event({ headline: "first", ts: hoursAgo(1), index: 0 }),
      ],
      NOW
    );
    expect(latest.get("BHP")?.headline).toBe("first");
  });

  it("skips events without a headline", () => {
    const latest = latestHeadlines(
      [
        event({ headline: "", ts: hoursAgo(1), index: 0 }),
        event({ headline: "has text", ts: hoursAgo(5), index: 1 }),
      ],
      NOW
    );
    expect(latest.get("BHP")?.headline).toBe("has text");
  });
});

describe("taggedSource", () => {
  it("appends the event source to the original", () => {
    expect(taggedSource("model", "afr.com")).toBe("model+news:afr.com");
    expect(taggedSource("model", "")).toBe("model+news");
    expect(taggedSource("", "afr.com")).toBe("news:afr.com");
  });
});

describe("enrichWithNews", () => {
  it("overwrites headline and source only on matched rows", () => {
    const latest = latestHeadlines(
      [event({ ticker: "BHP", headline: "Output up", source: "afr.com", ts: hoursAgo(3) })],
      NOW
    );
    const rows = [
      signal({ ticker: "BHP" }),
      signal({ ticker: "CBA" }),
      signal({ ticker: "" }),
    ];
    const out = enrichWithNews(rows, latest);
    expect(out).toHaveLength(3);
    expect(out[0]).toEqual({
      ...rows[0],
      headline: "Output up",
      source: "model+news:afr.com",
    });
    expect(out[1]).toEqual(rows[1]);
    expect(out[2]).toEqual(rows[2]);
  });

  it("uses the later of two in-window headlines from a merged log", () => {
    const merged = mergeEventTables([
      parseTable(
        [
          "ticker,headline,source,ts",
          "BHP,First take,Reuters,2024-05-09T01:00:00Z",
          "BHP,Second take,afr.com,2024-05-09T05:00:00Z",
        ].join("\n")
      ),
    ]);
    const latest = latestHeadlines(parseEvents(merged), NOW, 96);
    const [row] = enrichWithNews([signal({ ticker: "BHP" })], latest);
    expect(row.headline).toBe("Second take");
    expect(row.source).toBe("model+news:afr.com");
  });
});
