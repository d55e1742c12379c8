import { describe, expect, it } from "vitest";
import {
  displayRows,
  formatFixed,
  renderReport,
  sortSection,
  truncate,
} from "../pipeline/emit.js";
import type { CombinedRow } from "../types.js";
import { MICROCAP_GROUP, SWING_GROUP } from "../types.js";
import { signal } from "./helpers.js";

const combined = (over: Partial<CombinedRow> = {}): CombinedRow => ({
  ...signal(),
  market_cap_m: null,
  sector: null,
  cap_band: "Unclassified",
  ...over,
});

describe("truncate", () => {
  it("keeps short text and flattens newlines", () => {
    expect(truncate("Profit beat")).toBe("Profit beat");
    expect(truncate("line one\nline two")).toBe("line one line two");
    expect(truncate(null)).toBe("");
  });

  it("cuts long text to the budget with an ellipsis", () => {
    const long = "x".repeat(95);
    const out = truncate(long);
    expect(out).toHaveLength(90);
    expect(out).toBe(`${"x".repeat(89)}…`);
    expect(truncate("abcdef", 4)).toBe("abc…");
  });

  it("never splits a character outside the basic plane", () => {
    expect(truncate("😀😀😀😀😀", 3)).toBe("😀😀…");
    expect(truncate("😀😀😀", 3)).toBe("😀😀😀");
  });
});

describe("formatFixed", () => {
  it("formats to fixed decimals and blanks nulls", () => {
    expect(formatFixed(100, 2)).toBe("100.00");
    expect(formatFixed(81.25, 1)).toBe("81.3");
    expect(formatFixed(null, 2)).toBe("");
  });
});

describe("sortSection", () => {
  it("sorts descending by each key in turn with nulls last, stably", () => {
    const rows = [
      combined({ ticker: "A", prob_pct: 50 }),
      combined({ ticker: "B", prob_pct: null }),
      combined({ ticker: "C", prob_pct: 80, exp_move_pct: 5 }),
      combined({ ticker: "D", prob_pct: 80, exp_move_pct: 9 }),
      combined({ ticker: "E", prob_pct: 50 }),
    ];
    expect(sortSection(rows, ["prob_pct", "exp_move_pct"]).map((r) => r.ticker)).toEqual([
      "D",
      "C",
      "A",
      "E",
      "B",
    ]);
  });
});

describe("displayRows", () => {
  it("formats the display columns", () => {
    const rows = displayRows(
      [
        combined({
          ticker: "CBA",
          cap_band: "Large-cap",
          prob_pct: 81.23,
          entry: 100,
          headline: "Model swing pick",
        }),
      ],
      5
    );
    expect(rows).toEqual([
      ["CBA", "Large-cap", "bullish", "81.2", "", "100.00", "", "", "Model swing pick"],
    ]);
  });

  it("limits to the top rows", () => {
    const rows = ["A", "B", "C"].map((ticker) => combined({ ticker }));
    expect(displayRows(rows, 2).map((r) => r[0])).toEqual(["A", "B"]);
  });
});

describe("renderReport", () => {
  it("prints None for empty sections", () => {
    expect(renderReport([], { topSwing: 12, topMicro: 50 })).toBe(
      `=== ${SWING_GROUP} (rows=0) ===\nNone\n\n=== ${MICROCAP_GROUP} (rows=0) ===\nNone`
    );
  });

  it("renders only the requested section", () => {
    const rows = [
      combined({ ticker: "CBA", prob_pct: 70 }),
      combined({ ticker: "WBC", prob_pct: 90 }),
      combined({ group: MICROCAP_GROUP, ticker: "ABC" }),
    ];
    const out = renderReport(rows, { topSwing: 12, topMicro: 50, section: "swing" });
    const lines = out.split("\n");
    expect(lines[0]).toBe(`=== ${SWING_GROUP} (rows=2) ===`);
    expect(out).not.toContain(MICROCAP_GROUP);
    expect(out.indexOf("WBC")).toBeLessThan(out.indexOf("CBA"));
  });

  it("does not modify its input", () => {
    const rows = Object.freeze([
      Object.freeze(combined({ ticker: "CBA", prob_pct: 10 })),
      Object.freeze(combined({ ticker: "WBC", prob_pct: 90 })),
    ]);
    renderReport(rows, { topSwing: 1, topMicro: 1 });
    expect(rows.map((r) => r.ticker)).toEqual(["CBA", "WBC"]);
  });
});
