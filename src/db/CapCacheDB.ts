import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { CapRecord } from "../types.js";

type CapRow = {
  ticker: string;
  market_cap_m: number | null;
  sector: string | null;
  fetched_at: number;
};

/** SQLite cache of fetched fundamentals, so reruns skip fresh tickers */
export class CapCacheDB {
  private db: Database.Database;
  private qGet: Database.Statement<[string], CapRow>;
  private qUpsert: Database.Statement<[CapRow]>;

  constructor(path: string) {
    if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`CREATE TABLE IF NOT EXISTS caps (
      ticker TEXT PRIMARY KEY,
      market_cap_m REAL,
      sector TEXT,
      fetched_at INTEGER NOT NULL
    );`);
    this.qGet = this.db.prepare<[string], CapRow>(
      "SELECT ticker, market_cap_m, sector, fetched_at FROM caps WHERE ticker=?"
    );
    this.qUpsert = this.db.prepare<CapRow>(`INSERT INTO caps
      (ticker, market_cap_m, sector, fetched_at)
      VALUES (@ticker, @market_cap_m, @sector, @fetched_at)
      ON CONFLICT(ticker) DO UPDATE SET
        market_cap_m=excluded.market_cap_m,
        sector=excluded.sector,
        fetched_at=excluded.fetched_at`);
  }

  /** Cached record if fetched at or after `notBefore` (epoch ms). */
  fresh(ticker: string, notBefore: number): CapRecord | undefined {
    const row = this.qGet.get(ticker);
    if (!row || row.fetched_at < notBefore) return undefined;
    return {
      ticker: row.ticker,
      market_cap_m: row.market_cap_m,
      sector: row.sector,
    };
  }

  save(records: readonly CapRecord[], fetchedAt = Date.now()) {
    const tx = this.db.transaction((rows: readonly CapRecord[]) => {
      for (const r of rows) this.qUpsert.run({ ...r, fetched_at: fetchedAt });
    });
    tx(records);
  }

  close() {
    this.db.close();
  }
}
