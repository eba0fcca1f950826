/**
 * Persistent entity cache backed by SQLite (better-sqlite3).
 *
 * Four tables keyed by instrument id, each holding the JSON payload of one
 * entity. Every write runs in a transaction; WAL mode lets readers proceed
 * while a write is open. Any failure surfaces as StoreError, which is
 * critical to the owning unit.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { z } from "zod";
import { StoreError } from "../utils/errors.js";
import { agentLogger } from "../utils/logger.js";
import { InstrumentSchema, PriceSeriesSchema, ReportSchema } from "../utils/validation.js";
import type {
  CompanyRatios,
  FinancialStatements,
  Instrument,
  InstrumentQuery,
  PriceSeries,
} from "../types/broker.js";

const log = agentLogger("entity-store");

export const TABLES = ["instruments", "price_series", "financial_statements", "company_ratios"] as const;

export type Table = (typeof TABLES)[number];

interface PayloadRow {
  payload: string;
}

interface IdRow {
  id: string;
}

export class EntityStore {
  private readonly db: Database.Database;

  constructor(readonly dbPath: string) {
    try {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      this.db = new Database(dbPath);
      this.db.pragma("journal_mode = WAL");
      this.init();
    } catch (err) {
      throw new StoreError("open", err);
    }
    log.debug("Entity store opened", { path: dbPath });
  }

  private init(): void {
    for (const table of TABLES) {
      this.db.exec(`CREATE TABLE IF NOT EXISTS ${table} (id TEXT PRIMARY KEY, payload TEXT NOT NULL)`);
    }
  }

  // ── Writes ────────────────────────────────────────────────

  putInstrument(instrument: Instrument): void {
    this.put("instruments", instrument.id, instrument);
  }

  putPriceSeries(series: PriceSeries): void {
    this.put("price_series", series.id, series);
  }

  putFinancials(report: FinancialStatements): void {
    this.put("financial_statements", report.id, report);
  }

  putRatios(report: CompanyRatios): void {
    this.put("company_ratios", report.id, report);
  }

  /** Remove an id from every table in one transaction */
  deleteAll(id: string): boolean {
    return this.guard("delete", () => {
      const remove = this.db.transaction((target: string) => {
        let changes = 0;
        for (const table of TABLES) {
          changes += this.db.prepare<[string]>(`DELETE FROM ${table} WHERE id = ?`).run(target).changes;
        }
        return changes;
      });
      return remove(id) > 0;
    });
  }

  /** Delete every stored id that is not tracked; returns the removed ids */
  cleanUp(trackedIds: readonly string[]): string[] {
    const tracked = new Set(trackedIds);
    const stale = this.listIds().filter((id) => !tracked.has(id));
    if (stale.length === 0) return [];

    return this.guard("clean up", () => {
      const sweep = this.db.transaction((ids: string[]) => {
        for (const table of TABLES) {
          const stmt = this.db.prepare<[string]>(`DELETE FROM ${table} WHERE id = ?`);
          for (const id of ids) stmt.run(id);
        }
      });
      sweep(stale);
      log.info("Removed untracked entities", { count: stale.length });
      return stale;
    });
  }

  // ── Reads ─────────────────────────────────────────────────

  getInstrument(query: InstrumentQuery): Instrument | null {
    return this.guard("read", () => {
      if (query.by === "id") {
        return this.read("instruments", query.value, InstrumentSchema);
      }
      const all = this.db
        .prepare<[], PayloadRow>("SELECT payload FROM instruments ORDER BY id")
        .all()
        .map((row) => InstrumentSchema.parse(JSON.parse(row.payload)));
      return all.find(matcher(query)) ?? null;
    });
  }

  getPriceSeries(query: InstrumentQuery): PriceSeries | null {
    return this.readByQuery("price_series", query, PriceSeriesSchema);
  }

  getFinancials(query: InstrumentQuery): FinancialStatements | null {
    return this.readByQuery("financial_statements", query, ReportSchema);
  }

  getRatios(query: InstrumentQuery): CompanyRatios | null {
    return this.readByQuery("company_ratios", query, ReportSchema);
  }

  /** Every id present in any table */
  listIds(): string[] {
    return this.guard("list", () => {
      const union = TABLES.map((table) => `SELECT id FROM ${table}`).join(" UNION ");
      return this.db
        .prepare<[], IdRow>(`${union} ORDER BY id`)
        .all()
        .map((row) => row.id);
    });
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  // ── Internals ─────────────────────────────────────────────

  private put(table: Table, id: string, value: unknown): void {
    this.guard("write", () => {
      const write = this.db.transaction((key: string, payload: string) => {
        this.db
          .prepare<[string, string]>(`INSERT OR REPLACE INTO ${table} (id, payload) VALUES (?, ?)`)
          .run(key, payload);
      });
      write(id, JSON.stringify(value));
    });
  }

  private read<T>(table: Table, id: string, schema: z.ZodType<T>): T | null {
    const row = this.db.prepare<[string], PayloadRow>(`SELECT payload FROM ${table} WHERE id = ?`).get(id);
    return row ? schema.parse(JSON.parse(row.payload)) : null;
  }

  /** Non-id queries resolve to an id through the instruments table first */
  private readByQuery<T>(table: Table, query: InstrumentQuery, schema: z.ZodType<T>): T | null {
    const id = query.by === "id" ? query.value : this.getInstrument(query)?.id;
    if (id === undefined) return null;
    return this.guard("read", () => this.read(table, id, schema));
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StoreError) throw err;
      log.error(`Store ${operation} failed`, { error: err instanceof Error ? err.message : String(err) });
      throw new StoreError(operation, err);
    }
  }
}

/** Symbol: case-insensitive exact. Name: case-insensitive pattern, substring if the pattern is invalid */
export function matcher(query: InstrumentQuery): (instrument: Instrument) => boolean {
  switch (query.by) {
    case "id":
      return (instrument) => instrument.id === query.value;
    case "symbol": {
      const wanted = query.value.toLowerCase();
      return (instrument) => instrument.symbol.toLowerCase() === wanted;
    }
    case "name": {
      let pattern: RegExp | null = null;
      try {
        pattern = new RegExp(query.value, "i");
      } catch {
        pattern = null;
      }
      const needle = query.value.toLowerCase();
      return (instrument) =>
        pattern ? pattern.test(instrument.name) : instrument.name.toLowerCase().includes(needle);
    }
  }
}
