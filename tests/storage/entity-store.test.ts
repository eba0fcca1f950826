/**
 * Entity Store Tests
 */

import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EntityStore, matcher } from "../../src/storage/entity-store.js";
import type { Instrument, PriceSeries, Report } from "../../src/types/broker.js";
import { tempDir } from "../support/brokerage.js";

function instrument(id: string, symbol: string, name: string): Instrument {
  return {
    id,
    symbol,
    name,
    isin: `XX${id.padStart(10, "0")}`,
    vwdId: `vwd-${id}`,
    category: "A",
    currency: "EUR",
    tradable: true,
    active: true,
    buyOrderTypes: ["LIMIT"],
    sellOrderTypes: ["LIMIT", "STOPLOSS"],
    closePrice: 101.5,
    closePriceDate: "2021-12-01",
  };
}

function series(id: string, symbol: string): PriceSeries {
  return {
    id,
    symbol,
    period: "P50Y",
    resolution: "P1M",
    candles: [{ time: Date.UTC(2020, 0, 1), open: 1, high: 2, low: 0.5, close: 1.5 }],
  };
}

function report(id: string): Report {
  return { id, isin: `XX${id}`, fetchedAt: 1_600_000_000_000, data: { revenue: [1, 2, 3], currency: "EUR" } };
}

describe("EntityStore", () => {
  let dbPath: string;
  let store: EntityStore;

  beforeEach(() => {
    dbPath = path.join(tempDir(), "entities.sqlite");
    store = new EntityStore(dbPath);
  });

  afterEach(() => {
    store.close();
  });

  it("should keep entities across a reopen", () => {
    store.putInstrument(instrument("332111", "ACME", "Acme Holdings NV"));
    store.putPriceSeries(series("332111", "ACME"));
    store.close();

    store = new EntityStore(dbPath);
    expect(store.getInstrument({ by: "id", value: "332111" })).toEqual(instrument("332111", "ACME", "Acme Holdings NV"));
    expect(store.getPriceSeries({ by: "id", value: "332111" })).toEqual(series("332111", "ACME"));
  });

  it("should replace an entity written twice", () => {
    store.putRatios(report("332111"));
    store.putRatios({ ...report("332111"), data: null });
    expect(store.getRatios({ by: "id", value: "332111" })?.data).toBeNull();
  });

  it("should look up by symbol and name through the instruments table", () => {
    store.putInstrument(instrument("332111", "ACME", "Acme Holdings NV"));
    store.putFinancials(report("332111"));

    expect(store.getInstrument({ by: "symbol", value: "acme" })?.id).toBe("332111");
    expect(store.getFinancials({ by: "name", value: "^acme" })?.id).toBe("332111");
    expect(store.getFinancials({ by: "symbol", value: "NOPE" })).toBeNull();
  });

  it("should delete an id from every table", () => {
    store.putInstrument(instrument("332111", "ACME", "Acme Holdings NV"));
    store.putFinancials(report("332111"));

    expect(store.deleteAll("332111")).toBe(true);
    expect(store.deleteAll("332111")).toBe(false);
    expect(store.listIds()).toEqual([]);
  });

  it("should clean up untracked ids and be idempotent", () => {
    store.putInstrument(instrument("332111", "ACME", "Acme Holdings NV"));
    store.putInstrument(instrument("480012", "GLBX", "Globex Corporation"));
    store.putRatios(report("555000"));

    expect(store.cleanUp(["332111"])).toEqual(["480012", "555000"]);
    expect(store.cleanUp(["332111"])).toEqual([]);
    expect(store.listIds()).toEqual(["332111"]);
  });
});

describe("matcher", () => {
  const acme = instrument("332111", "ACME", "Acme Holdings NV");

  it("should match symbols exactly, ignoring case", () => {
    expect(matcher({ by: "symbol", value: "acme" })(acme)).toBe(true);
    expect(matcher({ by: "symbol", value: "acm" })(acme)).toBe(false);
  });

  it("should treat names as case-insensitive patterns", () => {
    expect(matcher({ by: "name", value: "holdings\\s+nv$" })(acme)).toBe(true);
    expect(matcher({ by: "name", value: "globex" })(acme)).toBe(false);
  });

  it("should fall back to a substring match for an invalid pattern", () => {
    const odd = instrument("1", "ODD", "Odd (Class A");
    expect(matcher({ by: "name", value: "(class a" })(odd)).toBe(true);
  });
});
