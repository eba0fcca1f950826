/**
 * Cache unit: sole owner of the entity store.
 * Writes are sequential so they land in arrival order; reads run concurrently.
 */

import { EntityStore } from "../storage/entity-store.js";
import type { Handlers, Unit, UnitContext } from "./supervisor.js";
import type { CacheProtocol, Protocols } from "../types/units.js";

type Ctx = UnitContext<Protocols>;

export class CacheUnit implements Unit<CacheProtocol, Protocols> {
  readonly handlers: Handlers<CacheProtocol, Ctx>;
  private readonly store: EntityStore;

  constructor(dbPath: string) {
    this.store = new EntityStore(dbPath);
    const store = this.store;

    this.handlers = {
      put_instrument: { mode: "sequential", handle: (instrument) => store.putInstrument(instrument) },
      put_price_series: { mode: "sequential", handle: (series) => store.putPriceSeries(series) },
      put_financials: { mode: "sequential", handle: (report) => store.putFinancials(report) },
      put_ratios: { mode: "sequential", handle: (report) => store.putRatios(report) },
      delete_data: {
        mode: "sequential",
        handle: ({ id }, ctx) => {
          const removed = store.deleteAll(id);
          ctx.log.info("Purged cached data", { id, removed });
          return removed;
        },
      },
      clean_up: {
        mode: "sequential",
        handle: async (_msg, ctx) => {
          const tracked = await ctx.ask("settings", "get_assets", {});
          return store.cleanUp(tracked.map((asset) => asset.id));
        },
      },
      get_instrument: { mode: "concurrent", handle: ({ query }) => store.getInstrument(query) },
      get_price_series: { mode: "concurrent", handle: ({ query }) => store.getPriceSeries(query) },
      get_financials: { mode: "concurrent", handle: ({ query }) => store.getFinancials(query) },
      get_ratios: { mode: "concurrent", handle: ({ query }) => store.getRatios(query) },
    };
  }

  stop(): void {
    this.store.close();
  }
}
