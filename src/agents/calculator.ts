/**
 * Calculator unit: stateless, pulls price history from the cache and positions
 * from the gateway, then runs the allocation math.
 */

import type { Handlers, Unit, UnitContext } from "./supervisor.js";
import type { CalculatorProtocol, Protocols, SingleAllocationMsg, StopLossMsg } from "../types/units.js";
import { PERIOD_MS } from "../api/broker/decoders.js";
import { STORED_RESOLUTION } from "./gateway.js";
import {
  buildPortfolio,
  singleAllocation,
  stopLoss,
  type Candidate,
  type PortfolioParams,
  type PortfolioRow,
  type StopLossRow,
} from "../quant/allocation.js";

type Ctx = UnitContext<Protocols>;

/** Candles per year at the stored resolution */
export const YEARLY_FREQ = Math.floor(PERIOD_MS.P1Y / PERIOD_MS[STORED_RESOLUTION]);

export class CalculatorUnit implements Unit<CalculatorProtocol, Protocols> {
  readonly handlers: Handlers<CalculatorProtocol, Ctx> = {
    single_allocation: { mode: "concurrent", handle: (msg, ctx) => this.singleAllocation(msg, ctx) },
    calculate_portfolio: { mode: "concurrent", handle: (msg, ctx) => this.portfolio(msg, ctx) },
    recalculate_stop_loss: { mode: "concurrent", handle: (msg, ctx) => this.stopLosses(msg, ctx) },
  };

  private async singleAllocation(msg: SingleAllocationMsg, ctx: Ctx): Promise<number | null> {
    const series = await ctx.ask("cache", "get_price_series", { query: msg.query });
    if (!series) return null;
    const closes = series.candles.map((c) => c.close);
    const allocation = singleAllocation(closes, {
      mode: msg.mode,
      risk: msg.risk,
      riskFree: msg.riskFree,
      freq: YEARLY_FREQ,
    });
    if (allocation === null) {
      ctx.log.warn("Not enough history for an allocation", { query: msg.query, candles: closes.length });
    }
    return allocation;
  }

  private async portfolio(params: PortfolioParams, ctx: Ctx): Promise<PortfolioRow[]> {
    const assets = await ctx.ask("settings", "get_assets", {});
    const candidates: Candidate[] = [];

    for (const asset of assets) {
      const query = { by: "id", value: asset.id } as const;
      const [instrument, series] = await Promise.all([
        ctx.ask("cache", "get_instrument", { query }),
        ctx.ask("cache", "get_price_series", { query }),
      ]);
      if (!instrument || !series) {
        ctx.log.debug("Skipping asset without cached data", { id: asset.id });
        continue;
      }
      candidates.push({
        id: instrument.id,
        symbol: instrument.symbol,
        name: instrument.name,
        closes: series.candles.map((c) => c.close),
      });
    }

    const rows = buildPortfolio(candidates, params);
    ctx.log.info("Portfolio calculated", { candidates: candidates.length, selected: rows.length });
    return rows;
  }

  private async stopLosses(msg: StopLossMsg, ctx: Ctx): Promise<StopLossRow[]> {
    const [positions, defaults] = await Promise.all([
      ctx.ask("gateway", "get_positions", {}),
      ctx.ask("settings", "get_defaults", {}),
    ]);
    const maxPercent = msg.maxPercent ?? defaults.stopLossMaxPercent;
    const rows: StopLossRow[] = [];

    for (const position of positions) {
      if (position.positionType !== "PRODUCT" || position.size <= 0) continue;
      const series = await ctx.ask("cache", "get_price_series", { query: { by: "id", value: position.id } });
      if (!series) {
        ctx.log.warn("No cached prices for open position", { id: position.id });
        continue;
      }
      const result = stopLoss(
        series.candles.map((c) => c.close),
        msg.n,
        maxPercent,
        YEARLY_FREQ
      );
      if (result) {
        rows.push({ id: position.id, symbol: series.symbol, ...result });
      }
    }
    return rows;
  }
}
