/**
 * Maps a decoded Request onto unit asks and shapes the reply.
 * One request may fan out to several units before a single response.
 */

import type { UnitContext } from "../agents/supervisor.js";
import type { Protocols } from "../types/units.js";
import { errorMessage } from "../utils/errors.js";
import type { Request, Response } from "./messages.js";

export type Asker = Pick<UnitContext<Protocols>, "ask" | "tell">;

export async function dispatch(units: Asker, req: Request): Promise<Response | null> {
  switch (req.type) {
    case "Authorize":
      await units.ask("gateway", "authorize", {});
      return { type: "Ack" };

    case "FetchData":
      // Runs in the background; progress is visible in the gateway log
      units.tell("gateway", "fetch_data", { id: req.id, attempt: 0 });
      return { type: "Ack" };

    case "GetInstrument":
      return { type: "Instrument", instrument: await units.ask("cache", "get_instrument", { query: req.query }) };

    case "GetFinancials":
      return { type: "Financials", report: await units.ask("cache", "get_financials", { query: req.query }) };

    case "GetRatios":
      return { type: "Ratios", report: await units.ask("cache", "get_ratios", { query: req.query }) };

    case "GetPriceSeries":
      return { type: "PriceSeries", series: await units.ask("cache", "get_price_series", { query: req.query }) };

    case "GetSingleAllocation": {
      const { query, mode, risk, riskFree } = req;
      const allocation = await units.ask("calculator", "single_allocation", { query, mode, risk, riskFree });
      return { type: "SingleAllocation", allocation };
    }

    case "CalculatePortfolio": {
      const { type: _type, ...params } = req;
      return { type: "Portfolio", rows: await units.ask("calculator", "calculate_portfolio", params) };
    }

    case "RecalculateStopLoss":
      return {
        type: "StopLoss",
        rows: await units.ask("calculator", "recalculate_stop_loss", { n: req.n, maxPercent: req.maxPercent }),
      };

    case "GetPositions":
      return { type: "Positions", positions: await units.ask("gateway", "get_positions", {}) };

    case "GetTransactions":
      return {
        type: "Transactions",
        transactions: await units.ask("gateway", "get_transactions", { from: req.from, to: req.to }),
      };

    case "GetOrders":
      return { type: "Orders", orders: await units.ask("gateway", "get_orders", {}) };

    case "CleanUp":
      return { type: "CleanUp", removed: await units.ask("cache", "clean_up", {}) };

    case "AddAsset":
      await units.ask("settings", "add_asset", req.name === undefined ? { id: req.id } : { id: req.id, name: req.name });
      return { type: "Ack" };
  }
}

/** A failed ask becomes a Failure carrying the error text */
export async function dispatchSafely(units: Asker, req: Request): Promise<Response | null> {
  try {
    return await dispatch(units, req);
  } catch (err) {
    return { type: "Failure", message: errorMessage(err) };
  }
}
