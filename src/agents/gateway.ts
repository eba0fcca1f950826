/**
 * Gateway unit: the only owner of the brokerage session.
 *
 * Every handler is concurrent; the client's single-flight login keeps
 * parallel callers from logging in more than once. A fetch_data message that
 * hits an unauthorized signal re-authorizes and resubmits itself through the
 * mailbox instead of retrying on the stack.
 */

import type { BrokerClient } from "../api/broker/client.js";
import type { Handlers, Unit, UnitContext } from "./supervisor.js";
import type { FetchDataMsg, GatewayProtocol, Protocols } from "../types/units.js";
import type { Period, PriceSeries } from "../types/broker.js";
import { describeError } from "../utils/logger.js";
import { isAssetFailure, isUnauthorized } from "../utils/errors.js";

type Ctx = UnitContext<Protocols>;

/** A fetch_data message at this attempt is dropped */
export const MAX_FETCH_ATTEMPTS = 2;

/** The one canonical series persisted per instrument */
export const STORED_PERIOD: Period = "P50Y";
export const STORED_RESOLUTION: Period = "P1M";

export class GatewayUnit implements Unit<GatewayProtocol, Protocols> {
  readonly handlers: Handlers<GatewayProtocol, Ctx>;

  constructor(private readonly client: BrokerClient) {
    this.handlers = {
      authorize: { mode: "concurrent", handle: () => this.authorize() },
      fetch_data: { mode: "concurrent", handle: (msg, ctx) => this.fetchData(msg, ctx) },
      get_instrument: { mode: "concurrent", handle: ({ id }) => this.client.instrument(id) },
      get_price_series: {
        mode: "concurrent",
        handle: ({ id, period, resolution }) => this.client.fetchPriceSeries(id, period, resolution),
      },
      get_positions: { mode: "concurrent", handle: () => this.client.fetchPositions() },
      get_orders: { mode: "concurrent", handle: () => this.client.fetchOrders() },
      get_transactions: { mode: "concurrent", handle: (range) => this.client.fetchTransactions(range) },
    };
  }

  /** Fresh login, then the endpoint map and account snapshot */
  private async authorize(): Promise<void> {
    await this.client.reauthenticate(this.client.currentSession());
    await this.client.resolveEndpoints();
    await this.client.fetchAccountSnapshot();
  }

  private async fetchData(msg: FetchDataMsg, ctx: Ctx): Promise<void> {
    if (msg.attempt >= MAX_FETCH_ATTEMPTS) {
      ctx.log.error("Dropping fetch_data after repeated unauthorized responses", {
        id: msg.id,
        attempt: msg.attempt,
      });
      return;
    }

    try {
      if (msg.id === undefined) {
        await this.fetchAll(ctx);
      } else {
        await this.fetchOne(msg.id, msg.name, ctx);
      }
    } catch (err) {
      if (!isUnauthorized(err)) throw err;
      ctx.log.warn("Unauthorized during fetch_data, re-authorizing", { id: msg.id, attempt: msg.attempt });
      await ctx.ask("gateway", "authorize", {});
      ctx.tell("gateway", "fetch_data", { ...msg, attempt: msg.attempt + 1 });
    }
  }

  /** One message per tracked asset, so one failure does not stop the rest */
  private async fetchAll(ctx: Ctx): Promise<void> {
    await ctx.ask("gateway", "authorize", {});
    const assets = await ctx.ask("settings", "get_assets", {});
    ctx.log.info(`Fetching data for ${assets.length} tracked assets`);
    for (const asset of assets) {
      ctx.tell("gateway", "fetch_data", { id: asset.id, name: asset.name, attempt: 0 });
    }
  }

  private async fetchOne(id: string, name: string | undefined, ctx: Ctx): Promise<void> {
    const instrument = await this.required(id, name, ctx, () => this.client.instrument(id));
    if (!instrument) return;
    ctx.tell("cache", "put_instrument", instrument);

    const series: PriceSeries | null = await this.required(id, name, ctx, () =>
      this.client.fetchPriceSeries(id, STORED_PERIOD, STORED_RESOLUTION)
    );
    if (!series) return;
    ctx.tell("cache", "put_price_series", series);

    const financials = await this.required(id, name, ctx, () => this.client.fetchFinancialStatements(id));
    if (!financials) return;
    ctx.tell("cache", "put_financials", financials);

    const ratios = await this.required(id, name, ctx, () => this.client.fetchCompanyRatios(id));
    if (!ratios) return;
    ctx.tell("cache", "put_ratios", ratios);

    ctx.log.info("Fetched data", { id, symbol: instrument.symbol, candles: series.candles.length });
  }

  /**
   * Run one fetch of the asset's data. A failure specific to the asset
   * (unknown, rejected, undecodable) drops it from settings and purges it
   * from the cache; session, login and network failures propagate instead.
   */
  private async required<T>(
    id: string,
    name: string | undefined,
    ctx: Ctx,
    fetch: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await fetch();
    } catch (err) {
      if (!isAssetFailure(err)) throw err;
      ctx.log.error("Dropping asset after failed fetch", { id, name, error: describeError(err) });
      await ctx.ask("settings", "delete_asset", { id });
      await ctx.ask("cache", "delete_data", { id });
      return null;
    }
  }
}
