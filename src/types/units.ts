/**
 * Message protocols of the supervised units.
 * Each protocol maps a message type to its payload and reply. These are
 * type aliases, not interfaces, so they satisfy the supervisor's index
 * signatures.
 */

import type {
  CompanyRatios,
  DateRange,
  FinancialStatements,
  Instrument,
  InstrumentQuery,
  Order,
  Period,
  Position,
  PriceSeries,
  TrackedAsset,
  Transaction,
} from "./broker.js";
import type { PortfolioParams, PortfolioRow, RiskMode, StopLossRow } from "../quant/allocation.js";
import type { CalculatorDefaults } from "../storage/settings.js";

/** Payload of messages that carry no data */
export type Empty = Record<string, never>;

export type GatewayProtocol = {
  authorize: { msg: Empty; reply: void };
  fetch_data: { msg: FetchDataMsg; reply: void };
  get_instrument: { msg: { id: string }; reply: Instrument };
  get_price_series: { msg: { id: string; period: Period; resolution: Period }; reply: PriceSeries };
  get_positions: { msg: Empty; reply: Position[] };
  get_orders: { msg: Empty; reply: Order[] };
  get_transactions: { msg: DateRange; reply: Transaction[] };
};

export interface FetchDataMsg {
  id?: string;
  name?: string;
  /** Resubmissions after an unauthorized signal */
  attempt: number;
}

export type CacheProtocol = {
  put_instrument: { msg: Instrument; reply: void };
  put_price_series: { msg: PriceSeries; reply: void };
  put_financials: { msg: FinancialStatements; reply: void };
  put_ratios: { msg: CompanyRatios; reply: void };
  delete_data: { msg: { id: string }; reply: boolean };
  clean_up: { msg: Empty; reply: string[] };
  get_instrument: { msg: { query: InstrumentQuery }; reply: Instrument | null };
  get_price_series: { msg: { query: InstrumentQuery }; reply: PriceSeries | null };
  get_financials: { msg: { query: InstrumentQuery }; reply: FinancialStatements | null };
  get_ratios: { msg: { query: InstrumentQuery }; reply: CompanyRatios | null };
};

export type SettingsProtocol = {
  get_assets: { msg: Empty; reply: TrackedAsset[] };
  get_defaults: { msg: Empty; reply: CalculatorDefaults };
  add_asset: { msg: TrackedAsset; reply: boolean };
  delete_asset: { msg: { id: string }; reply: boolean };
};

export interface SingleAllocationMsg {
  query: InstrumentQuery;
  mode: RiskMode;
  risk: number;
  riskFree: number;
}

export interface StopLossMsg {
  n: number;
  maxPercent?: number;
}

export type CalculatorProtocol = {
  single_allocation: { msg: SingleAllocationMsg; reply: number | null };
  calculate_portfolio: { msg: PortfolioParams; reply: PortfolioRow[] };
  recalculate_stop_loss: { msg: StopLossMsg; reply: StopLossRow[] };
};

/** The listener only owns a socket; nothing is sent to it */
export type ListenerProtocol = Record<string, never>;

export type Protocols = {
  cache: CacheProtocol;
  settings: SettingsProtocol;
  gateway: GatewayProtocol;
  calculator: CalculatorProtocol;
  listener: ListenerProtocol;
};
