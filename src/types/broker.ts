/**
 * Brokerage entity types.
 * Shapes decoded from the upstream web API and persisted by the entity store.
 */

/** JSON-compatible value, used for report bodies we do not model field by field */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Base URLs discovered through the account-config call */
export interface EndpointMap {
  portfolioAccount: string;
  productSearch: string;
  trading: string;
  reporting: string;
  financialStatements: string;
  companyRatios: string;
}

export interface AccountSnapshot {
  id: number;
  intAccount: number;
  username?: string;
  displayName?: string;
  baseCurrency?: string;
}

export interface Instrument {
  id: string;
  symbol: string;
  name: string;
  isin: string;
  vwdId: string;
  category: string;
  currency: string;
  tradable: boolean;
  active: boolean;
  buyOrderTypes: string[];
  sellOrderTypes: string[];
  closePrice: number;
  closePriceDate: string;
}

export interface Candle {
  /** Epoch milliseconds */
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
}

/** ISO-8601 duration codes accepted by the chart endpoint */
export type Period =
  | "PT1S"
  | "PT1M"
  | "PT1H"
  | "P1D"
  | "P1W"
  | "P1M"
  | "P3M"
  | "P6M"
  | "P1Y"
  | "P3Y"
  | "P5Y"
  | "P50Y";

export interface PriceSeries {
  id: string;
  symbol: string;
  period: Period;
  resolution: Period;
  candles: Candle[];
}

export interface Report {
  id: string;
  isin: string;
  fetchedAt: number;
  data: JsonValue;
}

export type FinancialStatements = Report;
export type CompanyRatios = Report;

export type Side = "BUY" | "SELL";

export interface Position {
  id: string;
  positionType: string;
  size: number;
  price: number;
  value: number;
  breakEvenPrice: number;
  accruedInterest?: number;
  portfolioValueCorrection?: number;
  averageFxRate?: number;
  realizedProductPl?: number;
  realizedFxPl?: number;
  todayRealizedProductPl?: number;
  todayRealizedFxPl?: number;
}

export interface Order {
  id: string;
  date: string;
  productId: string;
  symbol: string;
  currency: string;
  side: Side;
  size: number;
  quantity: number;
  price: number;
  stopPrice?: number;
  totalOrderValue?: number;
  orderType?: string;
  orderTimeType?: string;
  isModifiable?: boolean;
  isDeletable?: boolean;
}

export interface Transaction {
  id: number;
  productId: number;
  date: string;
  side: Side;
  quantity: number;
  price: number;
  total: number;
  totalInBaseCurrency: number;
  totalFeesInBaseCurrency: number;
  fxRate: number;
  transactionTypeId: number;
  counterParty?: string;
  tradingVenue?: string;
}

export interface DateRange {
  /** YYYY-MM-DD */
  from: string;
  to: string;
}

/** Entity lookup: by primary key, by exact symbol, or by display-name pattern */
export type InstrumentQuery =
  | { by: "id"; value: string }
  | { by: "symbol"; value: string }
  | { by: "name"; value: string };

export interface TrackedAsset {
  id: string;
  name?: string;
}
