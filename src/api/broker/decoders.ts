/**
 * Payload decoders for the brokerage web API.
 *
 * Every upstream body passes through a zod schema before it reaches the
 * client; a mismatch becomes a DecodeError carrying the operation name and
 * the schema issues so drift in the upstream format is diagnosable from logs.
 */

import { z } from "zod";
import { DecodeError } from "../../utils/errors.js";
import { JsonValueSchema, PeriodSchema } from "../../utils/validation.js";
import type {
  AccountSnapshot,
  Candle,
  EndpointMap,
  Instrument,
  JsonValue,
  Order,
  Period,
  Position,
  PriceSeries,
  Side,
  Transaction,
} from "../../types/broker.js";

// ── Periods ─────────────────────────────────────────────────

const SECOND = 1_000;
const DAY = 86_400 * SECOND;
const YEAR = 365 * DAY;

/** Fixed durations; months and years are not calendar-aware */
export const PERIOD_MS: Readonly<Record<Period, number>> = {
  PT1S: SECOND,
  PT1M: 60 * SECOND,
  PT1H: 3_600 * SECOND,
  P1D: DAY,
  P1W: 7 * DAY,
  P1M: 30 * DAY,
  P3M: 90 * DAY,
  P6M: 180 * DAY,
  P1Y: YEAR,
  P3Y: 3 * YEAR,
  P5Y: 5 * YEAR,
  P50Y: 50 * YEAR,
};

export function isPeriod(value: string): value is Period {
  return PeriodSchema.safeParse(value).success;
}

// ── Helpers ─────────────────────────────────────────────────

/** Parse with a schema, converting failures into DecodeError */
export function decodeWith<T>(operation: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new DecodeError(operation, detail, result.error.issues);
  }
  return result.data;
}

const idString = z.union([z.string(), z.number()]).transform(String);

// ── Login & account ─────────────────────────────────────────

export const LoginResponseSchema = z.object({
  sessionId: z.string().optional(),
  status: z.number().optional(),
  statusText: z.string().optional(),
});

const AccountConfigSchema = z.object({
  data: z.object({
    clientId: z.number(),
    paUrl: z.string(),
    productSearchUrl: z.string(),
    tradingUrl: z.string(),
    reportingUrl: z.string(),
    refinitivFinancialStatementsUrl: z.string(),
    refinitivCompanyRatiosUrl: z.string(),
  }),
});

export function decodeAccountConfig(body: unknown): { userToken: number; endpoints: EndpointMap } {
  const { data } = decodeWith("resolveEndpoints", AccountConfigSchema, body);
  return {
    userToken: data.clientId,
    endpoints: {
      portfolioAccount: data.paUrl,
      productSearch: data.productSearchUrl,
      trading: data.tradingUrl,
      reporting: data.reportingUrl,
      financialStatements: data.refinitivFinancialStatementsUrl,
      companyRatios: data.refinitivCompanyRatiosUrl,
    },
  };
}

const AccountDataSchema = z.object({
  data: z.object({
    id: z.number(),
    intAccount: z.number(),
    username: z.string().optional(),
    displayName: z.string().optional(),
    baseCurrency: z.string().optional(),
  }),
});

export function decodeAccountSnapshot(body: unknown): AccountSnapshot {
  return decodeWith("fetchAccountSnapshot", AccountDataSchema, body).data;
}

// ── Instruments ─────────────────────────────────────────────

const ProductSchema = z.object({
  id: idString,
  symbol: z.string(),
  name: z.string(),
  isin: z.string(),
  vwdId: idString,
  productType: z.string().default(""),
  category: z.string().default(""),
  currency: z.string().default(""),
  tradable: z.boolean().default(false),
  active: z.boolean().default(false),
  buyOrderTypes: z.array(z.string()).default([]),
  sellOrderTypes: z.array(z.string()).default([]),
  closePrice: z.number().default(0),
  closePriceDate: z.string().default(""),
});

const ProductsInfoSchema = z.object({
  data: z.record(ProductSchema),
});

export function decodeInstruments(body: unknown): Instrument[] {
  const { data } = decodeWith("fetchInstruments", ProductsInfoSchema, body);
  return Object.values(data).map((p) => ({
    id: p.id,
    symbol: p.symbol,
    name: p.name,
    isin: p.isin,
    vwdId: p.vwdId,
    category: p.category || p.productType,
    currency: p.currency,
    tradable: p.tradable,
    active: p.active,
    buyOrderTypes: p.buyOrderTypes,
    sellOrderTypes: p.sellOrderTypes,
    closePrice: p.closePrice,
    closePriceDate: p.closePriceDate,
  }));
}

// ── Price series ────────────────────────────────────────────

const ChartSchema = z.object({
  start: z.string(),
  series: z
    .array(
      z.object({
        data: z.array(z.tuple([z.number(), z.number(), z.number(), z.number(), z.number()])),
      })
    )
    .min(1),
});

/** Timestamps without a zone designator are UTC */
export function parseStart(start: string): number {
  const zoned = /(Z|[+-]\d{2}:?\d{2})$/.test(start) || !start.includes("T") ? start : `${start}Z`;
  const ms = Date.parse(zoned);
  if (Number.isNaN(ms)) {
    throw new DecodeError("fetchPriceSeries", `unparseable start '${start}'`);
  }
  return ms;
}

export function decodePriceSeries(
  body: unknown,
  meta: { id: string; symbol: string; period: Period; resolution: Period }
): PriceSeries {
  const chart = decodeWith("fetchPriceSeries", ChartSchema, body);
  const start = parseStart(chart.start);
  const step = PERIOD_MS[meta.resolution];
  const candles: Candle[] = chart.series[0].data.map(([n, open, high, low, close]) => ({
    time: start + n * step,
    open,
    high,
    low,
    close,
  }));
  return { ...meta, symbol: meta.symbol.toUpperCase(), candles };
}

// ── Name/value rows (positions, orders) ─────────────────────

const RowsSchema = z.array(
  z.object({
    value: z.array(z.object({ name: z.string(), value: JsonValueSchema.optional() })),
  })
);

type FieldKind = "string" | "number" | "boolean";

interface FieldSpec<K extends string> {
  key: K;
  kind: FieldKind;
  required: boolean;
}

type Scalar = string | number | boolean;

/**
 * Decode `{ value: [{ name, value }] }` rows into flat records.
 * Unknown names are ignored; a missing required field fails the whole decode.
 */
export function decodeRows<K extends string>(
  operation: string,
  body: unknown,
  fields: Readonly<Record<string, FieldSpec<K>>>
): Array<Partial<Record<K, Scalar>>> {
  const rows = decodeWith(operation, RowsSchema, body);
  return rows.map((row, index) => {
    const record: Partial<Record<K, Scalar>> = {};
    for (const cell of row.value) {
      const spec = fields[cell.name];
      if (!spec || cell.value === undefined || cell.value === null) continue;
      record[spec.key] = coerce(operation, cell.name, spec.kind, cell.value);
    }
    for (const [name, spec] of Object.entries(fields)) {
      if (spec.required && record[spec.key] === undefined) {
        throw new DecodeError(operation, `row ${index}: required field '${name}' absent`);
      }
    }
    return record;
  });
}

function coerce(operation: string, name: string, kind: FieldKind, value: JsonValue): Scalar {
  switch (kind) {
    case "string":
      if (typeof value === "string") return value;
      if (typeof value === "number") return String(value);
      break;
    case "number":
      if (typeof value === "number") return value;
      if (typeof value === "string" && value.trim() !== "" && !Number.isNaN(Number(value))) return Number(value);
      break;
    case "boolean":
      if (typeof value === "boolean") return value;
      break;
  }
  throw new DecodeError(operation, `field '${name}' is not a ${kind}`);
}

function str(v: Scalar | undefined): string {
  return v === undefined ? "" : String(v);
}

function num(v: Scalar | undefined): number {
  return typeof v === "number" ? v : 0;
}

function optNum(v: Scalar | undefined): number | undefined {
  return typeof v === "number" ? v : undefined;
}

function optStr(v: Scalar | undefined): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function optBool(v: Scalar | undefined): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

function side(operation: string, v: Scalar | undefined): Side {
  if (v === "B" || v === "BUY") return "BUY";
  if (v === "S" || v === "SELL") return "SELL";
  throw new DecodeError(operation, `unknown side '${String(v)}'`);
}

type PositionKey = keyof Position;

const POSITION_FIELDS: Readonly<Record<string, FieldSpec<PositionKey>>> = {
  id: { key: "id", kind: "string", required: true },
  positionType: { key: "positionType", kind: "string", required: true },
  size: { key: "size", kind: "number", required: true },
  price: { key: "price", kind: "number", required: true },
  value: { key: "value", kind: "number", required: true },
  breakEvenPrice: { key: "breakEvenPrice", kind: "number", required: true },
  accruedInterest: { key: "accruedInterest", kind: "number", required: false },
  portfolioValueCorrection: { key: "portfolioValueCorrection", kind: "number", required: false },
  averageFxRate: { key: "averageFxRate", kind: "number", required: false },
  realizedProductPl: { key: "realizedProductPl", kind: "number", required: false },
  realizedFxPl: { key: "realizedFxPl", kind: "number", required: false },
  todayRealizedProductPl: { key: "todayRealizedProductPl", kind: "number", required: false },
  todayRealizedFxPl: { key: "todayRealizedFxPl", kind: "number", required: false },
};

const PortfolioSchema = z.object({
  portfolio: z.object({ value: z.array(z.unknown()) }),
});

export function decodePositions(body: unknown): Position[] {
  const { portfolio } = decodeWith("fetchPositions", PortfolioSchema, body);
  return decodeRows("fetchPositions", portfolio.value, POSITION_FIELDS).map((r) => ({
    id: str(r.id),
    positionType: str(r.positionType),
    size: num(r.size),
    price: num(r.price),
    value: num(r.value),
    breakEvenPrice: num(r.breakEvenPrice),
    accruedInterest: optNum(r.accruedInterest),
    portfolioValueCorrection: optNum(r.portfolioValueCorrection),
    averageFxRate: optNum(r.averageFxRate),
    realizedProductPl: optNum(r.realizedProductPl),
    realizedFxPl: optNum(r.realizedFxPl),
    todayRealizedProductPl: optNum(r.todayRealizedProductPl),
    todayRealizedFxPl: optNum(r.todayRealizedFxPl),
  }));
}

type OrderKey = keyof Order;

const ORDER_FIELDS: Readonly<Record<string, FieldSpec<OrderKey>>> = {
  id: { key: "id", kind: "string", required: true },
  date: { key: "date", kind: "string", required: true },
  productId: { key: "productId", kind: "string", required: true },
  product: { key: "symbol", kind: "string", required: true },
  currency: { key: "currency", kind: "string", required: true },
  buysell: { key: "side", kind: "string", required: true },
  size: { key: "size", kind: "number", required: true },
  quantity: { key: "quantity", kind: "number", required: true },
  price: { key: "price", kind: "number", required: true },
  stopPrice: { key: "stopPrice", kind: "number", required: false },
  totalOrderValue: { key: "totalOrderValue", kind: "number", required: false },
  orderType: { key: "orderType", kind: "string", required: false },
  orderTimeType: { key: "orderTimeType", kind: "string", required: false },
  isModifiable: { key: "isModifiable", kind: "boolean", required: false },
  isDeletable: { key: "isDeletable", kind: "boolean", required: false },
};

const OrdersSchema = z.object({
  orders: z.object({ value: z.array(z.unknown()) }),
});

export function decodeOrders(body: unknown): Order[] {
  const { orders } = decodeWith("fetchOrders", OrdersSchema, body);
  return decodeRows("fetchOrders", orders.value, ORDER_FIELDS).map((r) => ({
    id: str(r.id),
    date: str(r.date),
    productId: str(r.productId),
    symbol: str(r.symbol),
    currency: str(r.currency),
    side: side("fetchOrders", r.side),
    size: num(r.size),
    quantity: num(r.quantity),
    price: num(r.price),
    stopPrice: optNum(r.stopPrice),
    totalOrderValue: optNum(r.totalOrderValue),
    orderType: optStr(r.orderType),
    orderTimeType: optStr(r.orderTimeType),
    isModifiable: optBool(r.isModifiable),
    isDeletable: optBool(r.isDeletable),
  }));
}

// ── Transactions ────────────────────────────────────────────

const TransactionSchema = z.object({
  id: z.number(),
  productId: z.number(),
  date: z.string(),
  buysell: z.enum(["B", "S"]),
  quantity: z.number(),
  price: z.number(),
  total: z.number(),
  totalInBaseCurrency: z.number(),
  totalFeesInBaseCurrency: z.number().default(0),
  fxRate: z.number().default(1),
  transactionTypeId: z.number(),
  counterParty: z.string().optional(),
  tradingVenue: z.string().optional(),
});

const TransactionsSchema = z.object({ data: z.array(TransactionSchema) });

export function decodeTransactions(body: unknown): Transaction[] {
  const { data } = decodeWith("fetchTransactions", TransactionsSchema, body);
  return data.map(({ buysell, ...rest }): Transaction => ({
    ...rest,
    side: buysell === "B" ? "BUY" : "SELL",
  }));
}

// ── Reports ─────────────────────────────────────────────────

const ReportSchema = z.object({ data: JsonValueSchema });

export function decodeReport(operation: string, body: unknown): JsonValue {
  return decodeWith(operation, ReportSchema, body).data;
}
