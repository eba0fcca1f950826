/**
 * RPC envelopes and their binary encoding.
 *
 * A payload starts with a u8 variant tag followed by the variant's fields in
 * declaration order. A response frame wraps the Response in an option, so an
 * absent reply is a single zero byte.
 */

import { BinaryReader, BinaryWriter } from "./codec.js";
import { FrameError } from "../utils/errors.js";
import { PeriodSchema } from "../utils/validation.js";
import type {
  Candle,
  Instrument,
  InstrumentQuery,
  Order,
  Period,
  Position,
  PriceSeries,
  Report,
  Side,
  Transaction,
} from "../types/broker.js";
import type { PortfolioRow, RiskMode, StopLossRow } from "../quant/allocation.js";

// ── Requests ────────────────────────────────────────────────

export type Request =
  | { type: "Authorize" }
  | { type: "FetchData"; id?: string }
  | { type: "GetInstrument"; query: InstrumentQuery }
  | { type: "GetFinancials"; query: InstrumentQuery }
  | { type: "GetPriceSeries"; query: InstrumentQuery }
  | { type: "GetSingleAllocation"; query: InstrumentQuery; mode: RiskMode; risk: number; riskFree: number }
  | {
      type: "CalculatePortfolio";
      mode: RiskMode;
      risk: number;
      riskFree: number;
      freq: number;
      money: number;
      maxStocks: number;
      minRsi?: number;
      maxRsi?: number;
      shortSalesConstraint: boolean;
    }
  | { type: "RecalculateStopLoss"; n: number; maxPercent?: number }
  | { type: "GetPositions" }
  | { type: "GetTransactions"; from: string; to: string }
  | { type: "GetOrders" }
  | { type: "CleanUp" }
  | { type: "AddAsset"; id: string; name?: string }
  | { type: "GetRatios"; query: InstrumentQuery };

export type RequestType = Request["type"];

export const REQUEST_TAGS: Readonly<Record<RequestType, number>> = {
  Authorize: 0,
  FetchData: 1,
  GetInstrument: 2,
  GetFinancials: 3,
  GetPriceSeries: 4,
  GetSingleAllocation: 5,
  CalculatePortfolio: 6,
  RecalculateStopLoss: 7,
  GetPositions: 8,
  GetTransactions: 9,
  GetOrders: 10,
  CleanUp: 11,
  AddAsset: 12,
  GetRatios: 13,
};

// ── Responses ───────────────────────────────────────────────

export type Response =
  | { type: "Ack" }
  | { type: "Failure"; message: string }
  | { type: "Instrument"; instrument: Instrument | null }
  | { type: "Financials"; report: Report | null }
  | { type: "Ratios"; report: Report | null }
  | { type: "PriceSeries"; series: PriceSeries | null }
  | { type: "SingleAllocation"; allocation: number | null }
  | { type: "Portfolio"; rows: PortfolioRow[] | null }
  | { type: "StopLoss"; rows: StopLossRow[] | null }
  | { type: "Positions"; positions: Position[] | null }
  | { type: "Transactions"; transactions: Transaction[] | null }
  | { type: "Orders"; orders: Order[] | null }
  | { type: "CleanUp"; removed: string[] | null };

export type ResponseType = Response["type"];

export const RESPONSE_TAGS: Readonly<Record<ResponseType, number>> = {
  Ack: 0,
  Failure: 1,
  Instrument: 2,
  Financials: 3,
  Ratios: 4,
  PriceSeries: 5,
  SingleAllocation: 6,
  Portfolio: 7,
  StopLoss: 8,
  Positions: 9,
  Transactions: 10,
  Orders: 11,
  CleanUp: 12,
};

// ── Field codecs ────────────────────────────────────────────

const QUERY_KINDS = ["id", "symbol", "name"] as const;

function writeQuery(w: BinaryWriter, query: InstrumentQuery): void {
  w.u8(QUERY_KINDS.indexOf(query.by)).str(query.value);
}

function readQuery(r: BinaryReader): InstrumentQuery {
  const kind = r.u8();
  const value = r.str();
  switch (kind) {
    case 0:
      return { by: "id", value };
    case 1:
      return { by: "symbol", value };
    case 2:
      return { by: "name", value };
    default:
      throw new FrameError(`unknown query kind ${kind}`);
  }
}

function writeMode(w: BinaryWriter, mode: RiskMode): void {
  w.u8(mode === "std" ? 0 : 1);
}

function readMode(r: BinaryReader): RiskMode {
  const tag = r.u8();
  if (tag === 0) return "std";
  if (tag === 1) return "lsv";
  throw new FrameError(`unknown risk mode ${tag}`);
}

function writeSide(w: BinaryWriter, side: Side): void {
  w.u8(side === "BUY" ? 0 : 1);
}

function readSide(r: BinaryReader): Side {
  const tag = r.u8();
  if (tag === 0) return "BUY";
  if (tag === 1) return "SELL";
  throw new FrameError(`unknown side ${tag}`);
}

function readPeriod(r: BinaryReader): Period {
  const raw = r.str();
  const parsed = PeriodSchema.safeParse(raw);
  if (!parsed.success) throw new FrameError(`unknown period '${raw}'`);
  return parsed.data;
}

function writeInstrument(w: BinaryWriter, i: Instrument): void {
  w.str(i.id).str(i.symbol).str(i.name).str(i.isin).str(i.vwdId).str(i.category).str(i.currency);
  w.bool(i.tradable).bool(i.active);
  w.array(i.buyOrderTypes, (w, v) => w.str(v)).array(i.sellOrderTypes, (w, v) => w.str(v));
  w.f64(i.closePrice).str(i.closePriceDate);
}

function readInstrument(r: BinaryReader): Instrument {
  return {
    id: r.str(),
    symbol: r.str(),
    name: r.str(),
    isin: r.str(),
    vwdId: r.str(),
    category: r.str(),
    currency: r.str(),
    tradable: r.bool(),
    active: r.bool(),
    buyOrderTypes: r.array((r) => r.str()),
    sellOrderTypes: r.array((r) => r.str()),
    closePrice: r.f64(),
    closePriceDate: r.str(),
  };
}

function writeCandle(w: BinaryWriter, c: Candle): void {
  w.f64(c.time).f64(c.open).f64(c.high).f64(c.low).f64(c.close);
}

function readCandle(r: BinaryReader): Candle {
  return { time: r.f64(), open: r.f64(), high: r.f64(), low: r.f64(), close: r.f64() };
}

function writeSeries(w: BinaryWriter, s: PriceSeries): void {
  w.str(s.id).str(s.symbol).str(s.period).str(s.resolution).array(s.candles, writeCandle);
}

function readSeries(r: BinaryReader): PriceSeries {
  return {
    id: r.str(),
    symbol: r.str(),
    period: readPeriod(r),
    resolution: readPeriod(r),
    candles: r.array(readCandle),
  };
}

function writeReport(w: BinaryWriter, report: Report): void {
  w.str(report.id).str(report.isin).f64(report.fetchedAt).json(report.data);
}

function readReport(r: BinaryReader): Report {
  return { id: r.str(), isin: r.str(), fetchedAt: r.f64(), data: r.json() };
}

const optF64 = (w: BinaryWriter, v: number | undefined): void => {
  w.option(v, (w, x) => w.f64(x));
};
const optStr = (w: BinaryWriter, v: string | undefined): void => {
  w.option(v, (w, x) => w.str(x));
};
const optBool = (w: BinaryWriter, v: boolean | undefined): void => {
  w.option(v, (w, x) => w.bool(x));
};

function writePosition(w: BinaryWriter, p: Position): void {
  w.str(p.id).str(p.positionType).f64(p.size).f64(p.price).f64(p.value).f64(p.breakEvenPrice);
  optF64(w, p.accruedInterest);
  optF64(w, p.portfolioValueCorrection);
  optF64(w, p.averageFxRate);
  optF64(w, p.realizedProductPl);
  optF64(w, p.realizedFxPl);
  optF64(w, p.todayRealizedProductPl);
  optF64(w, p.todayRealizedFxPl);
}

function readPosition(r: BinaryReader): Position {
  const f64 = (r: BinaryReader): number => r.f64();
  return {
    id: r.str(),
    positionType: r.str(),
    size: r.f64(),
    price: r.f64(),
    value: r.f64(),
    breakEvenPrice: r.f64(),
    accruedInterest: r.option(f64),
    portfolioValueCorrection: r.option(f64),
    averageFxRate: r.option(f64),
    realizedProductPl: r.option(f64),
    realizedFxPl: r.option(f64),
    todayRealizedProductPl: r.option(f64),
    todayRealizedFxPl: r.option(f64),
  };
}

function writeOrder(w: BinaryWriter, o: Order): void {
  w.str(o.id).str(o.date).str(o.productId).str(o.symbol).str(o.currency);
  writeSide(w, o.side);
  w.f64(o.size).f64(o.quantity).f64(o.price);
  optF64(w, o.stopPrice);
  optF64(w, o.totalOrderValue);
  optStr(w, o.orderType);
  optStr(w, o.orderTimeType);
  optBool(w, o.isModifiable);
  optBool(w, o.isDeletable);
}

function readOrder(r: BinaryReader): Order {
  return {
    id: r.str(),
    date: r.str(),
    productId: r.str(),
    symbol: r.str(),
    currency: r.str(),
    side: readSide(r),
    size: r.f64(),
    quantity: r.f64(),
    price: r.f64(),
    stopPrice: r.option((r) => r.f64()),
    totalOrderValue: r.option((r) => r.f64()),
    orderType: r.option((r) => r.str()),
    orderTimeType: r.option((r) => r.str()),
    isModifiable: r.option((r) => r.bool()),
    isDeletable: r.option((r) => r.bool()),
  };
}

function writeTransaction(w: BinaryWriter, t: Transaction): void {
  w.f64(t.id).f64(t.productId).str(t.date);
  writeSide(w, t.side);
  w.f64(t.quantity).f64(t.price).f64(t.total).f64(t.totalInBaseCurrency);
  w.f64(t.totalFeesInBaseCurrency).f64(t.fxRate).f64(t.transactionTypeId);
  optStr(w, t.counterParty);
  optStr(w, t.tradingVenue);
}

function readTransaction(r: BinaryReader): Transaction {
  return {
    id: r.f64(),
    productId: r.f64(),
    date: r.str(),
    side: readSide(r),
    quantity: r.f64(),
    price: r.f64(),
    total: r.f64(),
    totalInBaseCurrency: r.f64(),
    totalFeesInBaseCurrency: r.f64(),
    fxRate: r.f64(),
    transactionTypeId: r.f64(),
    counterParty: r.option((r) => r.str()),
    tradingVenue: r.option((r) => r.str()),
  };
}

function writePortfolioRow(w: BinaryWriter, row: PortfolioRow): void {
  w.str(row.id).str(row.symbol).str(row.name).f64(row.weight).f64(row.price).f64(row.amount).f64(row.shares);
}

function readPortfolioRow(r: BinaryReader): PortfolioRow {
  return {
    id: r.str(),
    symbol: r.str(),
    name: r.str(),
    weight: r.f64(),
    price: r.f64(),
    amount: r.f64(),
    shares: r.f64(),
  };
}

function writeStopLossRow(w: BinaryWriter, row: StopLossRow): void {
  w.str(row.id).str(row.symbol).f64(row.lastClose).f64(row.averageDrawdown).f64(row.stopLoss);
}

function readStopLossRow(r: BinaryReader): StopLossRow {
  return {
    id: r.str(),
    symbol: r.str(),
    lastClose: r.f64(),
    averageDrawdown: r.f64(),
    stopLoss: r.f64(),
  };
}

// ── Request codec ───────────────────────────────────────────

export function encodeRequest(req: Request): Buffer {
  const w = new BinaryWriter().u8(REQUEST_TAGS[req.type]);
  switch (req.type) {
    case "Authorize":
    case "GetPositions":
    case "GetOrders":
    case "CleanUp":
      break;
    case "FetchData":
      optStr(w, req.id);
      break;
    case "GetInstrument":
    case "GetFinancials":
    case "GetPriceSeries":
    case "GetRatios":
      writeQuery(w, req.query);
      break;
    case "GetSingleAllocation":
      writeQuery(w, req.query);
      writeMode(w, req.mode);
      w.f64(req.risk).f64(req.riskFree);
      break;
    case "CalculatePortfolio":
      writeMode(w, req.mode);
      w.f64(req.risk).f64(req.riskFree).u32(req.freq).f64(req.money).u32(req.maxStocks);
      optF64(w, req.minRsi);
      optF64(w, req.maxRsi);
      w.bool(req.shortSalesConstraint);
      break;
    case "RecalculateStopLoss":
      w.f64(req.n);
      optF64(w, req.maxPercent);
      break;
    case "GetTransactions":
      w.str(req.from).str(req.to);
      break;
    case "AddAsset":
      w.str(req.id);
      optStr(w, req.name);
      break;
  }
  return w.toBuffer();
}

export function decodeRequest(payload: Buffer): Request {
  const r = new BinaryReader(payload);
  const tag = r.u8();
  const req = readRequestBody(tag, r);
  r.end();
  return req;
}

function readRequestBody(tag: number, r: BinaryReader): Request {
  const f64 = (r: BinaryReader): number => r.f64();
  switch (tag) {
    case REQUEST_TAGS.Authorize:
      return { type: "Authorize" };
    case REQUEST_TAGS.FetchData: {
      const id = r.option((r) => r.str());
      return id === undefined ? { type: "FetchData" } : { type: "FetchData", id };
    }
    case REQUEST_TAGS.GetInstrument:
      return { type: "GetInstrument", query: readQuery(r) };
    case REQUEST_TAGS.GetFinancials:
      return { type: "GetFinancials", query: readQuery(r) };
    case REQUEST_TAGS.GetPriceSeries:
      return { type: "GetPriceSeries", query: readQuery(r) };
    case REQUEST_TAGS.GetRatios:
      return { type: "GetRatios", query: readQuery(r) };
    case REQUEST_TAGS.GetSingleAllocation:
      return { type: "GetSingleAllocation", query: readQuery(r), mode: readMode(r), risk: r.f64(), riskFree: r.f64() };
    case REQUEST_TAGS.CalculatePortfolio: {
      const mode = readMode(r);
      const risk = r.f64();
      const riskFree = r.f64();
      const freq = r.u32();
      const money = r.f64();
      const maxStocks = r.u32();
      const minRsi = r.option(f64);
      const maxRsi = r.option(f64);
      const shortSalesConstraint = r.bool();
      return {
        type: "CalculatePortfolio",
        mode, risk, riskFree, freq, money, maxStocks,
        ...(minRsi === undefined ? {} : { minRsi }),
        ...(maxRsi === undefined ? {} : { maxRsi }),
        shortSalesConstraint,
      };
    }
    case REQUEST_TAGS.RecalculateStopLoss: {
      const n = r.f64();
      const maxPercent = r.option(f64);
      return maxPercent === undefined ? { type: "RecalculateStopLoss", n } : { type: "RecalculateStopLoss", n, maxPercent };
    }
    case REQUEST_TAGS.GetPositions:
      return { type: "GetPositions" };
    case REQUEST_TAGS.GetTransactions:
      return { type: "GetTransactions", from: r.str(), to: r.str() };
    case REQUEST_TAGS.GetOrders:
      return { type: "GetOrders" };
    case REQUEST_TAGS.CleanUp:
      return { type: "CleanUp" };
    case REQUEST_TAGS.AddAsset: {
      const id = r.str();
      const name = r.option((r) => r.str());
      return name === undefined ? { type: "AddAsset", id } : { type: "AddAsset", id, name };
    }
    default:
      throw new FrameError(`unknown request tag ${tag}`);
  }
}

// ── Response codec ──────────────────────────────────────────

/** Frame payload for a reply; null encodes as the absent option */
export function encodeResponse(res: Response | null): Buffer {
  const w = new BinaryWriter();
  w.option(res, writeResponseBody);
  return w.toBuffer();
}

function writeResponseBody(w: BinaryWriter, res: Response): void {
  w.u8(RESPONSE_TAGS[res.type]);
  switch (res.type) {
    case "Ack":
      break;
    case "Failure":
      w.str(res.message);
      break;
    case "Instrument":
      w.option(res.instrument, writeInstrument);
      break;
    case "Financials":
    case "Ratios":
      w.option(res.report, writeReport);
      break;
    case "PriceSeries":
      w.option(res.series, writeSeries);
      break;
    case "SingleAllocation":
      w.option(res.allocation, (w, v) => w.f64(v));
      break;
    case "Portfolio":
      w.option(res.rows, (w, rows) => w.array(rows, writePortfolioRow));
      break;
    case "StopLoss":
      w.option(res.rows, (w, rows) => w.array(rows, writeStopLossRow));
      break;
    case "Positions":
      w.option(res.positions, (w, xs) => w.array(xs, writePosition));
      break;
    case "Transactions":
      w.option(res.transactions, (w, xs) => w.array(xs, writeTransaction));
      break;
    case "Orders":
      w.option(res.orders, (w, xs) => w.array(xs, writeOrder));
      break;
    case "CleanUp":
      w.option(res.removed, (w, xs) => w.array(xs, (w, id) => w.str(id)));
      break;
  }
}

export function decodeResponse(payload: Buffer): Response | null {
  const r = new BinaryReader(payload);
  const res = r.nullable(readResponseBody);
  r.end();
  return res;
}

function readResponseBody(r: BinaryReader): Response {
  const tag = r.u8();
  switch (tag) {
    case RESPONSE_TAGS.Ack:
      return { type: "Ack" };
    case RESPONSE_TAGS.Failure:
      return { type: "Failure", message: r.str() };
    case RESPONSE_TAGS.Instrument:
      return { type: "Instrument", instrument: r.nullable(readInstrument) };
    case RESPONSE_TAGS.Financials:
      return { type: "Financials", report: r.nullable(readReport) };
    case RESPONSE_TAGS.Ratios:
      return { type: "Ratios", report: r.nullable(readReport) };
    case RESPONSE_TAGS.PriceSeries:
      return { type: "PriceSeries", series: r.nullable(readSeries) };
    case RESPONSE_TAGS.SingleAllocation:
      return { type: "SingleAllocation", allocation: r.nullable((r) => r.f64()) };
    case RESPONSE_TAGS.Portfolio:
      return { type: "Portfolio", rows: r.nullable((r) => r.array(readPortfolioRow)) };
    case RESPONSE_TAGS.StopLoss:
      return { type: "StopLoss", rows: r.nullable((r) => r.array(readStopLossRow)) };
    case RESPONSE_TAGS.Positions:
      return { type: "Positions", positions: r.nullable((r) => r.array(readPosition)) };
    case RESPONSE_TAGS.Transactions:
      return { type: "Transactions", transactions: r.nullable((r) => r.array(readTransaction)) };
    case RESPONSE_TAGS.Orders:
      return { type: "Orders", orders: r.nullable((r) => r.array(readOrder)) };
    case RESPONSE_TAGS.CleanUp:
      return { type: "CleanUp", removed: r.nullable((r) => r.array((r) => r.str())) };
    default:
      throw new FrameError(`unknown response tag ${tag}`);
  }
}
