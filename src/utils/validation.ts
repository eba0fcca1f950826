/**
 * Input validation utilities.
 * Schemas for entities that cross a trust boundary: the entity store, the
 * settings file and CLI arguments.
 */

import { z } from "zod";
import type { Instrument, JsonValue, PriceSeries, Report } from "../types/broker.js";

export const PeriodSchema = z.enum([
  "PT1S", "PT1M", "PT1H", "P1D", "P1W", "P1M",
  "P3M", "P6M", "P1Y", "P3Y", "P5Y", "P50Y",
]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const InstrumentSchema: z.ZodType<Instrument> = z.object({
  id: z.string(),
  symbol: z.string(),
  name: z.string(),
  isin: z.string(),
  vwdId: z.string(),
  category: z.string(),
  currency: z.string(),
  tradable: z.boolean(),
  active: z.boolean(),
  buyOrderTypes: z.array(z.string()),
  sellOrderTypes: z.array(z.string()),
  closePrice: z.number(),
  closePriceDate: z.string(),
});

export const CandleSchema = z.object({
  time: z.number(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
});

export const PriceSeriesSchema: z.ZodType<PriceSeries> = z.object({
  id: z.string(),
  symbol: z.string(),
  period: PeriodSchema,
  resolution: PeriodSchema,
  candles: z.array(CandleSchema),
});

export const ReportSchema: z.ZodType<Report> = z.object({
  id: z.string(),
  isin: z.string(),
  fetchedAt: z.number(),
  data: JsonValueSchema,
});

/** Calendar date as accepted on the command line */
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD");

/** Fraction strictly inside (0, 1), used for risk targets */
export const RiskSchema = z.number().gt(0).lt(1);

/** Generate a unique correlation ID for message tracking */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
