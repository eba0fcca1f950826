/**
 * Brokerage Payload Decoder Tests
 */

import { describe, it, expect } from "vitest";
import {
  decodeAccountConfig,
  decodeInstruments,
  decodeOrders,
  decodePositions,
  decodePriceSeries,
  decodeTransactions,
  isPeriod,
  parseStart,
  PERIOD_MS,
} from "../../../src/api/broker/decoders.js";
import { toUpstreamDate } from "../../../src/api/broker/client.js";
import { DecodeError } from "../../../src/utils/errors.js";

function row(cells: Record<string, unknown>): { value: Array<{ name: string; value: unknown }> } {
  return { value: Object.entries(cells).map(([name, value]) => ({ name, value })) };
}

describe("periods", () => {
  it("should treat a month as 30 days", () => {
    expect(PERIOD_MS.P1M).toBe(30 * 86_400_000);
    expect(PERIOD_MS.P1Y).toBe(365 * 86_400_000);
  });

  it("should recognise only known period codes", () => {
    expect(isPeriod("P50Y")).toBe(true);
    expect(isPeriod("P2M")).toBe(false);
  });
});

describe("decodePriceSeries", () => {
  const body = {
    start: "2020-01-01T00:00:00",
    series: [
      {
        data: [
          [0, 10, 11, 9, 10.5],
          [1, 10.5, 12, 10, 11],
          [2, 11, 11.5, 10.2, 10.8],
        ],
      },
    ],
  };

  it("should place candle n at start + n resolution steps", () => {
    const series = decodePriceSeries(body, { id: "332111", symbol: "acme", period: "P50Y", resolution: "P1M" });
    expect(series.candles.map((c) => new Date(c.time).toISOString().slice(0, 10))).toEqual([
      "2020-01-01",
      "2020-01-31",
      "2020-03-01",
    ]);
    expect(series.candles[1]).toEqual({ time: Date.UTC(2020, 0, 31), open: 10.5, high: 12, low: 10, close: 11 });
  });

  it("should uppercase the symbol", () => {
    const series = decodePriceSeries(body, { id: "332111", symbol: "acme", period: "P50Y", resolution: "P1M" });
    expect(series.symbol).toBe("ACME");
  });

  it("should reject a chart without series", () => {
    expect(() =>
      decodePriceSeries({ start: "2020-01-01", series: [] }, { id: "1", symbol: "x", period: "P1Y", resolution: "P1D" })
    ).toThrow(DecodeError);
  });
});

describe("parseStart", () => {
  it("should read timestamps without a zone as UTC", () => {
    expect(parseStart("2020-01-01T00:00:00")).toBe(Date.UTC(2020, 0, 1));
    expect(parseStart("2020-01-01")).toBe(Date.UTC(2020, 0, 1));
    expect(parseStart("2020-01-01T01:00:00+01:00")).toBe(Date.UTC(2020, 0, 1));
  });

  it("should reject garbage", () => {
    expect(() => parseStart("yesterday")).toThrow(DecodeError);
  });
});

describe("decodeAccountConfig", () => {
  it("should map upstream URL fields onto the endpoint map", () => {
    const { userToken, endpoints } = decodeAccountConfig({
      data: {
        clientId: 42,
        paUrl: "https://broker.test/pa/",
        productSearchUrl: "https://broker.test/search/",
        tradingUrl: "https://broker.test/trading/",
        reportingUrl: "https://broker.test/reporting/",
        refinitivFinancialStatementsUrl: "https://broker.test/fs/",
        refinitivCompanyRatiosUrl: "https://broker.test/ratios/",
        unrelated: true,
      },
    });
    expect(userToken).toBe(42);
    expect(endpoints).toEqual({
      portfolioAccount: "https://broker.test/pa/",
      productSearch: "https://broker.test/search/",
      trading: "https://broker.test/trading/",
      reporting: "https://broker.test/reporting/",
      financialStatements: "https://broker.test/fs/",
      companyRatios: "https://broker.test/ratios/",
    });
  });

  it("should fail when an endpoint is missing", () => {
    expect(() => decodeAccountConfig({ data: { clientId: 42 } })).toThrow(DecodeError);
  });
});

describe("decodeInstruments", () => {
  it("should read the id-keyed record and stringify numeric ids", () => {
    const [instrument] = decodeInstruments({
      data: {
        "332111": { id: 332111, symbol: "ACME", name: "Acme Holdings NV", isin: "NL0000000001", vwdId: 350015372, productType: "STOCK" },
      },
    });
    expect(instrument.id).toBe("332111");
    expect(instrument.vwdId).toBe("350015372");
    expect(instrument.category).toBe("STOCK");
    expect(instrument.buyOrderTypes).toEqual([]);
  });
});

describe("decodePositions", () => {
  it("should flatten name/value rows and ignore unknown fields", () => {
    const positions = decodePositions({
      portfolio: {
        value: [row({ id: "332111", positionType: "PRODUCT", size: 10, price: "101.5", value: 1015, breakEvenPrice: 95, plBase: { EUR: 1 } })],
      },
    });
    expect(positions).toEqual([
      {
        id: "332111",
        positionType: "PRODUCT",
        size: 10,
        price: 101.5,
        value: 1015,
        breakEvenPrice: 95,
        accruedInterest: undefined,
        portfolioValueCorrection: undefined,
        averageFxRate: undefined,
        realizedProductPl: undefined,
        realizedFxPl: undefined,
        todayRealizedProductPl: undefined,
        todayRealizedFxPl: undefined,
      },
    ]);
  });

  it("should fail when a required field is absent", () => {
    expect(() =>
      decodePositions({ portfolio: { value: [row({ id: "1", positionType: "CASH", size: 1, price: 1, value: 1 })] } })
    ).toThrow("required field 'breakEvenPrice' absent");
  });
});

describe("decodeOrders", () => {
  it("should map the product name to the symbol and buysell to a side", () => {
    const [order] = decodeOrders({
      orders: {
        value: [
          row({ id: "o-1", date: "10:15", productId: 332111, product: "ACME", currency: "EUR", buysell: "S", size: 5, quantity: 5, price: 90 }),
        ],
      },
    });
    expect(order.symbol).toBe("ACME");
    expect(order.productId).toBe("332111");
    expect(order.side).toBe("SELL");
  });
});

describe("decodeTransactions", () => {
  it("should translate B/S into BUY/SELL and default fees", () => {
    const [tx] = decodeTransactions({
      data: [
        {
          id: 1,
          productId: 332111,
          date: "2021-03-04T10:15:00+01:00",
          buysell: "B",
          quantity: 10,
          price: 101.5,
          total: -1015,
          totalInBaseCurrency: -1015,
          transactionTypeId: 0,
        },
      ],
    });
    expect(tx.side).toBe("BUY");
    expect(tx.totalFeesInBaseCurrency).toBe(0);
    expect(tx.fxRate).toBe(1);
  });
});

describe("toUpstreamDate", () => {
  it("should reorder ISO dates to day/month/year", () => {
    expect(toUpstreamDate("2021-03-04")).toBe("04/03/2021");
  });

  it("should reject anything else", () => {
    expect(() => toUpstreamDate("04/03/2021")).toThrow(DecodeError);
  });
});
