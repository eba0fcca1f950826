/**
 * Mock Brokerage
 *
 * An Express app that imitates the brokerage web API closely enough for the
 * gateway to log in, resolve its endpoints and fetch every entity it knows.
 * State is held in a MockBrokerage object so tests can expire sessions,
 * inject 401s and count logins.
 */

import express, { type Request } from "express";

export interface MockProduct {
  id: string;
  symbol: string;
  name: string;
  isin: string;
  vwdId: string;
  closes: number[];
}

export interface MockBrokerageOptions {
  username?: string;
  password?: string;
  products?: MockProduct[];
  /** Accept logins but leave sessionId out of the answer */
  omitSessionId?: boolean;
}

export const MOCK_INT_ACCOUNT = 1234567;
export const MOCK_CLIENT_ID = 7654321;
export const MOCK_CHART_START = "2020-01-01T00:00:00";

/** Twenty-four monthly closes with a gentle upward drift */
function monthlyCloses(base: number, wobble: number): number[] {
  return Array.from({ length: 24 }, (_, i) => Math.round((base * (1 + 0.01 * i) + wobble * ((i % 3) - 1)) * 100) / 100);
}

export const DEFAULT_PRODUCTS: MockProduct[] = [
  {
    id: "332111",
    symbol: "acme",
    name: "Acme Holdings NV",
    isin: "NL0000000001",
    vwdId: "350015372",
    closes: monthlyCloses(100, 2),
  },
  {
    id: "480012",
    symbol: "GLBX",
    name: "Globex Corporation",
    isin: "US0000000002",
    vwdId: "360114899",
    closes: monthlyCloses(40, 1.5),
  },
];

export type MockRoute = "config" | "client" | "products" | "chart" | "update" | "transactions" | "reports";

export class MockBrokerage {
  readonly app = express();
  readonly username: string;
  readonly password: string;
  products: MockProduct[];
  omitSessionId: boolean;

  /** Token accepted by authenticated routes; undefined means every call is 401 */
  activeSession: string | undefined;
  loginCalls = 0;
  readonly hits = new Map<MockRoute, number>();
  private readonly forced = new Map<MockRoute, { status: number; count: number }>();
  private baseUrl = "";

  constructor(options: MockBrokerageOptions = {}) {
    this.username = options.username ?? "test-user";
    this.password = options.password ?? "test-secret";
    this.products = options.products ?? DEFAULT_PRODUCTS;
    this.omitSessionId = options.omitSessionId ?? false;
    this.routes();
  }

  /** Endpoint URLs handed out by the config route are built from this */
  setBaseUrl(baseUrl: string): void {
    this.baseUrl = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
  }

  get chartUrl(): string {
    return `${this.baseUrl}hchart/v1/data.js`;
  }

  /** Drop the current session as if it had timed out upstream */
  expireSession(): void {
    this.activeSession = undefined;
  }

  /** Answer the next `count` hits of a route with 401 regardless of the session */
  rejectNext(route: MockRoute, count = 1): void {
    this.failNext(route, 401, count);
  }

  /** Answer the next `count` hits of a route with `status` regardless of the session */
  failNext(route: MockRoute, status: number, count = 1): void {
    this.forced.set(route, { status, count });
  }

  hitsOf(route: MockRoute): number {
    return this.hits.get(route) ?? 0;
  }

  private routes(): void {
    const app = this.app;
    app.use(express.json());

    // ─── Authentication ───────────────────────────────────────

    app.post("/login/secure/login", (req, res) => {
      this.loginCalls += 1;
      const body: unknown = req.body;
      const ok =
        typeof body === "object" &&
        body !== null &&
        "username" in body &&
        "password" in body &&
        body.username === this.username &&
        body.password === this.password;
      if (!ok) {
        res.status(400).json({ status: 3, statusText: "badCredentials" });
        return;
      }
      if (this.omitSessionId) {
        res.json({ status: 0, statusText: "success" });
        return;
      }
      const sessionId = `session-${this.loginCalls}`;
      this.activeSession = sessionId;
      res.cookie("JSESSIONID", sessionId, { path: "/" });
      res.json({ isPassCodeEnabled: false, sessionId, status: 0, statusText: "success" });
    });

    app.get("/login/secure/config", (req, res) => {
      const denied = this.admit("config", cookieSession(req));
      if (denied) return void res.status(denied).end();
      const base = this.baseUrl;
      res.json({
        data: {
          clientId: MOCK_CLIENT_ID,
          paUrl: `${base}pa/secure/`,
          productSearchUrl: `${base}product_search/secure/`,
          tradingUrl: `${base}trading/secure/`,
          reportingUrl: `${base}reporting/secure/`,
          refinitivFinancialStatementsUrl: `${base}dgtbxdsservice/financial-statements/`,
          refinitivCompanyRatiosUrl: `${base}dgtbxdsservice/company-ratios/`,
        },
      });
    });

    app.get("/pa/secure/client", (req, res) => {
      const denied = this.admit("client", query(req, "sessionId"));
      if (denied) return void res.status(denied).end();
      res.json({
        data: { id: 1, intAccount: MOCK_INT_ACCOUNT, username: this.username, displayName: "Test User", baseCurrency: "EUR" },
      });
    });

    // ─── Products & charts ────────────────────────────────────

    app.post("/product_search/secure/v5/products/info", (req, res) => {
      const denied = this.admit("products", query(req, "sessionId"));
      if (denied) return void res.status(denied).end();
      const ids: unknown = req.body;
      const data: Record<string, unknown> = {};
      for (const id of Array.isArray(ids) ? ids : []) {
        const product = this.products.find((p) => p.id === String(id));
        if (product) data[product.id] = productInfo(product);
      }
      res.json({ data });
    });

    app.get("/hchart/v1/data.js", (req, res) => {
      this.bump("chart");
      if (query(req, "userToken") !== String(MOCK_CLIENT_ID)) return void res.status(401).end();
      const issue = /^ohlc:issueid:(.+)$/.exec(query(req, "series") ?? "");
      const product = this.products.find((p) => p.vwdId === issue?.[1]);
      if (!product) return void res.status(404).end();
      res.json({
        requestid: query(req, "requestid"),
        resolution: query(req, "resolution"),
        start: MOCK_CHART_START,
        series: [
          {
            id: query(req, "series"),
            type: "ohlc",
            data: product.closes.map((close, n) => [n, close, close * 1.02, close * 0.98, close]),
          },
        ],
      });
    });

    // ─── Trading & reporting ──────────────────────────────────

    app.get(/^\/trading\/secure\/v5\/update\/(\d+);jsessionid=([^/]+)$/, (req, res) => {
      const denied = this.admit("update", req.params[1]);
      if (denied) return void res.status(denied).end();
      if (query(req, "portfolio") !== undefined) {
        res.json({ portfolio: { value: this.products.map((p, i) => positionRow(p, i)) } });
        return;
      }
      res.json({ orders: { value: [orderRow(this.products[0])] }, transactions: { value: [] } });
    });

    app.get("/reporting/secure/v4/transactions", (req, res) => {
      const denied = this.admit("transactions", query(req, "sessionId"));
      if (denied) return void res.status(denied).end();
      res.json({
        data: [
          {
            id: 9001,
            productId: Number(this.products[0]?.id ?? 0),
            date: "2021-03-04T10:15:00+01:00",
            buysell: "B",
            quantity: 10,
            price: 101.5,
            total: -1015,
            totalInBaseCurrency: -1015,
            totalFeesInBaseCurrency: -2,
            fxRate: 1,
            transactionTypeId: 0,
            fromDate: query(req, "fromDate"),
          },
        ],
      });
    });

    app.get("/dgtbxdsservice/:report/:isin", (req, res) => {
      const denied = this.admit("reports", query(req, "sessionId"));
      if (denied) return void res.status(denied).end();
      const product = this.products.find((p) => p.isin === req.params.isin);
      if (!product) return void res.status(404).end();
      res.json({ data: { report: req.params.report, currency: "EUR", totalRevenue: 1_000_000 } });
    });
  }

  private bump(route: MockRoute): void {
    this.hits.set(route, this.hitsOf(route) + 1);
  }

  /**
   * Count the hit, then check forced failures and the session token.
   * Returns the status to answer with, or undefined to serve the route.
   */
  private admit(route: MockRoute, token: string | undefined): number | undefined {
    this.bump(route);
    const forced = this.forced.get(route);
    if (forced && forced.count > 0) {
      forced.count -= 1;
      return forced.status;
    }
    return token !== undefined && token === this.activeSession ? undefined : 401;
  }
}

// ── Payload builders ──────────────────────────────────────────

function productInfo(p: MockProduct): Record<string, unknown> {
  return {
    id: p.id,
    name: p.name,
    isin: p.isin,
    symbol: p.symbol,
    vwdId: p.vwdId,
    productType: "STOCK",
    category: "A",
    currency: "EUR",
    tradable: true,
    active: true,
    buyOrderTypes: ["LIMIT", "MARKET"],
    sellOrderTypes: ["LIMIT", "MARKET", "STOPLOSS"],
    closePrice: p.closes[p.closes.length - 1] ?? 0,
    closePriceDate: "2021-12-01",
  };
}

function positionRow(p: MockProduct, index: number): { value: Array<{ name: string; value: unknown }> } {
  const price = p.closes[p.closes.length - 1] ?? 0;
  const size = index === 0 ? 10 : 0;
  return {
    value: [
      { name: "id", value: p.id },
      { name: "positionType", value: "PRODUCT" },
      { name: "size", value: size },
      { name: "price", value: price },
      { name: "value", value: size * price },
      { name: "breakEvenPrice", value: 95 },
      { name: "plBase", value: { EUR: -950 } },
    ],
  };
}

function orderRow(p: MockProduct | undefined): { value: Array<{ name: string; value: unknown }> } {
  return {
    value: [
      { name: "id", value: "order-1" },
      { name: "date", value: "10:15" },
      { name: "productId", value: Number(p?.id ?? 0) },
      { name: "product", value: p?.symbol ?? "" },
      { name: "currency", value: "EUR" },
      { name: "buysell", value: "B" },
      { name: "size", value: 5 },
      { name: "quantity", value: 5 },
      { name: "price", value: 90 },
      { name: "isDeletable", value: true },
    ],
  };
}

// ── Request helpers ───────────────────────────────────────────

function query(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" ? value : undefined;
}

function cookieSession(req: Request): string | undefined {
  const header = req.headers.cookie ?? "";
  for (const part of header.split(";")) {
    const [name, ...rest] = part.trim().split("=");
    if (name === "JSESSIONID") return rest.join("=");
  }
  return undefined;
}
