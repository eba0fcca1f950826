/**
 * Brokerage Web API Client
 *
 * Owns the session state and the in-memory entity caches. Every public
 * operation is described as a CallSpec and runs through the prerequisite
 * resolver, so a call never goes out while the token, endpoint or account
 * data it depends on is missing. Logins are single-flight: concurrent
 * callers share one in-flight login.
 */

import { agentLogger, describeError } from "../../utils/logger.js";
import {
  AuthenticationError,
  DecodeError,
  NotFoundError,
  UnauthorizedError,
  UnreachableError,
  UpstreamRejectedError,
} from "../../utils/errors.js";
import {
  decodeAccountConfig,
  decodeAccountSnapshot,
  decodeInstruments,
  decodeOrders,
  decodePositions,
  decodePriceSeries,
  decodeReport,
  decodeTransactions,
  decodeWith,
  LoginResponseSchema,
} from "./decoders.js";
import {
  ResolutionBudget,
  resolveAndIssue,
  type CallSpec,
  type Prerequisite,
  type PrerequisiteHost,
} from "./resolver.js";
import { SessionState, type Credentials } from "./session.js";
import type { SecretsStore } from "../../storage/secrets.js";
import type {
  AccountSnapshot,
  CompanyRatios,
  DateRange,
  EndpointMap,
  FinancialStatements,
  Instrument,
  Order,
  Period,
  Position,
  PriceSeries,
  Report,
  Transaction,
} from "../../types/broker.js";

const log = agentLogger("broker");

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface BrokerClientOptions {
  credentials: Credentials;
  baseUrl: string;
  chartUrl: string;
  referer: string;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
  /** When given, the session is restored from and saved to it */
  secrets?: SecretsStore;
}

interface RequestOptions {
  method?: "GET" | "POST";
  body?: unknown;
  referer?: boolean;
}

export class BrokerClient implements PrerequisiteHost {
  private readonly session: SessionState;
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly chartUrl: string;
  private readonly referer: string;
  private readonly secrets: SecretsStore | undefined;

  private readonly instruments = new Map<string, Instrument>();
  private readonly priceSeries = new Map<string, PriceSeries>();
  private loginInFlight: Promise<void> | null = null;
  private loginCount = 0;

  constructor(options: BrokerClientOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.chartUrl = options.chartUrl;
    this.referer = options.referer;
    this.secrets = options.secrets;
    this.session = new SessionState(options.credentials, options.secrets?.load());
  }

  /** Number of login requests issued by this client */
  get logins(): number {
    return this.loginCount;
  }

  get hasSession(): boolean {
    return this.session.sessionToken !== undefined;
  }

  // ─── Authentication ───────────────────────────────────────

  /** Post credentials; any non-2xx answer is fatal and never retried here */
  async login(): Promise<void> {
    const url = new URL("login/secure/login", this.baseUrl);
    url.searchParams.set("reason", "session_expired");
    const { username, password } = this.session.credentials;

    this.loginCount += 1;
    log.info("Logging in");
    const res = await this.send("login", url, {
      method: "POST",
      body: { isPassCodeReset: false, isRedirectToMobile: false, password, username },
    });
    if (!res.ok) {
      throw new AuthenticationError(res.status);
    }

    const body = decodeWith("login", LoginResponseSchema, await this.readJson("login", res));
    if (body.sessionId) {
      this.session.acceptSession(body.sessionId);
      log.info("Session established");
    } else {
      log.warn("Login accepted without a session token");
    }
    this.persist();
  }

  /** Log in unless a session exists; concurrent callers share one login */
  async ensureSession(): Promise<void> {
    if (this.session.sessionToken !== undefined) return;
    if (!this.loginInFlight) {
      this.loginInFlight = this.login().finally(() => {
        this.loginInFlight = null;
      });
    }
    await this.loginInFlight;
  }

  /** Fetch account config: endpoint map plus user token */
  async resolveEndpoints(budget?: ResolutionBudget): Promise<EndpointMap> {
    return this.call(
      {
        operation: "resolveEndpoints",
        requires: ["session"],
        issue: async () => {
          const url = new URL("login/secure/config", this.baseUrl);
          const { userToken, endpoints } = decodeAccountConfig(
            await this.getJson("resolveEndpoints", url, { referer: true })
          );
          this.session.userToken = userToken;
          this.session.endpoints = endpoints;
          this.persist();
          return endpoints;
        },
      },
      budget
    );
  }

  async fetchAccountSnapshot(budget?: ResolutionBudget): Promise<AccountSnapshot> {
    return this.call(
      {
        operation: "fetchAccountSnapshot",
        requires: ["session", "endpoints"],
        issue: async () => {
          const url = new URL("client", this.endpoints().portfolioAccount);
          url.searchParams.set("sessionId", this.token());
          const account = decodeAccountSnapshot(await this.getJson("fetchAccountSnapshot", url));
          this.session.account = account;
          return account;
        },
      },
      budget
    );
  }

  // ─── Instruments & Prices ─────────────────────────────────

  /**
   * Resolve instruments by id. Cached ids are served from memory; the rest
   * go out in one batch. Repeated ids are answered once; ids the upstream
   * does not know are omitted.
   */
  async fetchInstruments(ids: readonly string[], budget?: ResolutionBudget): Promise<Instrument[]> {
    const wanted = [...new Set(ids)];
    const missing = wanted.filter((id) => !this.instruments.has(id));

    if (missing.length > 0) {
      await this.call(
        {
          operation: "fetchInstruments",
          requires: ["session", "endpoints", "account"],
          issue: async () => {
            const url = new URL("v5/products/info", this.endpoints().productSearch);
            url.searchParams.set("intAccount", String(this.accountSnapshot().intAccount));
            url.searchParams.set("sessionId", this.token());
            const found = decodeInstruments(
              await this.getJson("fetchInstruments", url, { method: "POST", body: missing })
            );
            for (const instrument of found) {
              this.instruments.set(instrument.id, instrument);
            }
            log.debug("Fetched instruments", { requested: missing.length, found: found.length });
          },
        },
        budget
      );
    }

    return wanted.flatMap((id) => {
      const instrument = this.instruments.get(id);
      return instrument ? [instrument] : [];
    });
  }

  async instrument(id: string, budget?: ResolutionBudget): Promise<Instrument> {
    const [instrument] = await this.fetchInstruments([id], budget);
    if (!instrument) {
      throw new NotFoundError(`instrument ${id}`);
    }
    return instrument;
  }

  async fetchPriceSeries(id: string, period: Period, resolution: Period): Promise<PriceSeries> {
    const key = `${id}:${period}:${resolution}`;
    const cached = this.priceSeries.get(key);
    if (cached) return cached;

    const budget = new ResolutionBudget();
    const instrument = await this.instrument(id, budget);
    const series = await this.call(
      {
        operation: "fetchPriceSeries",
        requires: ["userToken"],
        issue: async () => {
          const url = new URL(this.chartUrl);
          url.searchParams.set("requestid", "1");
          url.searchParams.set("format", "json");
          url.searchParams.set("resolution", resolution);
          url.searchParams.set("period", period);
          url.searchParams.set("series", `ohlc:issueid:${instrument.vwdId}`);
          url.searchParams.set("userToken", String(this.session.userToken));
          const body = await this.getJson("fetchPriceSeries", url, { referer: true });
          return decodePriceSeries(body, { id, symbol: instrument.symbol, period, resolution });
        },
      },
      budget
    );
    this.priceSeries.set(key, series);
    return series;
  }

  // ─── Trading & Reporting ──────────────────────────────────

  async fetchPositions(): Promise<Position[]> {
    return this.call({
      operation: "fetchPositions",
      requires: ["session", "endpoints", "account"],
      issue: async () => {
        const url = this.updateUrl();
        url.searchParams.set("portfolio", "0");
        return decodePositions(await this.getJson("fetchPositions", url));
      },
    });
  }

  async fetchOrders(): Promise<Order[]> {
    return this.call({
      operation: "fetchOrders",
      requires: ["session", "endpoints", "account"],
      issue: async () => {
        const url = this.updateUrl();
        url.searchParams.set("sessionId", this.token());
        url.searchParams.set("orders", "0");
        url.searchParams.set("transactions", "0");
        return decodeOrders(await this.getJson("fetchOrders", url));
      },
    });
  }

  async fetchTransactions(range: DateRange): Promise<Transaction[]> {
    return this.call({
      operation: "fetchTransactions",
      requires: ["session", "endpoints", "account"],
      issue: async () => {
        const url = new URL("v4/transactions", this.endpoints().reporting);
        url.searchParams.set("sessionId", this.token());
        url.searchParams.set("intAccount", String(this.accountSnapshot().intAccount));
        url.searchParams.set("fromDate", toUpstreamDate(range.from));
        url.searchParams.set("toDate", toUpstreamDate(range.to));
        url.searchParams.set("groupTransactionsByOrder", "1");
        return decodeTransactions(await this.getJson("fetchTransactions", url));
      },
    });
  }

  async fetchFinancialStatements(id: string): Promise<FinancialStatements> {
    return this.fetchReport("fetchFinancialStatements", id, (e) => e.financialStatements);
  }

  async fetchCompanyRatios(id: string): Promise<CompanyRatios> {
    return this.fetchReport("fetchCompanyRatios", id, (e) => e.companyRatios);
  }

  private async fetchReport(
    operation: string,
    id: string,
    base: (endpoints: EndpointMap) => string
  ): Promise<Report> {
    const budget = new ResolutionBudget();
    const { isin } = await this.instrument(id, budget);
    return this.call(
      {
        operation,
        requires: ["session", "endpoints", "account"],
        issue: async () => {
          const url = new URL(encodeURIComponent(isin), base(this.endpoints()));
          url.searchParams.set("intAccount", String(this.accountSnapshot().intAccount));
          url.searchParams.set("sessionId", this.token());
          const data = decodeReport(operation, await this.getJson(operation, url));
          return { id, isin, fetchedAt: Date.now(), data };
        },
      },
      budget
    );
  }

  // ─── Prerequisite host ────────────────────────────────────

  has(prerequisite: Prerequisite): boolean {
    switch (prerequisite) {
      case "session":
        return this.session.sessionToken !== undefined;
      case "endpoints":
        return this.session.endpoints !== undefined;
      case "userToken":
        return this.session.userToken !== undefined;
      case "account":
        return this.session.account !== undefined;
    }
  }

  async produce(prerequisite: Prerequisite, budget: ResolutionBudget): Promise<void> {
    switch (prerequisite) {
      case "session":
        await this.ensureSession();
        return;
      case "endpoints":
      case "userToken":
        await this.resolveEndpoints(budget);
        return;
      case "account":
        await this.fetchAccountSnapshot(budget);
        return;
    }
  }

  currentSession(): string | undefined {
    return this.session.sessionToken;
  }

  async reauthenticate(rejected: string | undefined): Promise<void> {
    if (this.session.clearSession(rejected)) {
      log.info("Cleared rejected session token");
    }
    await this.ensureSession();
  }

  // ─── HTTP plumbing ────────────────────────────────────────

  private call<T>(spec: CallSpec<T>, budget?: ResolutionBudget): Promise<T> {
    return resolveAndIssue(this, spec, budget);
  }

  private async send(operation: string, url: URL, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (options.body !== undefined) headers["Content-Type"] = "application/json";
    if (options.referer) headers.Referer = this.referer;
    const cookie = this.session.cookies.header();
    if (cookie) headers.Cookie = cookie;

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: options.method ?? "GET",
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });
    } catch (err) {
      log.error("Request failed", { operation, path: url.pathname, error: describeError(err) });
      throw new UnreachableError(operation, err);
    }
    this.session.cookies.store(res.headers);
    return res;
  }

  private async getJson(operation: string, url: URL, options: RequestOptions = {}): Promise<unknown> {
    const res = await this.send(operation, url, options);
    if (res.status === 401) {
      throw new UnauthorizedError(operation);
    }
    if (!res.ok) {
      log.warn("Upstream rejected request", { operation, path: url.pathname, status: res.status });
      throw new UpstreamRejectedError(operation, res.status);
    }
    try {
      return await this.readJson(operation, res);
    } catch (err) {
      if (err instanceof DecodeError) {
        log.error("Undecodable payload", { operation, path: url.pathname, issues: err.issues, error: err.message });
      }
      throw err;
    }
  }

  private async readJson(operation: string, res: Response): Promise<unknown> {
    const text = await res.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new DecodeError(operation, "body is not JSON");
    }
  }

  private updateUrl(): URL {
    return new URL(
      `v5/update/${this.accountSnapshot().intAccount};jsessionid=${this.token()}`,
      this.endpoints().trading
    );
  }

  private persist(): void {
    this.secrets?.save(this.session.toSecrets());
  }

  // The resolver has established these before any issue() runs.

  private token(): string {
    const token = this.session.sessionToken;
    if (token === undefined) throw new UnauthorizedError("session");
    return token;
  }

  private endpoints(): EndpointMap {
    const endpoints = this.session.endpoints;
    if (!endpoints) throw new NotFoundError("endpoint map");
    return endpoints;
  }

  private accountSnapshot(): AccountSnapshot {
    const account = this.session.account;
    if (!account) throw new NotFoundError("account snapshot");
    return account;
  }
}

/** YYYY-MM-DD → DD/MM/YYYY */
export function toUpstreamDate(isoDate: string): string {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate);
  if (!match) {
    throw new DecodeError("fetchTransactions", `invalid date '${isoDate}'`);
  }
  return `${match[3]}/${match[2]}/${match[1]}`;
}
