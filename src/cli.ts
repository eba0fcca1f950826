#!/usr/bin/env node
/**
 * quotegate command line.
 *
 * Each subcommand sends one request to a running gateway and prints the
 * reply. Without a subcommand the gateway itself is started in-process.
 */

import { Command, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { config } from "./config/index.js";
import { runGateway } from "./index.js";
import { sendRequest } from "./rpc/client.js";
import type { Request, Response } from "./rpc/messages.js";
import type { InstrumentQuery } from "./types/broker.js";
import { IsoDateSchema, RiskSchema } from "./utils/validation.js";

// ── Argument parsers ────────────────────────────────────────

function parseWith<T>(schema: z.ZodType<T>): (value: string) => T {
  return (value) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidArgumentError(parsed.error.issues.map((i) => i.message).join("; "));
    }
    return parsed.data;
  };
}

const parseNumber = parseWith(z.coerce.number().finite());
const parseCount = parseWith(z.coerce.number().int().nonnegative());
const parseRisk = parseWith(z.coerce.number().pipe(RiskSchema));
const parseDate = parseWith(IsoDateSchema);

const QueryOptionsSchema = z
  .object({ id: z.string().optional(), symbol: z.string().optional(), name: z.string().optional() })
  .transform((opts, ctx): InstrumentQuery => {
    if (opts.id !== undefined) return { by: "id", value: opts.id };
    if (opts.symbol !== undefined) return { by: "symbol", value: opts.symbol };
    if (opts.name !== undefined) return { by: "name", value: opts.name };
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "one of --id, --symbol or --name is required" });
    return z.NEVER;
  });

const RiskModeOption = (): Option =>
  new Option("--mode <mode>", "risk metric").choices(["std", "lsv"]).default("std");

const ModeSchema = z.enum(["std", "lsv"]);

// ── Output ──────────────────────────────────────────────────

function payloadOf(res: Exclude<Response, { type: "Ack" | "Failure" | "Portfolio" | "StopLoss" }>): unknown {
  switch (res.type) {
    case "Instrument":
      return res.instrument;
    case "Financials":
    case "Ratios":
      return res.report;
    case "PriceSeries":
      return res.series;
    case "SingleAllocation":
      return res.allocation;
    case "Positions":
      return res.positions;
    case "Transactions":
      return res.transactions;
    case "Orders":
      return res.orders;
    case "CleanUp":
      return res.removed;
  }
}

function print(res: Response | null): void {
  if (res === null) {
    console.log("no response");
    process.exitCode = 1;
    return;
  }
  switch (res.type) {
    case "Ack":
      console.log("ok");
      return;
    case "Failure":
      console.error(`error: ${res.message}`);
      process.exitCode = 1;
      return;
    case "Portfolio":
    case "StopLoss":
      if (res.rows) console.table(res.rows);
      else console.log("nothing found");
      return;
    default: {
      const value = payloadOf(res);
      console.log(value === null ? "nothing found" : JSON.stringify(value, null, 2));
    }
  }
}

// ── Program ─────────────────────────────────────────────────

const program = new Command()
  .name("quotegate")
  .description("Brokerage gateway and its command-line client")
  .option("--host <host>", "gateway host", config.rpc.host)
  .option("--port <port>", "gateway port", parseCount, config.rpc.port)
  .action(async () => {
    await runGateway();
  });

async function send(req: Request): Promise<void> {
  const { host, port } = z.object({ host: z.string(), port: z.number() }).parse(program.opts());
  print(await sendRequest(req, { host, port, timeoutMs: config.rpc.timeoutMs }));
}

function withQuery(cmd: Command): Command {
  return cmd
    .option("--id <id>", "instrument id")
    .option("--symbol <symbol>", "ticker symbol, case-insensitive")
    .option("--name <pattern>", "name pattern, case-insensitive");
}

program
  .command("authorize")
  .description("log in and resolve the account endpoints")
  .action(() => send({ type: "Authorize" }));

program
  .command("fetch-data")
  .argument("[id]", "instrument id; all tracked assets when omitted")
  .description("refresh cached data from the brokerage")
  .action((id: string | undefined) => send(id === undefined ? { type: "FetchData" } : { type: "FetchData", id }));

const lookups = [
  ["get-instrument", "GetInstrument", "cached instrument"],
  ["get-financials", "GetFinancials", "cached financial statements"],
  ["get-ratios", "GetRatios", "cached company ratios"],
  ["get-price-series", "GetPriceSeries", "cached monthly price series"],
] as const;

for (const [name, type, description] of lookups) {
  withQuery(program.command(name))
    .description(`show the ${description}`)
    .action((opts: unknown) => send({ type, query: QueryOptionsSchema.parse(opts) }));
}

withQuery(program.command("single-allocation"))
  .description("allocation multiple for one instrument")
  .addOption(RiskModeOption())
  .option("--risk <fraction>", "maximum tolerated drawdown", parseRisk, 0.3)
  .option("--risk-free <rate>", "risk-free return per period", parseNumber, 0)
  .action((opts: unknown) => {
    const parsed = z
      .object({ mode: ModeSchema, risk: z.number(), riskFree: z.number() })
      .passthrough()
      .parse(opts);
    return send({
      type: "GetSingleAllocation",
      query: QueryOptionsSchema.parse(opts),
      mode: parsed.mode,
      risk: parsed.risk,
      riskFree: parsed.riskFree,
    });
  });

program
  .command("calculate-portfolio")
  .description("weights across tracked assets")
  .addOption(RiskModeOption())
  .option("--risk <fraction>", "maximum tolerated drawdown", parseRisk, 0.3)
  .option("--risk-free <rate>", "risk-free return per period", parseNumber, 0)
  .option("--freq <n>", "observations per window", parseCount, 12)
  .requiredOption("--money <amount>", "capital to allocate", parseNumber)
  .option("--max-stocks <n>", "maximum number of positions", parseCount, 10)
  .option("--min-rsi <value>", "drop assets with a lower RSI", parseNumber)
  .option("--max-rsi <value>", "drop assets with a higher RSI", parseNumber)
  .option("--short-sales-constraint", "long-only weights", false)
  .action((opts: unknown) => {
    const parsed = z
      .object({
        mode: ModeSchema,
        risk: z.number(),
        riskFree: z.number(),
        freq: z.number(),
        money: z.number(),
        maxStocks: z.number(),
        minRsi: z.number().optional(),
        maxRsi: z.number().optional(),
        shortSalesConstraint: z.boolean(),
      })
      .parse(opts);
    return send({ type: "CalculatePortfolio", ...parsed });
  });

program
  .command("stop-loss")
  .description("stop-loss levels for open positions")
  .option("--n <multiple>", "average drawdowns below the last close", parseNumber, 2)
  .option("--max-percent <fraction>", "cap on the distance from the last close", parseRisk)
  .action((opts: unknown) => {
    const { n, maxPercent } = z.object({ n: z.number(), maxPercent: z.number().optional() }).parse(opts);
    return send(maxPercent === undefined ? { type: "RecalculateStopLoss", n } : { type: "RecalculateStopLoss", n, maxPercent });
  });

program
  .command("positions")
  .description("open positions")
  .action(() => send({ type: "GetPositions" }));

program
  .command("orders")
  .description("open orders")
  .action(() => send({ type: "GetOrders" }));

program
  .command("transactions")
  .description("transactions in a date range")
  .requiredOption("--from <date>", "first day, YYYY-MM-DD", parseDate)
  .requiredOption("--to <date>", "last day, YYYY-MM-DD", parseDate)
  .action((opts: unknown) => {
    const { from, to } = z.object({ from: z.string(), to: z.string() }).parse(opts);
    return send({ type: "GetTransactions", from, to });
  });

program
  .command("add-asset")
  .argument("<id>", "instrument id")
  .argument("[name]", "label for the asset")
  .description("track an instrument")
  .action((id: string, name: string | undefined) =>
    send(name === undefined ? { type: "AddAsset", id } : { type: "AddAsset", id, name })
  );

program
  .command("clean-up")
  .description("purge cached data of untracked instruments")
  .action(() => send({ type: "CleanUp" }));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
