/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import path from "node:path";
import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const ConfigSchema = z.object({
  // Brokerage
  broker: z.object({
    username: z.string().default(""),
    password: z.string().default(""),
    baseUrl: z.string().url().default("https://trader.degiro.nl/"),
    chartUrl: z.string().url().default("https://charting.vwdservices.com/hchart/v1/deGiro/data.js"),
    referer: z.string().url().default("https://trader.degiro.nl/trader/"),
  }),

  // RPC
  rpc: z.object({
    host: z.string().default("127.0.0.1"),
    port: z.coerce.number().int().min(1).max(65535).default(9123),
    timeoutMs: z.coerce.number().int().positive().default(60_000),
  }),

  // Storage
  storage: z.object({
    dataDir: z.string().default(path.resolve(process.cwd(), "data")),
  }),

  // Supervision
  supervisor: z.object({
    maxRestarts: z.coerce.number().int().min(0).default(5),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const raw = {
    broker: {
      username: process.env.BROKER_USERNAME,
      password: process.env.BROKER_PASSWORD,
      baseUrl: process.env.BROKER_BASE_URL,
      chartUrl: process.env.BROKER_CHART_URL,
      referer: process.env.BROKER_REFERER,
    },
    rpc: {
      host: process.env.RPC_HOST,
      port: process.env.RPC_PORT,
      timeoutMs: process.env.RPC_TIMEOUT_MS,
    },
    storage: {
      dataDir: process.env.DATA_DIR,
    },
    supervisor: {
      maxRestarts: process.env.MAX_RESTARTS,
    },
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();
