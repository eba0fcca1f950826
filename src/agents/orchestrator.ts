/**
 * Orchestrator: wires the unit tree.
 *
 * Units in start order:
 *   1. cache       (entity store)
 *   2. settings    (tracked assets)
 *   3. gateway     (brokerage session)
 *   4. calculator  (allocation math)
 *   5. listener    (RPC socket)
 *
 * The broker client is built once and handed to every gateway instance, so a
 * gateway restart keeps the session and the in-memory caches.
 */

import path from "node:path";
import { BrokerClient, type FetchLike } from "../api/broker/client.js";
import { SecretsStore } from "../storage/secrets.js";
import { Supervisor } from "./supervisor.js";
import { CacheUnit } from "./cache.js";
import { SettingsUnit } from "./settings.js";
import { GatewayUnit } from "./gateway.js";
import { CalculatorUnit } from "./calculator.js";
import { ListenerUnit } from "./listener.js";
import { agentLogger } from "../utils/logger.js";
import type { Credentials } from "../api/broker/session.js";
import type { Protocols } from "../types/units.js";

const log = agentLogger("orchestrator");

export interface OrchestratorOptions {
  credentials: Credentials;
  broker: { baseUrl: string; chartUrl: string; referer: string };
  rpc: { host: string; port: number };
  dataDir: string;
  maxRestarts?: number;
  fetch?: FetchLike;
  onListening?: (port: number) => void;
}

export type Orchestrator = Supervisor<Protocols>;

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const client = new BrokerClient({
    credentials: options.credentials,
    ...options.broker,
    fetch: options.fetch,
    secrets: new SecretsStore(options.dataDir),
  });
  const dbPath = path.join(options.dataDir, "quotegate.sqlite");

  const supervisor = new Supervisor<Protocols>(
    {
      cache: () => new CacheUnit(dbPath),
      settings: () => new SettingsUnit(options.dataDir),
      gateway: () => new GatewayUnit(client),
      calculator: () => new CalculatorUnit(),
      listener: (ctx) =>
        new ListenerUnit(ctx, { ...options.rpc, onListening: options.onListening }),
    },
    { maxRestarts: options.maxRestarts }
  );

  supervisor.on("unit_restarted", (unit, restarts) => log.warn(`Unit ${unit} restarted (${restarts})`));
  supervisor.on("unit_failed", (unit) => log.error(`Unit ${unit} is down for good`));
  return supervisor;
}
