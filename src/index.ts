/**
 * quotegate gateway entry point.
 *
 * Boots the unit tree from the environment configuration and keeps it
 * running until SIGINT or SIGTERM.
 */

import { createOrchestrator, type Orchestrator } from "./agents/orchestrator.js";
import { config } from "./config/index.js";
import { logger } from "./utils/logger.js";

export { createOrchestrator } from "./agents/orchestrator.js";
export { BrokerClient } from "./api/broker/client.js";
export { sendRequest } from "./rpc/client.js";
export type { Request, Response } from "./rpc/messages.js";

/** Start the gateway and resolve once it has shut down */
export async function runGateway(): Promise<void> {
  logger.info("═══ quotegate gateway ═══");
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Data directory: ${config.storage.dataDir}`);

  if (!config.broker.username || !config.broker.password) {
    logger.warn("BROKER_USERNAME or BROKER_PASSWORD is not set; logins will be rejected");
  }

  // ── 1. Build the unit tree ────────────────────────────────
  const orchestrator: Orchestrator = createOrchestrator({
    credentials: { username: config.broker.username, password: config.broker.password },
    broker: {
      baseUrl: config.broker.baseUrl,
      chartUrl: config.broker.chartUrl,
      referer: config.broker.referer,
    },
    rpc: { host: config.rpc.host, port: config.rpc.port },
    dataDir: config.storage.dataDir,
    maxRestarts: config.supervisor.maxRestarts,
  });

  // ── 2. Start units ────────────────────────────────────────
  await orchestrator.start();
  logger.info("All units started");

  // ── 3. Block until interrupted ────────────────────────────
  await new Promise<void>((resolve) => {
    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, shutting down`);
      orchestrator
        .stop()
        .catch((err: unknown) => logger.error("Shutdown failed", { error: String(err) }))
        .finally(resolve);
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });
}
