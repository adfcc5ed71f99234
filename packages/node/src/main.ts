/**
 * @notevault/node — Entry point.
 *
 * Loads config, builds the Hono app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { dirname, join } from "node:path";
import pino from "pino";
import {
  FileSnapshotStore,
  InMemoryEventStore,
  InMemorySnapshotStore,
  JsonlEventStore,
} from "@notevault/event-store";
import type { EventStore, SnapshotStore } from "@notevault/event-store";
import { InMemoryTransferGateway } from "@notevault/ledger";
import { loadConfig, parseApiKeys, parseBalances } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Auth from env vars
  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const apiKeys = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      apiKeys.set(k.key, k);
    }
    auth = { apiKeys };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured — running in unsecured mode");
  }

  let eventStore: EventStore;
  let snapshotStore: SnapshotStore;
  let snapshotDir: string | undefined;
  if (config.EVENT_LOG_PATH !== undefined) {
    const jsonl = new JsonlEventStore({ filePath: config.EVENT_LOG_PATH });
    if (jsonl.skippedLines > 0) {
      logger.warn({ skippedLines: jsonl.skippedLines }, "Unreadable audit trail lines skipped");
    }
    eventStore = jsonl;
    snapshotDir = config.VAULT_SNAPSHOT_DIR ?? join(dirname(config.EVENT_LOG_PATH), "snapshots");
    snapshotStore = new FileSnapshotStore(snapshotDir);
  } else {
    eventStore = new InMemoryEventStore();
    snapshotStore = new InMemorySnapshotStore();
  }

  const gateway = new InMemoryTransferGateway(parseBalances(config.GENESIS_BALANCES));

  const { app } = createApp({
    admin: config.VAULT_ADMIN,
    custodian: config.VAULT_CUSTODIAN,
    eventStore,
    snapshotStore,
    gateway,
    logger,
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      admin: config.VAULT_ADMIN,
      eventLog: config.EVENT_LOG_PATH ?? "memory",
      snapshots: snapshotDir ?? "memory",
    },
    "Note vault node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
