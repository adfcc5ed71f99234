/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { Principal } from "@notevault/types";
import type { EventStore, SnapshotStore } from "@notevault/event-store";
import type { InMemoryTransferGateway } from "@notevault/ledger";
import type { AppEnv } from "./types/api-contract.js";
import { VaultService } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, principalHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createBalanceRoutes } from "./routes/balances.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly admin: Principal;
  readonly custodian: Principal;
  readonly eventStore?: EventStore | undefined;
  readonly snapshotStore?: SnapshotStore | undefined;
  readonly gateway?: InMemoryTransferGateway | undefined;
  /** Root logger; service and error logs go here */
  readonly logger?: Logger | undefined;
  /** Per-request log sink. Defaults to the logger, at the entry's level */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, API keys are required. */
  readonly auth?: AuthConfig | undefined;
  /** Caller used in unsecured mode when X-Principal is absent */
  readonly defaultPrincipal?: Principal | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { logger } = options;
  const service = new VaultService({
    admin: options.admin,
    custodian: options.custodian,
    eventStore: options.eventStore,
    snapshotStore: options.snapshotStore,
    gateway: options.gateway,
    logger,
  });

  const logFn =
    options.logFn ??
    (logger !== undefined
      ? ({ level, ...fields }: RequestLogEntry) => {
          logger[level](fields, `${fields.method} ${fields.path} ${fields.status}`);
        }
      : undefined);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (logFn !== undefined) {
    app.use("*", loggerMiddleware(logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", principalHeaderMiddleware(options.defaultPrincipal ?? "anonymous"));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/balances", createBalanceRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
