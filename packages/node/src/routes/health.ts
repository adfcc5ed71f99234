/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (event store hash-chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultService } from "../services/vault-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyEventStore();

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${integrity.errors.length}, lastVerifiedPosition=${integrity.lastVerifiedPosition}`,
        };

    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      vaultInitialized: service.deployment.isInitialized(),
      subsystems: { eventStore },
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
