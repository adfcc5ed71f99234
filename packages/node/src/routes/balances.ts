/**
 * Balance routes.
 *
 * GET /api/v1/balances/:principal — Balance held in the transfer gateway
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:principal", requirePermission("read"), (c) => {
    const principal = c.req.param("principal");
    const balance = c.get("service").balanceOf(principal);

    return c.json({ data: { principal, balance: balance.toString() } });
  });

  return routes;
}
