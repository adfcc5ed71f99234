/**
 * Request logging middleware.
 *
 * One entry per request, after the response is final (error handler
 * included). The level follows the status: 5xx error, 4xx warn,
 * everything else info.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startedAt = performance.now();
    await next();

    const status = c.res.status;
    log({
      level: levelForStatus(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - startedAt),
      requestId: c.get("requestId"),
    });
  };
}
