/**
 * Request ID middleware.
 *
 * Propagates a caller-supplied X-Request-Id when it is a short token
 * (letters, digits, `.`, `_`, `-`; at most 128 characters) and
 * generates a UUID otherwise, so log lines never carry arbitrary
 * header content.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export function isAcceptableRequestId(value: string | undefined): value is string {
  return value !== undefined && REQUEST_ID_PATTERN.test(value);
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = isAcceptableRequestId(incoming) ? incoming : randomUUID();
    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
