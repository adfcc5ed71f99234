/**
 * Audit trail routes.
 *
 * GET /api/v1/events            — every stream, in global order
 * GET /api/v1/events/:streamId  — one stream, in version order
 *
 * Both accept `type` (note.deposited | note.withdrawn) and page by
 * cursor. The deposit payload's commitment is stored redacted, so
 * nothing here can leak one.
 */

import { Hono } from "hono";
import type { StoredEvent } from "@notevault/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { paginate, positionSortKey } from "../types/pagination.js";
import type { PaginatedResponse } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema, toEventDto } from "../types/dto.js";
import type { EventDto } from "../types/dto.js";
import { validationError } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";

type Position = "globalPosition" | "version";

function page(
  events: readonly StoredEvent[],
  query: { cursor?: string | undefined; limit: number; type?: string | undefined },
  by: Position,
): PaginatedResponse<EventDto> {
  const matching =
    query.type === undefined ? events : events.filter((e) => e.event.type === query.type);

  const result = paginate(
    matching,
    { cursor: query.cursor, limit: query.limit },
    (e) => positionSortKey(e[by]),
    by,
  );
  return { data: result.data.map(toEventDto), pagination: result.pagination };
}

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(validationError("Invalid query parameters", queryResult.error), 400);
    }

    const query = queryResult.data;
    const events = c.get("service").readAllEvents(
      query.afterPosition === undefined ? undefined : { fromPosition: query.afterPosition + 1 },
    );
    return c.json(page(events, query, "globalPosition"));
  });

  routes.get("/:streamId", (c) => {
    const queryResult = ListStreamEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(validationError("Invalid query parameters", queryResult.error), 400);
    }

    const query = queryResult.data;
    const events = c.get("service").readStreamEvents(
      c.req.param("streamId"),
      query.afterVersion === undefined ? undefined : { fromVersion: query.afterVersion + 1 },
    );
    return c.json(page(events, query, "version"));
  });

  return routes;
}
