/**
 * Vault routes.
 *
 * POST /api/v1/vault/initialize          — Create the vault record (admin only)
 * GET  /api/v1/vault                     — Vault state
 * GET  /api/v1/vault/audit               — Consistency re-scan
 * POST /api/v1/vault/deposits            — Lock value and create a note
 * GET  /api/v1/vault/notes               — List notes (cursor pagination)
 * GET  /api/v1/vault/notes/:id           — Get one note
 * POST /api/v1/vault/notes/:id/withdraw  — Redeem a note
 */

import { Hono } from "hono";
import { isU64String } from "@notevault/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  ListNotesQuerySchema,
  WithdrawSchema,
  toAuditReportDto,
  toNoteDto,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope, validationError } from "../types/error.js";
import { paginate, u64SortKey } from "../types/pagination.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/vault/initialize
  routes.post("/initialize", requirePermission("write"), (c) => {
    const service = c.get("service");
    const state = service.initialize(c.get("auth").principal);
    return c.json({ data: state }, 201);
  });

  // GET /api/v1/vault
  routes.get("/", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").state() });
  });

  // GET /api/v1/vault/audit
  routes.get("/audit", requirePermission("read"), (c) => {
    return c.json({ data: toAuditReportDto(c.get("service").audit()) });
  });

  // POST /api/v1/vault/deposits
  routes.post(
    "/deposits",
    requirePermission("write"),
    validateBody(DepositSchema),
    (c) => {
      const service = c.get("service");
      const body = c.req.valid("json");

      const note = service.deposit(c.get("auth").principal, body.amount, body.commitment);
      return c.json({ data: toNoteDto(note) }, 201);
    },
  );

  // GET /api/v1/vault/notes
  routes.get("/notes", requirePermission("read"), (c) => {
    const queryResult = ListNotesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        validationError("Invalid query parameters", queryResult.error),
        400,
      );
    }

    const query = queryResult.data;
    const notes = c.get("service").listNotes({ owner: query.owner, spent: query.spent });

    const result = paginate(
      notes,
      { cursor: query.cursor, limit: query.limit },
      (note) => u64SortKey(note.id),
      "id",
    );

    return c.json({ data: result.data.map(toNoteDto), pagination: result.pagination });
  });

  // GET /api/v1/vault/notes/:id
  routes.get("/notes/:id", requirePermission("read"), (c) => {
    const id = c.req.param("id");
    if (!isU64String(id)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `Invalid note id '${id}'`),
        400,
      );
    }

    return c.json({ data: toNoteDto(c.get("service").getNote(BigInt(id))) });
  });

  // POST /api/v1/vault/notes/:id/withdraw
  routes.post(
    "/notes/:id/withdraw",
    requirePermission("write"),
    validateBody(WithdrawSchema),
    (c) => {
      const id = c.req.param("id");
      if (!isU64String(id)) {
        return c.json(
          createErrorEnvelope("VALIDATION_ERROR", `Invalid note id '${id}'`),
          400,
        );
      }

      const caller = c.get("auth").principal;
      const body = c.req.valid("json");
      const note = c.get("service").withdraw(caller, BigInt(id), body.recipient ?? caller);

      return c.json({ data: toNoteDto(note) });
    },
  );

  return routes;
}
