/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * u64 values (amounts, note ids) travel as decimal strings. The ledger
 * parses them, so out-of-range values surface as ledger errors.
 */

import { z } from "zod";
import type { Note } from "@notevault/types";
import type { ConsistencyReport } from "@notevault/ledger";
import { VAULT_EVENTS } from "@notevault/event-store";
import type { StoredEvent } from "@notevault/event-store";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const PrincipalSchema = z.string().trim().min(1).max(256);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: z.string().min(1).max(32),
  /** Hex-encoded commitment bytes; empty when omitted */
  commitment: z.string().max(4096).optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  /** Defaults to the caller */
  recipient: PrincipalSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const ListNotesQuerySchema = PaginationQuerySchema.extend({
  owner: PrincipalSchema.optional(),
  spent: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
});

export type ListNotesQuery = z.infer<typeof ListNotesQuerySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const EventTypeSchema = z.enum([
  VAULT_EVENTS.NOTE_DEPOSITED,
  VAULT_EVENTS.NOTE_WITHDRAWN,
]);

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: EventTypeSchema.optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
  type: EventTypeSchema.optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

/** Public view of a note. The commitment is never served. */
export interface NoteDto {
  readonly id: string;
  readonly owner: string;
  readonly amount: string;
  readonly spent: boolean;
}

export function toNoteDto(note: Note): NoteDto {
  return {
    id: note.id.toString(),
    owner: note.owner,
    amount: note.amount.toString(),
    spent: note.spent,
  };
}

export interface VaultStateDto {
  readonly initialized: boolean;
  readonly admin: string;
  readonly custodian: string;
  readonly totalLocked: string;
  readonly noteCount: number;
  readonly nextNoteId: string;
}

export interface AuditReportDto {
  readonly consistent: boolean;
  readonly totalLocked: string;
  readonly unspentSum: string;
  readonly unspentCount: number;
  readonly noteCount: number;
}

export function toAuditReportDto(report: ConsistencyReport): AuditReportDto {
  return {
    consistent: report.consistent,
    totalLocked: report.totalLocked.toString(),
    unspentSum: report.unspentSum.toString(),
    unspentCount: report.unspentCount,
    noteCount: report.noteCount,
  };
}

/** A stored event as served: the chain link plus the domain event. */
export interface EventDto {
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly appendedAt: string;
  readonly hash: string;
  readonly previousHash: string;
  readonly event: StoredEvent["event"];
}

export function toEventDto(stored: StoredEvent): EventDto {
  return {
    streamId: stored.streamId,
    version: stored.version,
    globalPosition: stored.globalPosition,
    appendedAt: stored.appendedAt,
    hash: stored.hash,
    previousHash: stored.previousHash,
    event: stored.event,
  };
}
