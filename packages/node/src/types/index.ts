/**
 * Type barrel — re-exports all public types from @notevault/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  DepositSchema,
  WithdrawSchema,
  ListNotesQuerySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
  EventTypeSchema,
  toNoteDto,
  toEventDto,
  toAuditReportDto,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  ListNotesQuery,
  ListEventsQuery,
  ListStreamEventsQuery,
  NoteDto,
  EventDto,
  VaultStateDto,
  AuditReportDto,
} from "./dto.js";

// Error
export { createErrorEnvelope, validationError } from "./error.js";
export type { ApiErrorCode, ErrorEnvelope, ValidationIssue } from "./error.js";

// Pagination
export {
  encodeCursor,
  decodeCursor,
  paginate,
  u64SortKey,
  positionSortKey,
} from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
