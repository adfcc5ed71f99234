/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, getStatusCode, STATUS_MAP } from "./error-handler.js";
export type { ErrorStatus } from "./error-handler.js";
export { requestIdMiddleware, isAcceptableRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody } from "./validate.js";
export {
  authMiddleware,
  principalHeaderMiddleware,
  requirePermission,
  API_KEY_HEADER,
  PRINCIPAL_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
