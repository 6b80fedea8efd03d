/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readParam, readQuery } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  requireCaller,
  verifyJwt,
  signJwt,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
