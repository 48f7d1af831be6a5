/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, createErrorHandler, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export { authMiddleware, requireCapability, verifyJwt, signJwt } from "./auth.js";
export type { AuthConfig } from "./auth.js";
