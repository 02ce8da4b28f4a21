/**
 * Middleware barrel.
 */

export { identifyCaller, requireCaller, API_KEY_HEADER, CALLER_ID_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { handleError } from "./error-handler.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { validateBody, formatZodErrors } from "./validate.js";
