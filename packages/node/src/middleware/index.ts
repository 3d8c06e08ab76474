/**
 * Middleware barrel: re-exports all middleware.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export { validateBody, validationFailed, zodIssues } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
export { apiKeyMiddleware, API_KEY_HEADER } from "./auth.js";
