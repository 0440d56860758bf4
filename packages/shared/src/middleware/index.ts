export { apiErrorHandler, type ApiErrorBody } from "./error-handler.js";
export { createInternalAuthHook, type InternalAuthConfig } from "./internal-auth.js";
