/**
 * Type barrel — re-exports all public types from @flashvault/node.
 */

// DTOs
export { RegisterAppSchema, ListEventsQuerySchema } from "./dto.js";
export type { RegisterAppDto, ListEventsQuery } from "./dto.js";

// Error
export { errorResponse, validationError } from "./error.js";
export type { HttpErrorCode, ValidationIssue, ErrorBody, ErrorResponse } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
