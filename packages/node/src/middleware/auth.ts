/**
 * Authentication middleware.
 *
 * API key via the X-Api-Key header, looked up in the configured key
 * registry. On success, sets `c.set("auth", authContext)`.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { errorResponse } from "../types/error.js";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware. Returns 401 when the key is missing
 * or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      return c.json(errorResponse("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(errorResponse("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", identity: record.key, role: record.role });
    return next();
  };
}

/**
 * Create a permission guard middleware.
 *
 * Returns 403 if the authenticated role lacks the permission. Without an
 * auth context (unsecured mode) every request passes.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth !== undefined && !hasPermission(auth.role, permission)) {
      return c.json(
        errorResponse("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}
