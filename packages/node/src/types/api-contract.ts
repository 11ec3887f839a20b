/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { VaultService } from "../services/vault-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vault service backing every route */
    service: VaultService;

    /** Authentication context (set by auth middleware, absent in unsecured mode) */
    auth: AuthContext | undefined;
  };
}
