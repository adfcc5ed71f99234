/**
 * Hono environment shared by the app, its middleware and its routes.
 */

import type { VaultService } from "../services/vault-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** X-Request-Id, set by requestIdMiddleware */
    requestId: string;

    /** The single vault service of this deployment */
    service: VaultService;

    /** Resolved caller; set on /api/* by the auth middleware */
    auth: AuthContext;
  };
}
