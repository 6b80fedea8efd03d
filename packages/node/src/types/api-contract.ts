/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { NavService } from "../services/nav-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set by the app factory) */
    service: NavService;

    /** Authenticated caller; absent on anonymous reads */
    auth: AuthContext | undefined;
  };
}
