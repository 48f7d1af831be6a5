/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { SlaRegistry } from "@sla-registry/registry";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the registry app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The registry every route operates on */
    registry: SlaRegistry;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}

/**
 * Environment of a handler that runs after `validateBody(schema)`.
 */
export interface BodyEnv<T> {
  Variables: {
    validatedBody: T;
  };
}
