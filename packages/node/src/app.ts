/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can drive the app through
 * `app.request` without starting an HTTP server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { AuthContext } from "./types/auth.js";
import { RegistryService } from "./services/registry-service.js";
import type { RegistryServiceOptions } from "./services/registry-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createClientRoutes } from "./routes/clients.js";
import { createContractRoutes } from "./routes/contracts.js";
import { createSlaRoutes } from "./routes/slas.js";
import { createAlertRoutes } from "./routes/alerts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service?: RegistryServiceOptions;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Sees every error answered with a 500 */
  readonly onUnexpectedError?: (err: Error, c: Context<AppEnv>) => void;
  /** Auth configuration. When provided, auth middleware is enabled. */
  readonly auth?: AuthConfig;
}

/** Identity used for every request when auth is disabled. */
export const ANONYMOUS_ADMIN: AuthContext = {
  type: "anonymous",
  identity: "anonymous",
  role: "admin",
};

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RegistryService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new RegistryService(options.service);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onUnexpectedError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): every caller acts as admin
    app.use("/api/*", async (c, next) => {
      c.set("auth", ANONYMOUS_ADMIN);
      await next();
    });
  }

  app.use("/api/*", async (c, next) => {
    c.set("registry", service.registry);
    await next();
  });

  app.route("/api/v1/clients", createClientRoutes());
  app.route("/api/v1/contracts", createContractRoutes());
  app.route("/api/v1/slas", createSlaRoutes());
  app.route("/api/v1/alerts", createAlertRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
