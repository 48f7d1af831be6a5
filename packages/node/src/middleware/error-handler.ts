/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Registry errors keep their code and map to an HTTP status; anything
 * unexpected answers 500 without leaking its message.
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { RegistryError } from "@sla-registry/registry";
import type { RegistryErrorCode } from "@sla-registry/registry";
import { EventStoreError } from "@sla-registry/event-store";
import type { EventStoreErrorCode } from "@sla-registry/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

export const STATUS_MAP: Record<RegistryErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  INVALID_REFERENCE: 422,
  INVALID_ARGUMENT: 400,
  ALREADY_EXISTS: 409,
  SLA_NOT_ACTIVE: 409,
  SLA_NOT_PAUSED: 409,
  ALERT_NOT_OPEN: 409,
  ALERT_NOT_RESOLVABLE: 409,
  UNAUTHORIZED: 403,
};

/** Event store codes a request can provoke; the rest are server faults. */
const EVENT_STORE_STATUS: Partial<Record<EventStoreErrorCode, ErrorStatus>> = {
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Build the app's onError handler.
 *
 * `onUnexpected` sees every error that ends up as a 500.
 */
export function createErrorHandler(
  onUnexpected?: (err: Error, c: Context<AppEnv>) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof RegistryError) {
      return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
    }

    if (err instanceof EventStoreError) {
      const status = EVENT_STORE_STATUS[err.code];
      if (status !== undefined) {
        return c.json(createErrorEnvelope(err.code, err.message), status);
      }
    }

    onUnexpected?.(err, c);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}

/** Error handler without a hook for unexpected failures. */
export const handleError: ErrorHandler<AppEnv> = createErrorHandler();
