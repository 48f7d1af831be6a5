/**
 * Path and query parsing shared by the route modules.
 *
 * Failures throw an HTTPException carrying a VALIDATION_ERROR envelope,
 * which the error handler returns as-is.
 */

import { HTTPException } from "hono/http-exception";
import type { ZodTypeAny, output } from "zod";
import { IdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function validationError(
  message: string,
  details?: Record<string, unknown>,
): HTTPException {
  const res = new Response(
    JSON.stringify(createErrorEnvelope("VALIDATION_ERROR", message, details)),
    { status: 400, headers: { "Content-Type": "application/json" } },
  );
  return new HTTPException(400, { res });
}

/** Parse a positive integer entity id from a path segment. */
export function parseId(raw: string | undefined, name: string = "id"): number {
  const parsed = IdParamSchema.safeParse(raw);
  if (!parsed.success) {
    throw validationError(`Path parameter '${name}' must be a positive integer`);
  }
  return parsed.data;
}

export function parseQuery<S extends ZodTypeAny>(
  schema: S,
  query: Record<string, string>,
): output<S> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw validationError("Invalid query parameters", {
      issues: formatZodErrors(parsed.error),
    });
  }
  return parsed.data;
}
