/**
 * Argument checks shared by the workflows. Each throws INVALID_ARGUMENT.
 */

import type { Comparator } from "@sla-registry/types";
import { isComparator } from "@sla-registry/types";
import { RegistryError } from "./types.js";

export function requireInteger(value: number, field: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new RegistryError("INVALID_ARGUMENT", `${field} must be a safe integer, got ${value}`);
  }
  return value;
}

export function requireNonNegativeInteger(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RegistryError(
      "INVALID_ARGUMENT",
      `${field} must be a non-negative safe integer, got ${value}`,
    );
  }
  return value;
}

export function requireComparator(value: unknown): Comparator {
  if (!isComparator(value)) {
    throw new RegistryError("INVALID_ARGUMENT", `Unknown comparator: ${String(value)}`);
  }
  return value;
}

/**
 * Normalize an optional timestamp to ISO 8601, or `null` when absent.
 */
export function optionalTimestamp(value: string | undefined, field: string): string | null {
  if (value === undefined) return null;
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new RegistryError("INVALID_ARGUMENT", `${field} is not a valid timestamp: '${value}'`);
  }
  return new Date(time).toISOString();
}
