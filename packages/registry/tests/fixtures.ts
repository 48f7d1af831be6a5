/**
 * Shared test fixtures: a fixed clock, predictable ids and a registry
 * wired to both.
 */

import { SlaRegistry } from "../src/sla-registry.js";
import type { SlaRegistryOptions } from "../src/sla-registry.js";
import { RegistryError } from "../src/types.js";
import type { RegistryErrorCode, SlaDefinition } from "../src/types.js";

export const NOW = "2026-03-01T12:00:00.000Z";

export function fixedClock(iso: string = NOW): () => Date {
  return () => new Date(iso);
}

export function sequentialIds(prefix = "id"): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `${prefix}-${n}`;
  };
}

export function newRegistry(options: SlaRegistryOptions = {}): SlaRegistry {
  return new SlaRegistry({ now: fixedClock(), newId: sequentialIds(), ...options });
}

export function eventTypes(registry: SlaRegistry): string[] {
  return registry.events.readAll().map((stored) => stored.event.type);
}

export const deliveryWithin24h: SlaDefinition = {
  name: "Delivery <= 24h",
  target: 24,
  comparator: "LE",
  windowSeconds: 86400,
};

export const uptimeAtLeast95: SlaDefinition = {
  name: "Uptime >= 95%",
  target: 95,
  comparator: "GE",
};

/** Run `fn` and return the code of the RegistryError it throws. */
export function errorCode(fn: () => unknown): RegistryErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof RegistryError) return error.code;
    throw error;
  }
  return undefined;
}
