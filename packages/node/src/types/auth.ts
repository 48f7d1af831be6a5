/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Each role maps onto the registry capabilities it may exercise.
 */

import type { Capability } from "@sla-registry/registry";

// =============================================================================
// Roles & Capabilities
// =============================================================================

export type Role = "admin" | "contract-service" | "novelties-service" | "operations";

export const ROLES: readonly Role[] = [
  "admin",
  "contract-service",
  "novelties-service",
  "operations",
];

/** Which capabilities each role grants */
export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  admin: ["registration", "novelties", "operations"],
  "contract-service": ["registration"],
  "novelties-service": ["novelties"],
  operations: ["operations"],
};

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Check whether a role grants a specific capability.
 */
export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 *
 * `identity` is passed to the registry as the actor of every mutation.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "anonymous";
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly name: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
