/**
 * @sla-registry/event-store — Event Catalog.
 *
 * A registry of known event types:
 * - Typed event definitions (type string → payload validator)
 * - Schema versions (bumped when a payload shape changes)
 * - Discovery by emitting subsystem
 */

import type { EventSource } from "@sla-registry/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "evaluation.sla.violated") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /**
   * Validate a payload against the current schema version.
   */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of domain event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "evaluation.sla.violated",
 *   version: 1,
 *   description: "A metric report breached its SLA",
 *   source: "evaluation",
 *   validate: (p) => typeof p === "object" && p !== null && "alertId" in p,
 * });
 *
 * catalog.assertValid("evaluation.sla.violated", payload);
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a different version
   * replaces the schema. Versions never go backwards.
   *
   * @throws CatalogError if the version is lower than the registered one
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);

    if (existing !== undefined) {
      if (existing.version === schema.version) {
        return;
      }
      if (schema.version < existing.version) {
        throw new CatalogError(
          `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
        );
      }
    }

    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * List all registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  /**
   * Like validate(), but throws with the reason.
   *
   * @throws CatalogError for unregistered types and invalid payloads
   */
  assertValid(eventType: string, payload: unknown): void {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    if (!schema.validate(payload)) {
      throw new CatalogError(
        `Payload does not match "${eventType}" v${schema.version}`,
      );
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
