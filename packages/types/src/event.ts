/**
 * Event Types
 *
 * Every state transition in the registry is announced as a DomainEvent.
 * External systems (notification dispatch, ticketing) subscribe to them.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Events describe what happened; they never drive the state machine
 */

/**
 * The workflow that emitted an event.
 */
export type EventSource =
  | "registration"
  | "evaluation"
  | "novelties"
  | "operations";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** Groups the events emitted by one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "evaluation.sla.violated") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
