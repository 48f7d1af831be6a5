/**
 * SLA Types
 *
 * The entity graph of the registry: clients own contracts, contracts
 * carry SLAs, SLAs accumulate alerts.
 *
 * Rules:
 * - All records are readonly; the store replaces them on transition
 * - Identifiers are positive integers, allocated per entity type
 * - Timestamps are ISO 8601 strings (`null` while unset)
 */

// =============================================================================
// Identifiers
// =============================================================================

export type ClientId = number;
export type ContractId = number;
export type SlaId = number;
export type AlertId = number;

// =============================================================================
// Enumerations
// =============================================================================

/**
 * How an observed value is judged against a target.
 *
 * LT  observed <  target
 * LE  observed <= target
 * EQ  observed == target
 * NE  observed != target
 * GE  observed >= target
 * GT  observed >  target
 */
export type Comparator = "LT" | "LE" | "EQ" | "NE" | "GE" | "GT";

/** `archived` is reserved; no operation moves an SLA into or out of it. */
export type SlaStatus = "active" | "paused" | "archived";

export type AlertStatus = "open" | "acknowledged" | "resolved";

// =============================================================================
// Entities
// =============================================================================

export interface Client {
  readonly id: ClientId;
  readonly name: string;
  /** Opaque identity of the party that owns this client */
  readonly ownerRef: string;
  readonly active: boolean;
  readonly createdAt: string;
}

export interface Contract {
  readonly id: ContractId;
  readonly clientId: ClientId;
  /** Correlation id supplied by the upstream contract system */
  readonly externalId: string | null;
  /** Opaque pointer to the contract document (e.g. a content hash) */
  readonly documentRef: string;
  readonly active: boolean;
  readonly startAt: string | null;
  readonly endAt: string | null;
  readonly createdAt: string;
}

export interface Sla {
  readonly id: SlaId;
  readonly contractId: ContractId;
  readonly name: string;
  readonly description: string;
  readonly target: number;
  readonly comparator: Comparator;
  readonly status: SlaStatus;
  /** Declared observation window. Stored only; evaluation is single-sample. */
  readonly windowSeconds: number;
  readonly lastReportAt: string | null;
  readonly consecutiveBreaches: number;
  readonly totalBreaches: number;
  readonly totalPass: number;
  readonly createdAt: string;
}

export interface Alert {
  readonly id: AlertId;
  readonly slaId: SlaId;
  readonly createdAt: string;
  readonly status: AlertStatus;
  /** The note of the metric report that raised this alert */
  readonly reason: string;
  readonly acknowledgedBy: string | null;
  readonly resolvedBy: string | null;
  readonly resolutionNote: string | null;
}
