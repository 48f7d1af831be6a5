/**
 * Registry Types
 *
 * Inputs, outcomes and errors for the SLA registry engine.
 *
 * Design:
 * - Every operation fails with a RegistryError carrying a stable code
 * - A failing operation leaves every record and the signal log untouched
 * - Authorization is a predicate supplied by the host, never an ACL
 */

import type {
  Alert,
  Client,
  Comparator,
  Contract,
  Sla,
} from "@sla-registry/types";

// =============================================================================
// Error
// =============================================================================

export type RegistryErrorCode =
  | "INVALID_REFERENCE"
  | "SLA_NOT_ACTIVE"
  | "SLA_NOT_PAUSED"
  | "ALERT_NOT_OPEN"
  | "ALERT_NOT_RESOLVABLE"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_ARGUMENT"
  | "UNAUTHORIZED";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

// =============================================================================
// Authorization
// =============================================================================

/**
 * The three operator roles of the registry, expressed as what they may do.
 *
 * - registration: clients, contracts, SLAs and metric reports
 * - novelties: pause, resume and re-tune SLAs
 * - operations: acknowledge and resolve alerts
 */
export type Capability = "registration" | "novelties" | "operations";

export type Authorizer = (caller: string, capability: Capability) => boolean;

/** Clock used for every timestamp the registry writes. */
export type Clock = () => Date;

// =============================================================================
// Inputs
// =============================================================================

export interface ContractInput {
  readonly clientId: number;
  readonly documentRef: string;
  readonly externalId?: string;
  readonly startAt?: string;
  readonly endAt?: string;
}

export interface SlaDefinition {
  readonly name: string;
  readonly description?: string;
  readonly target: number;
  readonly comparator: Comparator;
  readonly windowSeconds?: number;
}

export interface SlaParams {
  readonly comparator: Comparator;
  readonly windowSeconds: number;
}

// =============================================================================
// Outcomes
// =============================================================================

export interface EvaluationOutcome {
  readonly success: boolean;
  /** The SLA after its counters were updated */
  readonly sla: Sla;
  /** The alert raised by a failing evaluation, `null` on success */
  readonly alert: Alert | null;
}

export interface ContractWithSlas {
  readonly contract: Contract;
  readonly slas: readonly Sla[];
}

// =============================================================================
// Store drafts & snapshots
// =============================================================================

export type ClientDraft = Omit<Client, "id">;
export type ContractDraft = Omit<Contract, "id">;
export type SlaDraft = Omit<Sla, "id">;
export type AlertDraft = Omit<Alert, "id">;

export interface EntityCounters {
  readonly client: number;
  readonly contract: number;
  readonly sla: number;
  readonly alert: number;
}

/**
 * Serializable state of an entity store.
 *
 * Counters hold the last id issued per entity type; indexes are rebuilt
 * from the records on restore.
 */
export interface EntityStoreSnapshot {
  readonly version: 1;
  readonly counters: EntityCounters;
  readonly clients: readonly Client[];
  readonly contracts: readonly Contract[];
  readonly slas: readonly Sla[];
  readonly alerts: readonly Alert[];
}
