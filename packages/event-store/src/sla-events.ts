/**
 * @sla-registry/event-store — SLA Registry Domain Event Definitions.
 *
 * The catalog of every signal the registry emits.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 * Examples:
 * - registry.contract.created
 * - evaluation.sla.violated
 * - operations.alert.resolved
 */

import type {
  AlertId,
  ClientId,
  Comparator,
  ContractId,
  SlaId,
  SlaStatus,
} from "@sla-registry/types";
import { isComparator, isSlaStatus } from "@sla-registry/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Registration Events
// =============================================================================

export type ClientRegisteredPayload = {
  readonly clientId: ClientId;
  readonly name: string;
};

export type ContractCreatedPayload = {
  readonly contractId: ContractId;
  readonly clientId: ClientId;
  readonly externalId: string | null;
  readonly documentRef: string;
  readonly slaCount: number;
};

export type ContractDocumentUpdatedPayload = {
  readonly contractId: ContractId;
  readonly documentRef: string;
};

export type SlaCreatedPayload = {
  readonly slaId: SlaId;
  readonly contractId: ContractId;
  readonly name: string;
  readonly target: number;
  readonly comparator: Comparator;
  readonly windowSeconds: number;
};

// =============================================================================
// Evaluation Events
// =============================================================================

export type MetricReportedPayload = {
  readonly slaId: SlaId;
  readonly observed: number;
  readonly success: boolean;
  readonly note: string;
};

export type SlaViolatedPayload = {
  readonly alertId: AlertId;
  readonly slaId: SlaId;
  readonly reason: string;
};

// =============================================================================
// Operations Events
// =============================================================================

export type AlertAcknowledgedPayload = {
  readonly alertId: AlertId;
  readonly actor: string;
};

export type AlertResolvedPayload = {
  readonly alertId: AlertId;
  readonly actor: string;
  readonly resolutionNote: string;
};

// =============================================================================
// Novelty Events
// =============================================================================

/** Which SLA field(s) a novelty touched. */
export type NoveltyField = "status" | "target" | "comparator|window";

export type NoveltyAppliedPayload = {
  readonly slaId: SlaId;
  readonly field: NoveltyField;
  readonly detail: string;
};

export type SlaStatusChangedPayload = {
  readonly slaId: SlaId;
  readonly newStatus: SlaStatus;
};

// =============================================================================
// Event Type Constants
// =============================================================================

export const SLA_EVENTS = {
  // Registration
  CLIENT_REGISTERED: "registry.client.registered",
  CONTRACT_CREATED: "registry.contract.created",
  CONTRACT_DOCUMENT_UPDATED: "registry.contract.document-updated",
  SLA_CREATED: "registry.sla.created",

  // Evaluation
  METRIC_REPORTED: "evaluation.metric.reported",
  SLA_VIOLATED: "evaluation.sla.violated",

  // Operations
  ALERT_ACKNOWLEDGED: "operations.alert.acknowledged",
  ALERT_RESOLVED: "operations.alert.resolved",

  // Novelties
  NOVELTY_APPLIED: "novelties.sla.applied",
  SLA_STATUS_CHANGED: "novelties.sla.status-changed",
} as const;

export type SlaEventType = (typeof SLA_EVENTS)[keyof typeof SLA_EVENTS];

/**
 * Payload shape for each event type.
 */
export interface SlaEventPayloads {
  "registry.client.registered": ClientRegisteredPayload;
  "registry.contract.created": ContractCreatedPayload;
  "registry.contract.document-updated": ContractDocumentUpdatedPayload;
  "registry.sla.created": SlaCreatedPayload;
  "evaluation.metric.reported": MetricReportedPayload;
  "evaluation.sla.violated": SlaViolatedPayload;
  "operations.alert.acknowledged": AlertAcknowledgedPayload;
  "operations.alert.resolved": AlertResolvedPayload;
  "novelties.sla.applied": NoveltyAppliedPayload;
  "novelties.sla.status-changed": SlaStatusChangedPayload;
}

/**
 * A registry signal before metadata is attached: an event type paired with
 * the payload that type requires.
 */
export type SlaSignal = {
  [K in SlaEventType]: { readonly type: K; readonly payload: SlaEventPayloads[K] };
}[SlaEventType];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasId(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "number" && Number.isSafeInteger(value);
}

const NOVELTY_FIELDS = new Set<string>(["status", "target", "comparator|window"]);

const REGISTRATION_SCHEMAS: readonly EventSchema[] = [
  {
    type: SLA_EVENTS.CLIENT_REGISTERED,
    version: 1,
    description: "A client was registered",
    source: "registration",
    validate: (p) => isObject(p) && hasId(p, "clientId") && hasString(p, "name"),
  },
  {
    type: SLA_EVENTS.CONTRACT_CREATED,
    version: 1,
    description: "A contract was created under an active client",
    source: "registration",
    validate: (p) =>
      isObject(p) &&
      hasId(p, "contractId") &&
      hasId(p, "clientId") &&
      (p.externalId === null || hasString(p, "externalId")) &&
      hasString(p, "documentRef") &&
      hasInteger(p, "slaCount"),
  },
  {
    type: SLA_EVENTS.CONTRACT_DOCUMENT_UPDATED,
    version: 1,
    description: "A contract's document reference was replaced",
    source: "registration",
    validate: (p) => isObject(p) && hasId(p, "contractId") && hasString(p, "documentRef"),
  },
  {
    type: SLA_EVENTS.SLA_CREATED,
    version: 1,
    description: "An SLA was attached to an active contract",
    source: "registration",
    validate: (p) =>
      isObject(p) &&
      hasId(p, "slaId") &&
      hasId(p, "contractId") &&
      hasString(p, "name") &&
      hasInteger(p, "target") &&
      isComparator(p.comparator) &&
      hasInteger(p, "windowSeconds"),
  },
];

const EVALUATION_SCHEMAS: readonly EventSchema[] = [
  {
    type: SLA_EVENTS.METRIC_REPORTED,
    version: 1,
    description: "A metric observation was evaluated against its SLA",
    source: "evaluation",
    validate: (p) =>
      isObject(p) &&
      hasId(p, "slaId") &&
      hasInteger(p, "observed") &&
      typeof p.success === "boolean" &&
      hasString(p, "note"),
  },
  {
    type: SLA_EVENTS.SLA_VIOLATED,
    version: 1,
    description: "A metric observation breached its SLA and raised an alert",
    source: "evaluation",
    validate: (p) =>
      isObject(p) && hasId(p, "alertId") && hasId(p, "slaId") && hasString(p, "reason"),
  },
];

const OPERATIONS_SCHEMAS: readonly EventSchema[] = [
  {
    type: SLA_EVENTS.ALERT_ACKNOWLEDGED,
    version: 1,
    description: "An open alert was acknowledged by an operator",
    source: "operations",
    validate: (p) => isObject(p) && hasId(p, "alertId") && hasString(p, "actor"),
  },
  {
    type: SLA_EVENTS.ALERT_RESOLVED,
    version: 1,
    description: "An alert was resolved",
    source: "operations",
    validate: (p) =>
      isObject(p) &&
      hasId(p, "alertId") &&
      hasString(p, "actor") &&
      hasString(p, "resolutionNote"),
  },
];

const NOVELTY_SCHEMAS: readonly EventSchema[] = [
  {
    type: SLA_EVENTS.NOVELTY_APPLIED,
    version: 1,
    description: "An SLA was adjusted outside the reporting flow",
    source: "novelties",
    validate: (p) =>
      isObject(p) &&
      hasId(p, "slaId") &&
      typeof p.field === "string" &&
      NOVELTY_FIELDS.has(p.field) &&
      hasString(p, "detail"),
  },
  {
    type: SLA_EVENTS.SLA_STATUS_CHANGED,
    version: 1,
    description: "An SLA moved between active and paused",
    source: "novelties",
    validate: (p) => isObject(p) && hasId(p, "slaId") && isSlaStatus(p.newStatus),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every registry signal registered at version 1.
 */
export function createSlaCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  const allSchemas = [
    ...REGISTRATION_SCHEMAS,
    ...EVALUATION_SCHEMAS,
    ...OPERATIONS_SCHEMAS,
    ...NOVELTY_SCHEMAS,
  ];

  for (const schema of allSchemas) {
    catalog.register(schema);
  }

  return catalog;
}
