/**
 * @sla-registry/types — Shared domain types for the SLA registry.
 *
 * These types are used across all packages:
 * - Entity records (Client, Contract, Sla, Alert) and their identifiers
 * - Comparator and status enumerations
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// SLA entity types
export type {
  ClientId,
  ContractId,
  SlaId,
  AlertId,
  Comparator,
  SlaStatus,
  AlertStatus,
  Client,
  Contract,
  Sla,
  Alert,
} from "./sla.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  COMPARATORS,
  SLA_STATUSES,
  ALERT_STATUSES,
  isComparator,
  isSlaStatus,
  isAlertStatus,
  isClient,
  isContract,
  isSla,
  isAlert,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
