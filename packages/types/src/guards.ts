/**
 * Runtime Type Guards
 *
 * Narrowing functions for registry domain types.
 * Used at system boundaries (API inputs, restored snapshots).
 */

import type {
  Alert,
  AlertStatus,
  Client,
  Comparator,
  Contract,
  Sla,
  SlaStatus,
} from "./sla.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Helpers
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isEntityId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

function isCounter(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

// =============================================================================
// Enumeration guards
// =============================================================================

export const COMPARATORS: readonly Comparator[] = ["LT", "LE", "EQ", "NE", "GE", "GT"];
export const SLA_STATUSES: readonly SlaStatus[] = ["active", "paused", "archived"];
export const ALERT_STATUSES: readonly AlertStatus[] = ["open", "acknowledged", "resolved"];

const COMPARATOR_SET = new Set<string>(COMPARATORS);
const SLA_STATUS_SET = new Set<string>(SLA_STATUSES);
const ALERT_STATUS_SET = new Set<string>(ALERT_STATUSES);
const EVENT_SOURCES = new Set<string>(["registration", "evaluation", "novelties", "operations"]);

export function isComparator(value: unknown): value is Comparator {
  return typeof value === "string" && COMPARATOR_SET.has(value);
}

export function isSlaStatus(value: unknown): value is SlaStatus {
  return typeof value === "string" && SLA_STATUS_SET.has(value);
}

export function isAlertStatus(value: unknown): value is AlertStatus {
  return typeof value === "string" && ALERT_STATUS_SET.has(value);
}

// =============================================================================
// Entity guards
// =============================================================================

export function isClient(value: unknown): value is Client {
  if (!isRecord(value)) return false;
  return (
    isEntityId(value.id) &&
    typeof value.name === "string" &&
    typeof value.ownerRef === "string" &&
    typeof value.active === "boolean" &&
    typeof value.createdAt === "string"
  );
}

export function isContract(value: unknown): value is Contract {
  if (!isRecord(value)) return false;
  return (
    isEntityId(value.id) &&
    isEntityId(value.clientId) &&
    isNullableString(value.externalId) &&
    typeof value.documentRef === "string" &&
    typeof value.active === "boolean" &&
    isNullableString(value.startAt) &&
    isNullableString(value.endAt) &&
    typeof value.createdAt === "string"
  );
}

export function isSla(value: unknown): value is Sla {
  if (!isRecord(value)) return false;
  return (
    isEntityId(value.id) &&
    isEntityId(value.contractId) &&
    typeof value.name === "string" &&
    typeof value.description === "string" &&
    typeof value.target === "number" &&
    Number.isSafeInteger(value.target) &&
    isComparator(value.comparator) &&
    isSlaStatus(value.status) &&
    isCounter(value.windowSeconds) &&
    isNullableString(value.lastReportAt) &&
    isCounter(value.consecutiveBreaches) &&
    isCounter(value.totalBreaches) &&
    isCounter(value.totalPass) &&
    typeof value.createdAt === "string"
  );
}

export function isAlert(value: unknown): value is Alert {
  if (!isRecord(value)) return false;
  return (
    isEntityId(value.id) &&
    isEntityId(value.slaId) &&
    typeof value.createdAt === "string" &&
    isAlertStatus(value.status) &&
    typeof value.reason === "string" &&
    isNullableString(value.acknowledgedBy) &&
    isNullableString(value.resolvedBy) &&
    isNullableString(value.resolutionNote)
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
