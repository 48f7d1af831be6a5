/**
 * @sla-registry/event-store — Append-only signal log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and single-process hosts
 * - EventCatalog for payload validation
 * - SLA registry signal definitions (10 event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerErrorCallback,
  Subscription,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// SLA registry events
export { SLA_EVENTS, createSlaCatalog } from "./sla-events.js";
export type {
  SlaEventType,
  SlaEventPayloads,
  SlaSignal,
  NoveltyField,
  ClientRegisteredPayload,
  ContractCreatedPayload,
  ContractDocumentUpdatedPayload,
  SlaCreatedPayload,
  MetricReportedPayload,
  SlaViolatedPayload,
  AlertAcknowledgedPayload,
  AlertResolvedPayload,
  NoveltyAppliedPayload,
  SlaStatusChangedPayload,
} from "./sla-events.js";
