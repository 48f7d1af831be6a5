/**
 * @sla-registry/registry — SLA registry and breach-detection engine.
 *
 * Tracks clients, contracts and their SLA terms, evaluates metric
 * observations against each SLA's threshold rule and raises alerts
 * on breach.
 *
 * Four workflows:
 * - Registration: clients, contracts, SLAs
 * - Evaluation: metric reports, counters, alert creation
 * - Novelties: pause, resume, re-tune
 * - Operations: alert acknowledge / resolve
 *
 * Design rules:
 * - Preconditions are checked before the first write
 * - Records are replaced wholesale; ids are never reused
 * - Every transition is announced as a signal after it commits
 */

// Top-level registry
export { SlaRegistry } from "./sla-registry.js";
export type { SlaRegistryOptions, SignalLogOptions } from "./sla-registry.js";

// Workflows
export { Registration } from "./registration.js";
export { MetricEvaluation } from "./evaluation.js";
export { Novelties } from "./novelties.js";
export { AlertLifecycle, canTransition } from "./alert-lifecycle.js";

// Building blocks
export { evaluate, describeComparator, describeRule } from "./comparator.js";
export { InMemoryEntityStore } from "./entity-store.js";
export type { EntityStore } from "./entity-store.js";
export { SignalBatch, SignalEmitter, streams } from "./signals.js";
export type { SignalContext } from "./signals.js";

// Types
export { RegistryError } from "./types.js";
export type {
  RegistryErrorCode,
  Capability,
  Authorizer,
  Clock,
  ContractInput,
  SlaDefinition,
  SlaParams,
  EvaluationOutcome,
  ContractWithSlas,
  ClientDraft,
  ContractDraft,
  SlaDraft,
  AlertDraft,
  EntityCounters,
  EntityStoreSnapshot,
} from "./types.js";
