/**
 * SlaRegistry — Top-level coordinator of the SLA registry.
 *
 * Composes:
 * - EntityStore (clients, contracts, SLAs, alerts)
 * - SignalEmitter (append-only signal log)
 * - Registration, MetricEvaluation, Novelties, AlertLifecycle
 *
 * Every mutating call first asks the Authorizer whether the actor holds
 * the capability for it. Queries are not gated.
 */

import type {
  Alert,
  AlertId,
  AlertStatus,
  Client,
  ClientId,
  Contract,
  ContractId,
  Sla,
  SlaId,
  SlaStatus,
} from "@sla-registry/types";
import { InMemoryEventStore, createSlaCatalog } from "@sla-registry/event-store";
import type { EventCatalog, EventStore, HandlerErrorCallback } from "@sla-registry/event-store";
import { AlertLifecycle } from "./alert-lifecycle.js";
import type { EntityStore } from "./entity-store.js";
import { InMemoryEntityStore } from "./entity-store.js";
import { MetricEvaluation } from "./evaluation.js";
import { Novelties } from "./novelties.js";
import { Registration } from "./registration.js";
import { SignalEmitter } from "./signals.js";
import { RegistryError } from "./types.js";
import type {
  Authorizer,
  Capability,
  Clock,
  ContractInput,
  ContractWithSlas,
  EntityStoreSnapshot,
  EvaluationOutcome,
  SlaDefinition,
  SlaParams,
} from "./types.js";

// =============================================================================
// Options
// =============================================================================

/**
 * Either bring an event store, or let the registry create an in-memory one
 * that reports subscriber failures to `onSignalError`.
 */
export type SignalLogOptions =
  | { readonly events: EventStore; readonly onSignalError?: never }
  | { readonly events?: undefined; readonly onSignalError?: HandlerErrorCallback };

export type SlaRegistryOptions = SignalLogOptions & {
  readonly store?: EntityStore;
  readonly catalog?: EventCatalog;
  readonly authorize?: Authorizer;
  readonly now?: Clock;
  /** Source of event and correlation ids */
  readonly newId?: () => string;
};

const allowAll: Authorizer = () => true;

const DEFAULT_ACTOR = "system";

// =============================================================================
// SlaRegistry
// =============================================================================

export class SlaRegistry {
  readonly events: EventStore;
  readonly catalog: EventCatalog;
  private readonly store: EntityStore;
  private readonly authorize: Authorizer;
  private readonly registration: Registration;
  private readonly evaluation: MetricEvaluation;
  private readonly novelties: Novelties;
  private readonly alerts: AlertLifecycle;

  constructor(options: SlaRegistryOptions = {}) {
    const now = options.now ?? (() => new Date());

    this.store = options.store ?? new InMemoryEntityStore();
    this.catalog = options.catalog ?? createSlaCatalog();
    this.events =
      options.events ??
      new InMemoryEventStore(
        options.onSignalError !== undefined ? { onHandlerError: options.onSignalError } : {},
      );
    this.authorize = options.authorize ?? allowAll;

    const signals = new SignalEmitter(this.events, this.catalog, now, options.newId);
    this.registration = new Registration(this.store, signals, now);
    this.evaluation = new MetricEvaluation(this.store, signals, now);
    this.novelties = new Novelties(this.store, signals);
    this.alerts = new AlertLifecycle(this.store, signals);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registration
  // ───────────────────────────────────────────────────────────────────────

  registerClient(name: string, ownerRef: string, actor: string = DEFAULT_ACTOR): Client {
    this.require(actor, "registration");
    return this.registration.registerClient(name, ownerRef, actor);
  }

  createContract(input: ContractInput, actor: string = DEFAULT_ACTOR): Contract {
    this.require(actor, "registration");
    return this.registration.createContract(input, actor);
  }

  createContractWithSlas(
    input: ContractInput,
    slas: readonly SlaDefinition[],
    actor: string = DEFAULT_ACTOR,
  ): ContractWithSlas {
    this.require(actor, "registration");
    return this.registration.createContractWithSlas(input, slas, actor);
  }

  addSla(contractId: ContractId, definition: SlaDefinition, actor: string = DEFAULT_ACTOR): Sla {
    this.require(actor, "registration");
    return this.registration.addSla(contractId, definition, actor);
  }

  updateContractDocument(
    contractId: ContractId,
    documentRef: string,
    actor: string = DEFAULT_ACTOR,
  ): Contract {
    this.require(actor, "registration");
    return this.registration.updateContractDocument(contractId, documentRef, actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Evaluation
  // ───────────────────────────────────────────────────────────────────────

  reportMetric(
    slaId: SlaId,
    observed: number,
    note: string,
    actor: string = DEFAULT_ACTOR,
  ): EvaluationOutcome {
    this.require(actor, "registration");
    return this.evaluation.reportMetric(slaId, observed, note, actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Novelties
  // ───────────────────────────────────────────────────────────────────────

  pauseSla(slaId: SlaId, reason: string, actor: string = DEFAULT_ACTOR): Sla {
    this.require(actor, "novelties");
    return this.novelties.pauseSla(slaId, reason, actor);
  }

  resumeSla(slaId: SlaId, reason: string, actor: string = DEFAULT_ACTOR): Sla {
    this.require(actor, "novelties");
    return this.novelties.resumeSla(slaId, reason, actor);
  }

  updateSlaTarget(
    slaId: SlaId,
    newTarget: number,
    reason: string,
    actor: string = DEFAULT_ACTOR,
  ): Sla {
    this.require(actor, "novelties");
    return this.novelties.updateSlaTarget(slaId, newTarget, reason, actor);
  }

  updateSlaParams(
    slaId: SlaId,
    params: SlaParams,
    reason: string,
    actor: string = DEFAULT_ACTOR,
  ): Sla {
    this.require(actor, "novelties");
    return this.novelties.updateSlaParams(slaId, params, reason, actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  acknowledgeAlert(alertId: AlertId, actor: string): Alert {
    this.require(actor, "operations");
    return this.alerts.acknowledge(alertId, actor);
  }

  resolveAlert(alertId: AlertId, actor: string, resolutionNote: string): Alert {
    this.require(actor, "operations");
    return this.alerts.resolve(alertId, actor, resolutionNote);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getClient(id: ClientId): Client {
    return found(this.store.getClient(id), `Client ${id}`);
  }

  getContract(id: ContractId): Contract {
    return found(this.store.getContract(id), `Contract ${id}`);
  }

  getContractByExternalId(externalId: string): Contract {
    return found(
      this.store.findContractByExternalId(externalId),
      `Contract with external id '${externalId}'`,
    );
  }

  getSla(id: SlaId): Sla {
    return found(this.store.getSla(id), `SLA ${id}`);
  }

  getAlert(id: AlertId): Alert {
    return found(this.store.getAlert(id), `Alert ${id}`);
  }

  getClientContracts(id: ClientId): readonly ContractId[] {
    this.getClient(id);
    return this.store.clientContracts(id);
  }

  getContractSlas(id: ContractId): readonly SlaId[] {
    this.getContract(id);
    return this.store.contractSlas(id);
  }

  getSlaAlerts(id: SlaId): readonly AlertId[] {
    this.getSla(id);
    return this.store.slaAlerts(id);
  }

  listClients(): readonly Client[] {
    return this.store.listClients();
  }

  listSlas(status?: SlaStatus): readonly Sla[] {
    const slas = this.store.listSlas();
    return status === undefined ? slas : slas.filter((s) => s.status === status);
  }

  listAlerts(status?: AlertStatus): readonly Alert[] {
    const alerts = this.store.listAlerts();
    return status === undefined ? alerts : alerts.filter((a) => a.status === status);
  }

  snapshot(): EntityStoreSnapshot {
    return this.store.snapshot();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private require(actor: string, capability: Capability): void {
    if (!this.authorize(actor, capability)) {
      throw new RegistryError(
        "UNAUTHORIZED",
        `'${actor}' lacks the '${capability}' capability`,
      );
    }
  }
}

function found<T>(record: T | undefined, label: string): T {
  if (record === undefined) {
    throw new RegistryError("NOT_FOUND", `${label} not found`);
  }
  return record;
}
