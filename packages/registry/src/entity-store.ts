/**
 * Entity Store — Keyed storage for the registry's entity graph.
 *
 * Each create allocates the next id for its entity type, stores the record
 * and appends the id to its parent's index in one synchronous step. There is
 * no await between those steps, so no other operation can observe a record
 * without its index entry.
 *
 * Rules:
 * - Ids start at 1 and are never reused
 * - Index lists are append-only and ordered by creation
 * - Records are replaced wholesale; identity links never change
 */

import type {
  Alert,
  AlertId,
  Client,
  ClientId,
  Contract,
  ContractId,
  Sla,
  SlaId,
} from "@sla-registry/types";
import { isAlert, isClient, isContract, isSla } from "@sla-registry/types";
import { RegistryError } from "./types.js";
import type {
  AlertDraft,
  ClientDraft,
  ContractDraft,
  EntityCounters,
  EntityStoreSnapshot,
  SlaDraft,
} from "./types.js";

// =============================================================================
// Interface
// =============================================================================

export interface EntityStore {
  createClient(draft: ClientDraft): Client;
  createContract(draft: ContractDraft): Contract;
  createSla(draft: SlaDraft): Sla;
  createAlert(draft: AlertDraft): Alert;

  getClient(id: ClientId): Client | undefined;
  getContract(id: ContractId): Contract | undefined;
  getSla(id: SlaId): Sla | undefined;
  getAlert(id: AlertId): Alert | undefined;
  findContractByExternalId(externalId: string): Contract | undefined;

  clientContracts(id: ClientId): readonly ContractId[];
  contractSlas(id: ContractId): readonly SlaId[];
  slaAlerts(id: SlaId): readonly AlertId[];

  updateContract(contract: Contract): Contract;
  updateSla(sla: Sla): Sla;
  updateAlert(alert: Alert): Alert;

  listClients(): readonly Client[];
  listContracts(): readonly Contract[];
  listSlas(): readonly Sla[];
  listAlerts(): readonly Alert[];

  snapshot(): EntityStoreSnapshot;
}

// =============================================================================
// In-Memory Implementation
// =============================================================================

export class InMemoryEntityStore implements EntityStore {
  private readonly clients = new Map<ClientId, Client>();
  private readonly contracts = new Map<ContractId, Contract>();
  private readonly slas = new Map<SlaId, Sla>();
  private readonly alerts = new Map<AlertId, Alert>();

  private readonly contractsByClient = new Map<ClientId, ContractId[]>();
  private readonly slasByContract = new Map<ContractId, SlaId[]>();
  private readonly alertsBySla = new Map<SlaId, AlertId[]>();
  private readonly contractsByExternalId = new Map<string, ContractId>();

  private counters: EntityCounters = { client: 0, contract: 0, sla: 0, alert: 0 };

  // ───────────────────────────────────────────────────────────────────────
  // Create
  // ───────────────────────────────────────────────────────────────────────

  createClient(draft: ClientDraft): Client {
    const id = this.counters.client + 1;
    const client: Client = { ...draft, id };

    this.counters = { ...this.counters, client: id };
    this.clients.set(id, client);
    return client;
  }

  createContract(draft: ContractDraft): Contract {
    if (!this.clients.has(draft.clientId)) {
      throw new RegistryError(
        "INVALID_REFERENCE",
        `Client ${draft.clientId} does not exist`,
      );
    }
    if (draft.externalId !== null && this.contractsByExternalId.has(draft.externalId)) {
      throw new RegistryError(
        "ALREADY_EXISTS",
        `A contract with external id '${draft.externalId}' already exists`,
      );
    }

    const id = this.counters.contract + 1;
    const contract: Contract = { ...draft, id };

    this.counters = { ...this.counters, contract: id };
    this.contracts.set(id, contract);
    appendIndex(this.contractsByClient, contract.clientId, id);
    if (contract.externalId !== null) {
      this.contractsByExternalId.set(contract.externalId, id);
    }
    return contract;
  }

  createSla(draft: SlaDraft): Sla {
    if (!this.contracts.has(draft.contractId)) {
      throw new RegistryError(
        "INVALID_REFERENCE",
        `Contract ${draft.contractId} does not exist`,
      );
    }

    const id = this.counters.sla + 1;
    const sla: Sla = { ...draft, id };

    this.counters = { ...this.counters, sla: id };
    this.slas.set(id, sla);
    appendIndex(this.slasByContract, sla.contractId, id);
    return sla;
  }

  createAlert(draft: AlertDraft): Alert {
    if (!this.slas.has(draft.slaId)) {
      throw new RegistryError("INVALID_REFERENCE", `SLA ${draft.slaId} does not exist`);
    }

    const id = this.counters.alert + 1;
    const alert: Alert = { ...draft, id };

    this.counters = { ...this.counters, alert: id };
    this.alerts.set(id, alert);
    appendIndex(this.alertsBySla, alert.slaId, id);
    return alert;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Read
  // ───────────────────────────────────────────────────────────────────────

  getClient(id: ClientId): Client | undefined {
    return this.clients.get(id);
  }

  getContract(id: ContractId): Contract | undefined {
    return this.contracts.get(id);
  }

  getSla(id: SlaId): Sla | undefined {
    return this.slas.get(id);
  }

  getAlert(id: AlertId): Alert | undefined {
    return this.alerts.get(id);
  }

  findContractByExternalId(externalId: string): Contract | undefined {
    const id = this.contractsByExternalId.get(externalId);
    return id === undefined ? undefined : this.contracts.get(id);
  }

  clientContracts(id: ClientId): readonly ContractId[] {
    return [...(this.contractsByClient.get(id) ?? [])];
  }

  contractSlas(id: ContractId): readonly SlaId[] {
    return [...(this.slasByContract.get(id) ?? [])];
  }

  slaAlerts(id: SlaId): readonly AlertId[] {
    return [...(this.alertsBySla.get(id) ?? [])];
  }

  listClients(): readonly Client[] {
    return [...this.clients.values()];
  }

  listContracts(): readonly Contract[] {
    return [...this.contracts.values()];
  }

  listSlas(): readonly Sla[] {
    return [...this.slas.values()];
  }

  listAlerts(): readonly Alert[] {
    return [...this.alerts.values()];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Update
  // ───────────────────────────────────────────────────────────────────────

  updateContract(contract: Contract): Contract {
    const existing = this.contracts.get(contract.id);
    if (existing === undefined) {
      throw new RegistryError("NOT_FOUND", `Contract ${contract.id} not found`);
    }
    if (existing.clientId !== contract.clientId || existing.externalId !== contract.externalId) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `Contract ${contract.id} cannot change its client or external id`,
      );
    }
    this.contracts.set(contract.id, contract);
    return contract;
  }

  updateSla(sla: Sla): Sla {
    const existing = this.slas.get(sla.id);
    if (existing === undefined) {
      throw new RegistryError("NOT_FOUND", `SLA ${sla.id} not found`);
    }
    if (existing.contractId !== sla.contractId) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `SLA ${sla.id} cannot move to contract ${sla.contractId}`,
      );
    }
    this.slas.set(sla.id, sla);
    return sla;
  }

  updateAlert(alert: Alert): Alert {
    const existing = this.alerts.get(alert.id);
    if (existing === undefined) {
      throw new RegistryError("NOT_FOUND", `Alert ${alert.id} not found`);
    }
    if (existing.slaId !== alert.slaId) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `Alert ${alert.id} cannot move to SLA ${alert.slaId}`,
      );
    }
    this.alerts.set(alert.id, alert);
    return alert;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot / Restore
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): EntityStoreSnapshot {
    return {
      version: 1,
      counters: { ...this.counters },
      clients: this.listClients(),
      contracts: this.listContracts(),
      slas: this.listSlas(),
      alerts: this.listAlerts(),
    };
  }

  /**
   * Rebuild a store from a snapshot.
   *
   * Records are validated, children must reference existing parents, and
   * the counters must cover every stored id. The restored store continues
   * allocating after the stored counters.
   */
  static fromSnapshot(snapshot: EntityStoreSnapshot): InMemoryEntityStore {
    if (snapshot.version !== 1) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const store = new InMemoryEntityStore();

    for (const client of sortById(snapshot.clients)) {
      if (!isClient(client) || store.clients.has(client.id)) {
        throw new RegistryError(
          "INVALID_ARGUMENT",
          `Snapshot client ${String(client.id)} is malformed or duplicated`,
        );
      }
      store.clients.set(client.id, client);
    }

    for (const contract of sortById(snapshot.contracts)) {
      if (!isContract(contract) ||
        store.contracts.has(contract.id) ||
        !store.clients.has(contract.clientId)) {
        throw new RegistryError(
          "INVALID_ARGUMENT",
          `Snapshot contract ${String(contract.id)} is malformed, duplicated or orphaned`,
        );
      }
      store.contracts.set(contract.id, contract);
      appendIndex(store.contractsByClient, contract.clientId, contract.id);
      if (contract.externalId !== null) {
        store.contractsByExternalId.set(contract.externalId, contract.id);
      }
    }

    for (const sla of sortById(snapshot.slas)) {
      if (!isSla(sla) || store.slas.has(sla.id) || !store.contracts.has(sla.contractId)) {
        throw new RegistryError(
          "INVALID_ARGUMENT",
          `Snapshot SLA ${String(sla.id)} is malformed, duplicated or orphaned`,
        );
      }
      store.slas.set(sla.id, sla);
      appendIndex(store.slasByContract, sla.contractId, sla.id);
    }

    for (const alert of sortById(snapshot.alerts)) {
      if (!isAlert(alert) || store.alerts.has(alert.id) || !store.slas.has(alert.slaId)) {
        throw new RegistryError(
          "INVALID_ARGUMENT",
          `Snapshot alert ${String(alert.id)} is malformed, duplicated or orphaned`,
        );
      }
      store.alerts.set(alert.id, alert);
      appendIndex(store.alertsBySla, alert.slaId, alert.id);
    }

    const { counters } = snapshot;
    for (const kind of COUNTER_KINDS) {
      if (!isCounter(counters[kind])) {
        throw new RegistryError(
          "INVALID_ARGUMENT",
          `Snapshot counter '${kind}' must be a non-negative safe integer`,
        );
      }
    }
    if (
      counters.client < maxId(store.clients) ||
      counters.contract < maxId(store.contracts) ||
      counters.sla < maxId(store.slas) ||
      counters.alert < maxId(store.alerts)
    ) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        "Snapshot counters are behind the stored records",
      );
    }
    store.counters = { ...counters };

    return store;
  }
}

// =============================================================================
// Helpers
// =============================================================================

const COUNTER_KINDS: readonly (keyof EntityCounters)[] = ["client", "contract", "sla", "alert"];

function isCounter(value: unknown): boolean {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function appendIndex<K>(index: Map<K, number[]>, key: K, id: number): void {
  const ids = index.get(key);
  if (ids === undefined) {
    index.set(key, [id]);
  } else {
    ids.push(id);
  }
}

function sortById<T extends { readonly id: number }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.id - b.id);
}

function maxId(records: Map<number, unknown>): number {
  let max = 0;
  for (const id of records.keys()) {
    if (id > max) max = id;
  }
  return max;
}
