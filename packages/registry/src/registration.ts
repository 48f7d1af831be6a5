/**
 * Registration — Clients, contracts and the SLAs attached to them.
 *
 * Rules:
 * - A contract requires an existing, active client
 * - An SLA requires an existing, active contract
 * - Every argument is checked before anything is written
 * - New SLAs start active with zeroed counters
 */

import type { Client, ClientId, Contract, ContractId, Sla } from "@sla-registry/types";
import { SLA_EVENTS } from "@sla-registry/event-store";
import type { EntityStore } from "./entity-store.js";
import type { SignalBatch, SignalEmitter } from "./signals.js";
import { streams } from "./signals.js";
import { RegistryError } from "./types.js";
import type { Clock, ContractInput, ContractWithSlas, SlaDefinition } from "./types.js";
import {
  optionalTimestamp,
  requireComparator,
  requireInteger,
  requireNonNegativeInteger,
} from "./validation.js";

type SlaTerms = Pick<Sla, "name" | "description" | "target" | "comparator" | "windowSeconds">;

interface ContractTerms {
  readonly clientId: ClientId;
  readonly externalId: string | null;
  readonly documentRef: string;
  readonly startAt: string | null;
  readonly endAt: string | null;
}

export class Registration {
  private readonly store: EntityStore;
  private readonly signals: SignalEmitter;
  private readonly now: Clock;

  constructor(store: EntityStore, signals: SignalEmitter, now: Clock) {
    this.store = store;
    this.signals = signals;
    this.now = now;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Clients
  // ───────────────────────────────────────────────────────────────────────

  registerClient(name: string, ownerRef: string, actor: string): Client {
    const client = this.store.createClient({
      name,
      ownerRef,
      active: true,
      createdAt: this.now().toISOString(),
    });

    this.signals
      .batch(actor, "registration")
      .add(streams.client(client.id), {
        type: SLA_EVENTS.CLIENT_REGISTERED,
        payload: { clientId: client.id, name: client.name },
      })
      .publish();

    return client;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Contracts
  // ───────────────────────────────────────────────────────────────────────

  createContract(input: ContractInput, actor: string): Contract {
    return this.createContractWithSlas(input, [], actor).contract;
  }

  /**
   * Create a contract together with its SLAs.
   *
   * The client and every definition are checked first; on success the
   * contract and its SLAs receive consecutive ids in list order.
   */
  createContractWithSlas(
    input: ContractInput,
    definitions: readonly SlaDefinition[],
    actor: string,
  ): ContractWithSlas {
    const terms = this.checkContract(input);
    const slaTerms = definitions.map((definition) => checkSlaDefinition(definition));

    const createdAt = this.now().toISOString();
    const contract = this.store.createContract({ ...terms, active: true, createdAt });
    const slas = slaTerms.map((sla) => this.store.createSla(newSla(contract.id, sla, createdAt)));

    const batch = this.signals.batch(actor, "registration");
    batch.add(streams.contract(contract.id), {
      type: SLA_EVENTS.CONTRACT_CREATED,
      payload: {
        contractId: contract.id,
        clientId: contract.clientId,
        externalId: contract.externalId,
        documentRef: contract.documentRef,
        slaCount: slas.length,
      },
    });
    for (const sla of slas) {
      addSlaCreated(batch, sla);
    }
    batch.publish();

    return { contract, slas };
  }

  updateContractDocument(contractId: ContractId, documentRef: string, actor: string): Contract {
    const contract = this.store.getContract(contractId);
    if (contract === undefined) {
      throw new RegistryError("INVALID_REFERENCE", `Contract ${contractId} does not exist`);
    }

    const updated = this.store.updateContract({ ...contract, documentRef });

    this.signals
      .batch(actor, "registration")
      .add(streams.contract(contractId), {
        type: SLA_EVENTS.CONTRACT_DOCUMENT_UPDATED,
        payload: { contractId, documentRef },
      })
      .publish();

    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // SLAs
  // ───────────────────────────────────────────────────────────────────────

  addSla(contractId: ContractId, definition: SlaDefinition, actor: string): Sla {
    const contract = this.store.getContract(contractId);
    if (contract === undefined || !contract.active) {
      throw new RegistryError(
        "INVALID_REFERENCE",
        `Contract ${contractId} does not exist or is inactive`,
      );
    }
    const terms = checkSlaDefinition(definition);

    const sla = this.store.createSla(newSla(contractId, terms, this.now().toISOString()));

    addSlaCreated(this.signals.batch(actor, "registration"), sla).publish();

    return sla;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private checkContract(input: ContractInput): ContractTerms {
    const client = this.store.getClient(input.clientId);
    if (client === undefined || !client.active) {
      throw new RegistryError(
        "INVALID_REFERENCE",
        `Client ${input.clientId} does not exist or is inactive`,
      );
    }

    const externalId = input.externalId ?? null;
    if (externalId !== null && this.store.findContractByExternalId(externalId) !== undefined) {
      throw new RegistryError(
        "ALREADY_EXISTS",
        `A contract with external id '${externalId}' already exists`,
      );
    }

    const startAt = optionalTimestamp(input.startAt, "startAt");
    const endAt = optionalTimestamp(input.endAt, "endAt");
    if (startAt !== null && endAt !== null && endAt < startAt) {
      throw new RegistryError("INVALID_ARGUMENT", `endAt ${endAt} is before startAt ${startAt}`);
    }

    return {
      clientId: client.id,
      externalId,
      documentRef: input.documentRef,
      startAt,
      endAt,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function checkSlaDefinition(definition: SlaDefinition): SlaTerms {
  return {
    name: definition.name,
    description: definition.description ?? "",
    target: requireInteger(definition.target, "target"),
    comparator: requireComparator(definition.comparator),
    windowSeconds: requireNonNegativeInteger(definition.windowSeconds ?? 0, "windowSeconds"),
  };
}

function newSla(contractId: ContractId, terms: SlaTerms, createdAt: string): Omit<Sla, "id"> {
  return {
    ...terms,
    contractId,
    status: "active",
    lastReportAt: null,
    consecutiveBreaches: 0,
    totalBreaches: 0,
    totalPass: 0,
    createdAt,
  };
}

function addSlaCreated(batch: SignalBatch, sla: Sla): SignalBatch {
  return batch.add(streams.sla(sla.id), {
    type: SLA_EVENTS.SLA_CREATED,
    payload: {
      slaId: sla.id,
      contractId: sla.contractId,
      name: sla.name,
      target: sla.target,
      comparator: sla.comparator,
      windowSeconds: sla.windowSeconds,
    },
  });
}
