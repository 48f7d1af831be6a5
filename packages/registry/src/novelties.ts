/**
 * Novelties — Adjustments to an SLA outside the reporting flow.
 *
 * Pausing stops evaluation; resuming restarts it. Target and comparator
 * changes take effect from the next report and leave the counters alone.
 */

import type { Comparator, Sla, SlaId, SlaStatus } from "@sla-registry/types";
import { SLA_EVENTS } from "@sla-registry/event-store";
import type { NoveltyField } from "@sla-registry/event-store";
import type { EntityStore } from "./entity-store.js";
import type { SignalEmitter } from "./signals.js";
import { streams } from "./signals.js";
import { RegistryError } from "./types.js";
import type { SlaParams } from "./types.js";
import { requireComparator, requireInteger, requireNonNegativeInteger } from "./validation.js";

export class Novelties {
  private readonly store: EntityStore;
  private readonly signals: SignalEmitter;

  constructor(store: EntityStore, signals: SignalEmitter) {
    this.store = store;
    this.signals = signals;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Status
  // ───────────────────────────────────────────────────────────────────────

  pauseSla(slaId: SlaId, reason: string, actor: string): Sla {
    const sla = this.store.getSla(slaId);
    if (sla === undefined || sla.status !== "active") {
      throw new RegistryError("SLA_NOT_ACTIVE", `SLA ${slaId} is not active`);
    }
    return this.changeStatus(sla, "paused", reason, actor);
  }

  resumeSla(slaId: SlaId, reason: string, actor: string): Sla {
    const sla = this.store.getSla(slaId);
    if (sla === undefined || sla.status !== "paused") {
      throw new RegistryError("SLA_NOT_PAUSED", `SLA ${slaId} is not paused`);
    }
    return this.changeStatus(sla, "active", reason, actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Terms
  // ───────────────────────────────────────────────────────────────────────

  /** Allowed in any status. */
  updateSlaTarget(slaId: SlaId, newTarget: number, reason: string, actor: string): Sla {
    const sla = this.requireSla(slaId);
    const target = requireInteger(newTarget, "target");

    const updated = this.store.updateSla({ ...sla, target });
    this.announce(updated.id, "target", reason, actor);
    return updated;
  }

  updateSlaParams(slaId: SlaId, params: SlaParams, reason: string, actor: string): Sla {
    const sla = this.requireSla(slaId);
    const comparator: Comparator = requireComparator(params.comparator);
    const windowSeconds = requireNonNegativeInteger(params.windowSeconds, "windowSeconds");

    const updated = this.store.updateSla({ ...sla, comparator, windowSeconds });
    this.announce(updated.id, "comparator|window", reason, actor);
    return updated;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requireSla(slaId: SlaId): Sla {
    const sla = this.store.getSla(slaId);
    if (sla === undefined) {
      throw new RegistryError("NOT_FOUND", `SLA ${slaId} not found`);
    }
    return sla;
  }

  private changeStatus(sla: Sla, status: SlaStatus, reason: string, actor: string): Sla {
    const updated = this.store.updateSla({ ...sla, status });

    this.signals
      .batch(actor, "novelties")
      .add(streams.sla(sla.id), {
        type: SLA_EVENTS.SLA_STATUS_CHANGED,
        payload: { slaId: sla.id, newStatus: status },
      })
      .add(streams.sla(sla.id), {
        type: SLA_EVENTS.NOVELTY_APPLIED,
        payload: { slaId: sla.id, field: "status", detail: reason },
      })
      .publish();

    return updated;
  }

  private announce(slaId: SlaId, field: NoveltyField, reason: string, actor: string): void {
    this.signals
      .batch(actor, "novelties")
      .add(streams.sla(slaId), {
        type: SLA_EVENTS.NOVELTY_APPLIED,
        payload: { slaId, field, detail: reason },
      })
      .publish();
  }
}
