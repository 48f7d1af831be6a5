/**
 * Metric Evaluation — Judges observations and raises alerts on breach.
 *
 * Each report updates the SLA's counters exactly once:
 * - pass: consecutiveBreaches resets to 0, totalPass increments
 * - fail: consecutiveBreaches and totalBreaches increment, one open alert
 *
 * Signals: MetricReported always, then SlaViolated on a failure. Both are
 * appended before a subscriber failure reaches the caller.
 */

import type { Alert, Sla, SlaId } from "@sla-registry/types";
import { SLA_EVENTS } from "@sla-registry/event-store";
import { evaluate } from "./comparator.js";
import type { EntityStore } from "./entity-store.js";
import type { SignalEmitter } from "./signals.js";
import { streams } from "./signals.js";
import { RegistryError } from "./types.js";
import type { Clock, EvaluationOutcome } from "./types.js";
import { requireInteger } from "./validation.js";

export class MetricEvaluation {
  private readonly store: EntityStore;
  private readonly signals: SignalEmitter;
  private readonly now: Clock;

  constructor(store: EntityStore, signals: SignalEmitter, now: Clock) {
    this.store = store;
    this.signals = signals;
    this.now = now;
  }

  /**
   * Evaluate one observation against an active SLA.
   *
   * A missing SLA is reported as SLA_NOT_ACTIVE.
   */
  reportMetric(slaId: SlaId, observed: number, note: string, actor: string): EvaluationOutcome {
    const sla = this.store.getSla(slaId);
    if (sla === undefined || sla.status !== "active") {
      throw new RegistryError(
        "SLA_NOT_ACTIVE",
        sla === undefined
          ? `SLA ${slaId} does not exist`
          : `SLA ${slaId} is ${sla.status}, not active`,
      );
    }
    requireInteger(observed, "observed");

    const reportedAt = this.now().toISOString();
    const success = evaluate(observed, sla.target, sla.comparator);

    const updated: Sla = success
      ? {
          ...sla,
          lastReportAt: reportedAt,
          consecutiveBreaches: 0,
          totalPass: sla.totalPass + 1,
        }
      : {
          ...sla,
          lastReportAt: reportedAt,
          consecutiveBreaches: sla.consecutiveBreaches + 1,
          totalBreaches: sla.totalBreaches + 1,
        };

    this.store.updateSla(updated);

    const batch = this.signals.batch(actor, "evaluation").add(streams.sla(slaId), {
      type: SLA_EVENTS.METRIC_REPORTED,
      payload: { slaId, observed, success, note },
    });

    let alert: Alert | null = null;
    if (!success) {
      alert = this.store.createAlert({
        slaId,
        createdAt: reportedAt,
        status: "open",
        reason: note,
        acknowledgedBy: null,
        resolvedBy: null,
        resolutionNote: null,
      });
      batch.add(streams.alert(alert.id), {
        type: SLA_EVENTS.SLA_VIOLATED,
        payload: { alertId: alert.id, slaId, reason: note },
      });
    }

    batch.publish();

    return { success, sla: updated, alert };
  }
}
