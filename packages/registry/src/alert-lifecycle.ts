/**
 * Alert Lifecycle — open → acknowledged → resolved.
 *
 * Rules:
 * - Acknowledge requires an open alert
 * - Resolve accepts an open or acknowledged alert
 * - Resolved is terminal
 */

import type { Alert, AlertId, AlertStatus } from "@sla-registry/types";
import { SLA_EVENTS } from "@sla-registry/event-store";
import type { EntityStore } from "./entity-store.js";
import type { SignalEmitter } from "./signals.js";
import { streams } from "./signals.js";
import { RegistryError } from "./types.js";
import type { RegistryErrorCode } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<AlertStatus, readonly AlertStatus[]> = {
  open: ["acknowledged", "resolved"],
  acknowledged: ["resolved"],
  resolved: [],
};

export function canTransition(from: AlertStatus, to: AlertStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

// =============================================================================
// Alert Lifecycle
// =============================================================================

export class AlertLifecycle {
  private readonly store: EntityStore;
  private readonly signals: SignalEmitter;

  constructor(store: EntityStore, signals: SignalEmitter) {
    this.store = store;
    this.signals = signals;
  }

  acknowledge(alertId: AlertId, actor: string): Alert {
    const alert = this.requireTransition(alertId, "acknowledged", "ALERT_NOT_OPEN");

    const updated = this.store.updateAlert({
      ...alert,
      status: "acknowledged",
      acknowledgedBy: actor,
    });

    this.signals
      .batch(actor, "operations")
      .add(streams.alert(alertId), {
        type: SLA_EVENTS.ALERT_ACKNOWLEDGED,
        payload: { alertId, actor },
      })
      .publish();

    return updated;
  }

  resolve(alertId: AlertId, actor: string, resolutionNote: string): Alert {
    const alert = this.requireTransition(alertId, "resolved", "ALERT_NOT_RESOLVABLE");

    const updated = this.store.updateAlert({
      ...alert,
      status: "resolved",
      resolvedBy: actor,
      resolutionNote,
    });

    this.signals
      .batch(actor, "operations")
      .add(streams.alert(alertId), {
        type: SLA_EVENTS.ALERT_RESOLVED,
        payload: { alertId, actor, resolutionNote },
      })
      .publish();

    return updated;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requireTransition(
    alertId: AlertId,
    to: AlertStatus,
    code: RegistryErrorCode,
  ): Alert {
    const alert = this.store.getAlert(alertId);
    if (alert === undefined) {
      throw new RegistryError(code, `Alert ${alertId} does not exist`);
    }
    if (!canTransition(alert.status, to)) {
      throw new RegistryError(code, `Alert ${alertId} is ${alert.status}; cannot move to ${to}`);
    }
    return alert;
  }
}
