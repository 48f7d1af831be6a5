/**
 * Tests for metric evaluation: counters, alerts and signals.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SLA_EVENTS } from "@sla-registry/event-store";
import type { SlaRegistry } from "../src/sla-registry.js";
import { NOW, deliveryWithin24h, errorCode, eventTypes, newRegistry } from "./fixtures.js";

describe("MetricEvaluation", () => {
  let registry: SlaRegistry;

  beforeEach(() => {
    registry = newRegistry();
    registry.registerClient("Acme", "owner-1");
    registry.createContractWithSlas({ clientId: 1, documentRef: "QmCid" }, [deliveryWithin24h]);
  });

  // ─── Acme scenario ──────────────────────────────────────────────────

  describe("delivery within 24h", () => {
    it("passes an observation of 20", () => {
      const outcome = registry.reportMetric(1, 20, "on time");

      expect(outcome.success).toBe(true);
      expect(outcome.alert).toBeNull();
      expect(outcome.sla.totalPass).toBe(1);
      expect(outcome.sla.consecutiveBreaches).toBe(0);
      expect(outcome.sla.lastReportAt).toBe(NOW);
    });

    it("fails an observation of 36 and opens one alert", () => {
      registry.reportMetric(1, 20, "on time");
      const outcome = registry.reportMetric(1, 36, "took 36h");

      expect(outcome.success).toBe(false);
      expect(outcome.sla.consecutiveBreaches).toBe(1);
      expect(outcome.sla.totalBreaches).toBe(1);
      expect(outcome.alert).toEqual({
        id: 1,
        slaId: 1,
        createdAt: NOW,
        status: "open",
        reason: "took 36h",
        acknowledgedBy: null,
        resolvedBy: null,
        resolutionNote: null,
      });
      expect(registry.getSlaAlerts(1)).toEqual([1]);
    });

    it("resets the breach streak on the next pass", () => {
      registry.reportMetric(1, 20, "on time");
      registry.reportMetric(1, 36, "took 36h");
      const outcome = registry.reportMetric(1, 10, "fast");

      expect(outcome.sla.consecutiveBreaches).toBe(0);
      expect(outcome.sla.totalPass).toBe(2);
      expect(outcome.sla.totalBreaches).toBe(1);
      expect(registry.getSlaAlerts(1)).toEqual([1]);
    });

    it("passes on the boundary value", () => {
      expect(registry.reportMetric(1, 24, "exactly 24h").success).toBe(true);
    });
  });

  // ─── Streaks ────────────────────────────────────────────────────────

  it("counts consecutive breaches and opens one alert each", () => {
    registry.reportMetric(1, 30, "a");
    registry.reportMetric(1, 31, "b");
    const outcome = registry.reportMetric(1, 32, "c");

    expect(outcome.sla.consecutiveBreaches).toBe(3);
    expect(outcome.sla.totalBreaches).toBe(3);
    expect(registry.getSlaAlerts(1)).toEqual([1, 2, 3]);
    expect(registry.listAlerts("open")).toHaveLength(3);
  });

  it("stores the updated SLA", () => {
    registry.reportMetric(1, 36, "late");

    expect(registry.getSla(1).totalBreaches).toBe(1);
  });

  // ─── Signals ────────────────────────────────────────────────────────

  describe("signals", () => {
    it("emits MetricReported only on a pass", () => {
      registry.reportMetric(1, 20, "on time");

      const [stored] = registry.events.read("sla-1", { fromVersion: 2 });
      expect(stored?.event.type).toBe(SLA_EVENTS.METRIC_REPORTED);
      expect(stored?.event.payload).toEqual({
        slaId: 1,
        observed: 20,
        success: true,
        note: "on time",
      });
      expect(stored?.event.metadata.source).toBe("evaluation");
      expect(registry.events.streamExists("alert-1")).toBe(false);
    });

    it("emits MetricReported then SlaViolated on a failure", () => {
      registry.reportMetric(1, 36, "took 36h");

      expect(eventTypes(registry).slice(-2)).toEqual([
        SLA_EVENTS.METRIC_REPORTED,
        SLA_EVENTS.SLA_VIOLATED,
      ]);
      const [violated] = registry.events.read("alert-1");
      expect(violated?.event.payload).toEqual({ alertId: 1, slaId: 1, reason: "took 36h" });
    });

    it("correlates both signals of one report", () => {
      registry.reportMetric(1, 36, "took 36h");

      const [reported, violated] = registry.events.readAll({ fromPosition: 4 });
      expect(reported?.event.metadata.correlationId).toBe(
        violated?.event.metadata.correlationId,
      );
    });
  });

  // ─── Preconditions ──────────────────────────────────────────────────

  describe("preconditions", () => {
    it("rejects a report for a paused SLA without changing it", () => {
      registry.pauseSla(1, "maintenance");
      const before = registry.getSla(1);

      expect(errorCode(() => registry.reportMetric(1, 36, "late"))).toBe("SLA_NOT_ACTIVE");
      expect(registry.getSla(1)).toEqual(before);
      expect(registry.getSlaAlerts(1)).toEqual([]);
    });

    it("reports a missing SLA as not active", () => {
      expect(errorCode(() => registry.reportMetric(9, 1, "x"))).toBe("SLA_NOT_ACTIVE");
    });

    it("rejects a fractional observation", () => {
      expect(errorCode(() => registry.reportMetric(1, 20.5, "x"))).toBe("INVALID_ARGUMENT");
      expect(registry.getSla(1).lastReportAt).toBeNull();
    });
  });
});
