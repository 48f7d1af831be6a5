/**
 * Tests for SlaRegistry — authorization, queries and composition.
 */

import { describe, it, expect, vi } from "vitest";
import { InMemoryEventStore, SLA_EVENTS } from "@sla-registry/event-store";
import type { StoredEvent } from "@sla-registry/event-store";
import { InMemoryEntityStore } from "../src/entity-store.js";
import { SlaRegistry } from "../src/sla-registry.js";
import type { Authorizer, Capability } from "../src/types.js";
import {
  deliveryWithin24h,
  errorCode,
  eventTypes,
  fixedClock,
  newRegistry,
  uptimeAtLeast95,
} from "./fixtures.js";

function seeded(registry: SlaRegistry): SlaRegistry {
  registry.registerClient("Acme", "owner-1");
  registry.createContractWithSlas(
    { clientId: 1, documentRef: "QmCid", externalId: "acme-2026" },
    [deliveryWithin24h, uptimeAtLeast95],
  );
  return registry;
}

// =============================================================================
// Authorization
// =============================================================================

describe("SlaRegistry authorization", () => {
  const roles: Record<string, readonly Capability[]> = {
    "contract-ms": ["registration"],
    "novelties-ms": ["novelties"],
    "ops-1": ["operations"],
  };
  const authorize: Authorizer = (caller, capability) =>
    roles[caller]?.includes(capability) ?? false;

  function guarded(): SlaRegistry {
    const registry = newRegistry({ authorize });
    registry.registerClient("Acme", "owner-1", "contract-ms");
    registry.createContractWithSlas(
      { clientId: 1, documentRef: "QmCid" },
      [deliveryWithin24h],
      "contract-ms",
    );
    return registry;
  }

  it("allows every caller by default", () => {
    const registry = newRegistry();

    expect(registry.registerClient("Acme", "owner-1", "anyone").id).toBe(1);
  });

  it("rejects registration from a caller without the capability", () => {
    const registry = guarded();

    expect(errorCode(() => registry.registerClient("Beta", "owner-2", "ops-1"))).toBe(
      "UNAUTHORIZED",
    );
    expect(registry.listClients()).toHaveLength(1);
  });

  it("gates metric reports behind registration", () => {
    const registry = guarded();

    expect(errorCode(() => registry.reportMetric(1, 36, "late", "novelties-ms"))).toBe(
      "UNAUTHORIZED",
    );
    expect(registry.reportMetric(1, 36, "late", "contract-ms").success).toBe(false);
  });

  it("gates novelties", () => {
    const registry = guarded();

    expect(errorCode(() => registry.pauseSla(1, "x", "contract-ms"))).toBe("UNAUTHORIZED");
    expect(registry.pauseSla(1, "x", "novelties-ms").status).toBe("paused");
  });

  it("gates alert operations", () => {
    const registry = guarded();
    registry.reportMetric(1, 36, "late", "contract-ms");

    expect(errorCode(() => registry.acknowledgeAlert(1, "contract-ms"))).toBe("UNAUTHORIZED");
    expect(registry.acknowledgeAlert(1, "ops-1").status).toBe("acknowledged");
  });

  it("checks the capability before any precondition", () => {
    const registry = guarded();

    expect(errorCode(() => registry.resumeSla(99, "x", "ops-1"))).toBe("UNAUTHORIZED");
  });

  it("uses 'system' when no actor is given", () => {
    const seen: string[] = [];
    const registry = newRegistry({
      authorize: (caller) => {
        seen.push(caller);
        return true;
      },
    });
    registry.registerClient("Acme", "owner-1");

    expect(seen).toEqual(["system"]);
    expect(registry.events.read("client-1")[0]?.event.metadata.actor).toBe("system");
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("SlaRegistry queries", () => {
  it("reads entities and indexes", () => {
    const registry = seeded(newRegistry());

    expect(registry.getClient(1).name).toBe("Acme");
    expect(registry.getContract(1).documentRef).toBe("QmCid");
    expect(registry.getContractByExternalId("acme-2026").id).toBe(1);
    expect(registry.getSla(2).comparator).toBe("GE");
    expect(registry.getClientContracts(1)).toEqual([1]);
    expect(registry.getContractSlas(1)).toEqual([1, 2]);
  });

  it("throws NOT_FOUND for unknown ids", () => {
    const registry = seeded(newRegistry());

    expect(errorCode(() => registry.getClient(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getContract(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getContractByExternalId("nope"))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getSla(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getAlert(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getClientContracts(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getContractSlas(5))).toBe("NOT_FOUND");
    expect(errorCode(() => registry.getSlaAlerts(5))).toBe("NOT_FOUND");
  });

  it("filters SLAs and alerts by status", () => {
    const registry = seeded(newRegistry());
    registry.pauseSla(2, "maintenance");
    registry.reportMetric(1, 30, "late");
    registry.reportMetric(1, 31, "late again");
    registry.resolveAlert(1, "ops-1", "handled");

    expect(registry.listSlas("paused").map((s) => s.id)).toEqual([2]);
    expect(registry.listSlas().map((s) => s.id)).toEqual([1, 2]);
    expect(registry.listAlerts("open").map((a) => a.id)).toEqual([2]);
    expect(registry.listAlerts("resolved").map((a) => a.id)).toEqual([1]);
    expect(registry.listAlerts()).toHaveLength(2);
  });
});

// =============================================================================
// Composition
// =============================================================================

describe("SlaRegistry composition", () => {
  it("restores from a snapshot and keeps allocating ids", () => {
    const original = seeded(newRegistry());
    original.reportMetric(1, 36, "late");

    const restored = new SlaRegistry({
      store: InMemoryEntityStore.fromSnapshot(original.snapshot()),
      now: fixedClock(),
    });
    const outcome = restored.reportMetric(1, 40, "later");

    expect(outcome.alert?.id).toBe(2);
    expect(restored.getSlaAlerts(1)).toEqual([1, 2]);
    expect(outcome.sla.consecutiveBreaches).toBe(2);
  });

  it("appends to a supplied event store", () => {
    const events = new InMemoryEventStore();
    const registry = newRegistry({ events });
    registry.registerClient("Acme", "owner-1");

    expect(events.globalPosition()).toBe(1);
    expect(registry.events).toBe(events);
  });

  it("delivers signals to subscribers", () => {
    const registry = seeded(newRegistry());
    const handler = vi.fn<(stored: StoredEvent) => void>();
    registry.events.subscribeAll(handler);

    registry.reportMetric(1, 36, "late");

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map(([stored]) => stored.event.type)).toEqual([
      SLA_EVENTS.METRIC_REPORTED,
      SLA_EVENTS.SLA_VIOLATED,
    ]);
  });

  it("routes subscriber failures to onSignalError and keeps the transition", () => {
    const onSignalError = vi.fn();
    const registry = seeded(newRegistry({ onSignalError }));
    registry.events.subscribeAll(() => {
      throw new Error("pager offline");
    });

    const outcome = registry.reportMetric(1, 36, "late");

    expect(outcome.alert?.status).toBe("open");
    expect(onSignalError).toHaveBeenCalledTimes(2);
    expect(registry.getSla(1).totalBreaches).toBe(1);
  });

  it("rethrows subscriber failures without a callback, after committing", () => {
    const registry = seeded(newRegistry());
    registry.events.subscribe("sla-1", () => {
      throw new Error("pager offline");
    });

    expect(() => registry.reportMetric(1, 20, "ok")).toThrow("pager offline");
    expect(registry.getSla(1).totalPass).toBe(1);
  });

  it("appends SlaViolated even when a MetricReported subscriber throws", () => {
    const registry = seeded(newRegistry());
    registry.events.subscribe("sla-1", () => {
      throw new Error("pager offline");
    });

    expect(() => registry.reportMetric(1, 36, "late")).toThrow("pager offline");

    expect(registry.listAlerts().map((a) => a.id)).toEqual([1]);
    expect(registry.getSla(1).totalBreaches).toBe(1);
    const violated = registry.events.read("alert-1");
    expect(violated.map((e) => e.event.type)).toEqual([SLA_EVENTS.SLA_VIOLATED]);
    expect(violated[0]?.event.payload).toEqual({ alertId: 1, slaId: 1, reason: "late" });
  });

  it("aggregates failures from several signals of one operation", () => {
    const registry = seeded(newRegistry());
    registry.events.subscribeAll(() => {
      throw new Error("pager offline");
    });

    expect(() => registry.reportMetric(1, 36, "late")).toThrow(AggregateError);
    expect(eventTypes(registry).slice(-2)).toEqual([
      SLA_EVENTS.METRIC_REPORTED,
      SLA_EVENTS.SLA_VIOLATED,
    ]);
  });

  it("appends NoveltyApplied even when a SlaStatusChanged subscriber throws", () => {
    const registry = seeded(newRegistry());
    let calls = 0;
    registry.events.subscribe("sla-1", () => {
      calls += 1;
      if (calls === 1) {
        throw new Error("pager offline");
      }
    });

    expect(() => registry.pauseSla(1, "maintenance")).toThrow("pager offline");

    expect(registry.getSla(1).status).toBe("paused");
    expect(registry.events.read("sla-1").map((e) => e.event.type).slice(-2)).toEqual([
      SLA_EVENTS.SLA_STATUS_CHANGED,
      SLA_EVENTS.NOVELTY_APPLIED,
    ]);
  });

  it("appends every SlaCreated even when a ContractCreated subscriber throws", () => {
    const registry = newRegistry();
    registry.registerClient("Acme", "owner-1");
    registry.events.subscribe("contract-1", () => {
      throw new Error("pager offline");
    });

    expect(() =>
      registry.createContractWithSlas({ clientId: 1, documentRef: "QmCid" }, [
        deliveryWithin24h,
        uptimeAtLeast95,
      ]),
    ).toThrow("pager offline");

    expect(eventTypes(registry)).toEqual([
      SLA_EVENTS.CLIENT_REGISTERED,
      SLA_EVENTS.CONTRACT_CREATED,
      SLA_EVENTS.SLA_CREATED,
      SLA_EVENTS.SLA_CREATED,
    ]);
  });

  it("leaves the signal log untouched when an operation fails", () => {
    const registry = seeded(newRegistry());
    const before = eventTypes(registry);

    expect(errorCode(() => registry.reportMetric(1, 1.5, "bad"))).toBe("INVALID_ARGUMENT");
    expect(eventTypes(registry)).toEqual(before);
  });
});
