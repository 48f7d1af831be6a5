/**
 * Property-Based Tests for @sla-registry/registry
 *
 * Uses fast-check to verify invariants that must hold for ANY report sequence:
 *
 * 1. The comparator table matches native integer comparison
 * 2. totalPass + totalBreaches equals the number of accepted reports
 * 3. consecutiveBreaches equals the length of the trailing failure run
 * 4. Each failing report appends exactly one alert; passes append none
 * 5. Reports against a paused SLA change nothing
 * 6. Ids are strictly increasing and never reused, for every entity type
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Comparator } from "@sla-registry/types";
import { COMPARATORS } from "@sla-registry/types";
import { evaluate } from "../src/comparator.js";
import type { SlaRegistry } from "../src/sla-registry.js";
import { errorCode, newRegistry } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbComparator: fc.Arbitrary<Comparator> = fc.constantFrom(...COMPARATORS);

const arbValue = fc.integer({ min: -1_000_000, max: 1_000_000 });

/** Small range so that pass/fail mixes appear often. */
const arbObservations = fc.array(fc.integer({ min: 0, max: 48 }), { maxLength: 40 });

const NATIVE: Record<Comparator, (a: number, b: number) => boolean> = {
  LT: (a, b) => a < b,
  LE: (a, b) => a <= b,
  EQ: (a, b) => a === b,
  NE: (a, b) => a !== b,
  GE: (a, b) => a >= b,
  GT: (a, b) => a > b,
};

function registryWithSla(target: number, comparator: Comparator): SlaRegistry {
  const registry = newRegistry();
  registry.registerClient("Acme", "owner-1");
  registry.createContractWithSlas({ clientId: 1, documentRef: "doc" }, [
    { name: "rule", target, comparator },
  ]);
  return registry;
}

// =============================================================================
// Properties
// =============================================================================

describe("comparator properties", () => {
  it("matches native comparison for every comparator", () => {
    fc.assert(
      fc.property(arbValue, arbValue, arbComparator, (observed, target, kind) => {
        expect(evaluate(observed, target, kind)).toBe(NATIVE[kind](observed, target));
      }),
    );
  });

  it("LT and GE are complements, as are GT and LE, EQ and NE", () => {
    fc.assert(
      fc.property(arbValue, arbValue, (observed, target) => {
        expect(evaluate(observed, target, "LT")).toBe(!evaluate(observed, target, "GE"));
        expect(evaluate(observed, target, "GT")).toBe(!evaluate(observed, target, "LE"));
        expect(evaluate(observed, target, "EQ")).toBe(!evaluate(observed, target, "NE"));
      }),
    );
  });
});

describe("evaluation properties", () => {
  it("keeps counters consistent with the report sequence", () => {
    fc.assert(
      fc.property(arbObservations, arbComparator, (observations, comparator) => {
        const registry = registryWithSla(24, comparator);
        let trailingFailures = 0;
        let failures = 0;

        for (const observed of observations) {
          const alertsBefore = registry.getSlaAlerts(1).length;
          const outcome = registry.reportMetric(1, observed, `observed ${observed}`);
          const alertsAfter = registry.getSlaAlerts(1).length;

          if (outcome.success) {
            trailingFailures = 0;
            expect(alertsAfter).toBe(alertsBefore);
          } else {
            trailingFailures += 1;
            failures += 1;
            expect(alertsAfter).toBe(alertsBefore + 1);
          }
        }

        const sla = registry.getSla(1);
        expect(sla.totalPass + sla.totalBreaches).toBe(observations.length);
        expect(sla.totalBreaches).toBe(failures);
        expect(sla.consecutiveBreaches).toBe(trailingFailures);
        expect(registry.getSlaAlerts(1)).toHaveLength(failures);
      }),
    );
  });

  it("ignores every report while paused", () => {
    fc.assert(
      fc.property(arbObservations, arbObservations, (before, during) => {
        const registry = registryWithSla(24, "LE");
        for (const observed of before) registry.reportMetric(1, observed, "before");
        registry.pauseSla(1, "maintenance");
        const frozen = registry.getSla(1);
        const position = registry.events.globalPosition();

        for (const observed of during) {
          expect(errorCode(() => registry.reportMetric(1, observed, "during"))).toBe(
            "SLA_NOT_ACTIVE",
          );
        }

        expect(registry.getSla(1)).toEqual(frozen);
        expect(registry.events.globalPosition()).toBe(position);
      }),
    );
  });
});

describe("id properties", () => {
  it("registering N clients yields ids 1..N in registration order", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 50 }), (n) => {
        const registry = newRegistry();

        const ids = Array.from(
          { length: n },
          (_, i) => registry.registerClient(`client-${i}`, "owner-1").id,
        );

        expect(ids).toEqual(Array.from({ length: n }, (_, i) => i + 1));
        expect(registry.listClients().map((c) => c.id)).toEqual(ids);
      }),
    );
  });

  it("allocates alert ids in breach order across SLAs", () => {
    const arbReports = fc.array(
      fc.record({ sla: fc.integer({ min: 0, max: 2 }), observed: fc.integer({ min: -2, max: 2 }) }),
      { maxLength: 40 },
    );

    fc.assert(
      fc.property(arbReports, (reports) => {
        const registry = newRegistry();
        registry.registerClient("Acme", "owner-1");
        const { slas } = registry.createContractWithSlas(
          { clientId: 1, documentRef: "doc" },
          [0, 1, 2].map((i) => ({ name: `sla-${i}`, target: 0, comparator: "LE" as const })),
        );

        const alertIds: number[] = [];
        for (const { sla, observed } of reports) {
          const slaId = slas[sla]?.id ?? 1;
          const outcome = registry.reportMetric(slaId, observed, "report");
          if (outcome.alert !== null) {
            expect(outcome.alert.slaId).toBe(slaId);
            alertIds.push(outcome.alert.id);
          }
        }

        const breaches = reports.filter((r) => r.observed > 0).length;
        expect(alertIds).toEqual(Array.from({ length: breaches }, (_, i) => i + 1));
      }),
    );
  });

  it("allocates strictly increasing ids across contracts and SLAs", () => {
    const arbSlaCounts = fc.array(fc.integer({ min: 0, max: 4 }), { minLength: 1, maxLength: 10 });

    fc.assert(
      fc.property(arbSlaCounts, (slaCounts) => {
        const registry = newRegistry();
        registry.registerClient("Acme", "owner-1");

        const slaIds: number[] = [];
        const contractIds: number[] = [];
        for (const count of slaCounts) {
          const definitions = Array.from({ length: count }, (_, i) => ({
            name: `sla-${i}`,
            target: i,
            comparator: "GE" as const,
          }));
          const { contract, slas } = registry.createContractWithSlas(
            { clientId: 1, documentRef: "doc" },
            definitions,
          );
          contractIds.push(contract.id);
          slaIds.push(...slas.map((s) => s.id));
        }

        const total = slaCounts.reduce((sum, n) => sum + n, 0);
        expect(contractIds).toEqual(slaCounts.map((_, i) => i + 1));
        expect(slaIds).toEqual(Array.from({ length: total }, (_, i) => i + 1));
      }),
    );
  });
});
