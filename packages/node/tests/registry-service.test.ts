/**
 * Tests for RegistryService — signal logging and lifecycle.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import { RegistryService } from "../src/services/registry-service.js";

interface LogLine {
  level: number;
  msg: string;
  eventType?: string;
  streamId?: string;
  actor?: string;
  rule?: string;
}

function capture(): { service: RegistryService; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as LogLine);
      },
    },
  );
  return { service: new RegistryService({ logger }), lines };
}

function seed(service: RegistryService): void {
  service.registry.registerClient("Acme", "owner-1", "contract-ms");
  service.registry.createContractWithSlas(
    { clientId: 1, documentRef: "QmCid" },
    [{ name: "delivery", target: 24, comparator: "LE" }],
    "contract-ms",
  );
}

describe("RegistryService", () => {
  it("logs every signal at info", () => {
    const { service, lines } = capture();
    seed(service);

    expect(lines.map((l) => [l.level, l.msg, l.eventType, l.streamId, l.actor])).toEqual([
      [30, "Signal", "registry.client.registered", "client-1", "contract-ms"],
      [30, "Signal", "registry.contract.created", "contract-1", "contract-ms"],
      [30, "Signal", "registry.sla.created", "sla-1", "contract-ms"],
    ]);
  });

  it("logs a breach at warn with the rule it broke", () => {
    const { service, lines } = capture();
    seed(service);

    service.registry.reportMetric(1, 36, "took 36h", "contract-ms");

    const breach = lines.at(-1);
    expect(breach?.level).toBe(40);
    expect(breach?.msg).toBe("SLA breached: observed <= 24");
    expect(breach?.rule).toBe("observed <= 24");
    expect(breach?.streamId).toBe("alert-1");
  });

  it("logs subscriber failures without failing the operation", () => {
    const { service, lines } = capture();
    seed(service);
    service.registry.events.subscribe("sla-1", () => {
      throw new Error("pager offline");
    });

    const outcome = service.registry.reportMetric(1, 20, "on time");

    expect(outcome.success).toBe(true);
    const failure = lines.find((l) => l.msg === "Signal subscriber failed");
    expect(failure?.level).toBe(50);
    expect(failure?.eventType).toBe("evaluation.metric.reported");
  });

  it("stops logging once stopped", async () => {
    const { service, lines } = capture();
    await service.stop();

    service.registry.registerClient("Acme", "owner-1");

    expect(lines).toEqual([]);
    expect(service.isReady()).toBe(false);
  });

  it("works without a logger", () => {
    const service = new RegistryService();
    seed(service);

    expect(service.isReady()).toBe(true);
    expect(service.registry.listClients()).toHaveLength(1);
  });
});
