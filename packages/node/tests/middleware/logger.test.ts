/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-1" }));

    expect(entries).toHaveLength(1);
    const [entry] = entries;
    expect(entry?.method).toBe("GET");
    expect(entry?.path).toBe("/health");
    expect(entry?.status).toBe(200);
    expect(entry?.requestId).toBe("req-1");
    expect(entry?.actor).toBeUndefined();
    expect(entry?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs API requests with status and actor", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/clients", "POST", { name: "Acme", ownerRef: "owner-1" }),
    );

    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.status).toBe(201);
    expect(entries[0]?.actor).toBe("anonymous");
  });

  it("logs error responses", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/api/v1/clients/42");

    expect(entries[0]?.status).toBe(404);
  });
});
