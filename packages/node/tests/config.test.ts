/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("abc123:admin:root")).toEqual([
      { key: "abc123", role: "admin", name: "root" },
    ]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys(
      "k1:contract-service:contract-ms,k2:novelties-service:novelties-ms,k3:operations:ops-1",
    );
    expect(keys).toEqual([
      { key: "k1", role: "contract-service", name: "contract-ms" },
      { key: "k2", role: "novelties-service", name: "novelties-ms" },
      { key: "k3", role: "operations", name: "ops-1" },
    ]);
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:admin:a , k2:operations:b  ");
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:admin")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:admin:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:root")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:viewer:x")).toThrow('Invalid role "viewer"');
  });

  it("throws on empty name", () => {
    expect(() => parseApiKeys("k1:admin:")).toThrow("Key name cannot be empty");
  });

  it("throws on a repeated key", () => {
    expect(() => parseApiKeys("k1:admin:a,k1:operations:b")).toThrow(
      'Duplicate API key for "b"',
    );
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      API_KEYS: "",
      JWT_ISSUER: "sla-registry",
    });
  });

  it("coerces PORT from a string", () => {
    expect(loadConfig({ PORT: "8080" }).PORT).toBe(8080);
  });

  it("rejects an out-of-range PORT", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });

  it("rejects an unknown LOG_LEVEL", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("keeps JWT settings", () => {
    const config = loadConfig({ JWT_SECRET: "test-secret", JWT_ISSUER: "issuer-1" });
    expect(config.JWT_SECRET).toBe("test-secret");
    expect(config.JWT_ISSUER).toBe("issuer-1");
  });
});
