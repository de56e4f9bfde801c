/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { ConfigError } from "./errors.js";
import { getDefaultConfig, loadConfigFromEnv, resolveConfig } from "./config.js";

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe("getDefaultConfig", () => {
  it("uses the documented defaults", () => {
    const config = getDefaultConfig();
    expect(config.graph.baseUrl).toBe("https://graph.microsoft.com/v1.0");
    expect(config.graph.batchSize).toBe(20);
    expect(config.graph.retry.maxRateLimitAttempts).toBe(5);
    expect(config.token.refreshMarginMs).toBe(300_000);
    expect(config.coverage.weights).toEqual({ coverage: 0.4, mfaStrictness: 0.3, sessionControls: 0.15, exclusions: 0.15 });
    expect(config.pim.excessiveRoleThreshold).toBe(3);
    expect(config.pim.dormancyDays).toBe(90);
    expect(config.pim.privilegedRoles).toContain("Global Administrator");
    expect(config.reviews).toEqual({ participationThreshold: 0.8, overdueHighAfterDays: 7 });
    expect(config.entitlements).toEqual({ assignmentThreshold: 10, expiringWithinDays: 30 });
    expect(config.logLevel).toBe("info");
  });

  it("returns independent copies", () => {
    const a = getDefaultConfig();
    a.pim.privilegedRoles.push("Custom Role");
    expect(getDefaultConfig().pim.privilegedRoles).not.toContain("Custom Role");
  });
});

describe("resolveConfig", () => {
  it("merges nested overrides over defaults", () => {
    const config = resolveConfig({
      tenantId: "tenant-1",
      graph: { batchSize: 10, retry: { maxNetworkAttempts: 1 } },
      pim: { dormancyDays: 30, kindWeights: { DormantEligibility: 1 } },
      entitlements: { expiringWithinDays: 14 },
    });

    expect(config.tenantId).toBe("tenant-1");
    expect(config.graph.batchSize).toBe(10);
    expect(config.graph.maxPages).toBe(1000);
    expect(config.graph.retry).toEqual({ maxNetworkAttempts: 1, maxRateLimitAttempts: 5, maxServerErrorAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 });
    expect(config.pim.dormancyDays).toBe(30);
    expect(config.pim.kindWeights).toEqual({ StandingAdminAccess: 2, ExcessiveRoleAssignments: 1, DormantEligibility: 1 });
    expect(config.entitlements).toEqual({ assignmentThreshold: 10, expiringWithinDays: 14 });
  });

  it("rejects out-of-range values with their path", () => {
    const issues = issuesOf(() => resolveConfig({ graph: { batchSize: 50 } }));
    expect(issues.length).toBeGreaterThan(0);
    expect(issues[0].startsWith("/graph/batchSize: ")).toBe(true);
  });

  it("rejects coverage weights that do not sum to one", () => {
    const issues = issuesOf(() => resolveConfig({ coverage: { weights: { coverage: 0.5 } } }));
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("/coverage/weights: must sum to 1")).toBe(true);
  });

  it("rejects posture weights that do not sum to one", () => {
    const issues = issuesOf(() => resolveConfig({ posture: { pimWeight: 0.25 } }));
    expect(issues).toEqual(["/posture: weights must sum to 1 (got 0.75)"]);
  });

  it("rejects a base delay above the maximum", () => {
    const issues = issuesOf(() => resolveConfig({ graph: { retry: { baseDelayMs: 5000, maxDelayMs: 1000 } } }));
    expect(issues).toEqual(["/graph/retry: baseDelayMs must not exceed maxDelayMs"]);
  });
});

describe("loadConfigFromEnv", () => {
  it("reads credentials and options", () => {
    const input = loadConfigFromEnv({
      AZURE_TENANT_ID: "tenant-1",
      AZURE_CLIENT_ID: "client-1",
      AZURE_CLIENT_SECRET: "test-secret",
      GRAPH_BASE_URL: "https://graph.microsoft.com/beta",
      GOVERNANCE_LOG_LEVEL: "DEBUG",
      GOVERNANCE_DIAGNOSTICS: "true",
    });
    expect(input).toEqual({
      tenantId: "tenant-1",
      clientId: "client-1",
      clientSecret: "test-secret",
      graph: { baseUrl: "https://graph.microsoft.com/beta" },
      logLevel: "debug",
      diagnostics: { enabled: true },
    });
  });

  it("leaves unset variables to the defaults", () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfigFromEnv({ GOVERNANCE_LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
