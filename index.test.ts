/**
 * Toolkit Wiring Tests
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  ConfigError,
  MemoryTransport,
  TokenManager,
  createGovernanceToolkit,
  isGovernanceDiagnosticsEnabled,
  resetGovernanceDiagnosticsForTest,
  type Credential,
  type TokenProvider,
} from "./index.js";

const BASE = "https://graph.test/v1.0";
const NOW = Date.parse("2024-06-01T00:00:00Z");

function staticTokens(): TokenProvider {
  return {
    getToken: vi.fn(async (): Promise<Credential> => ({ accessToken: "test-token", expiresAt: Infinity, scopes: [] })),
    invalidate: vi.fn(),
  };
}

/** Serves `{ value }` collections keyed by path below the base URL. */
function collections(data: Record<string, unknown[]>) {
  const urls: string[] = [];
  const fetch = async (input: string): Promise<Response> => {
    urls.push(input);
    const path = new URL(input).pathname.replace("/v1.0/", "");
    const value = data[path];
    if (!value) return new Response(JSON.stringify({ error: { code: "NotFound" } }), { status: 404 });
    return new Response(JSON.stringify({ value }), { status: 200, headers: { "content-type": "application/json" } });
  };
  return { fetch, urls };
}

afterEach(() => {
  resetGovernanceDiagnosticsForTest();
});

describe("createGovernanceToolkit", () => {
  it("requires client credentials when no token provider is given", () => {
    try {
      createGovernanceToolkit({ tenantId: "tenant-1" }, { transports: [new MemoryTransport()] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual([
          "/clientId: required when no token provider is supplied",
          "/clientSecret: required when no token provider is supplied",
        ]);
      }
    }
  });

  it("builds a client-secret token manager from credentials", () => {
    const toolkit = createGovernanceToolkit(
      { tenantId: "tenant-1", clientId: "client-1", clientSecret: "test-secret" },
      { transports: [new MemoryTransport()] },
    );
    expect(toolkit.tokens).toBeInstanceOf(TokenManager);
    expect(toolkit.config.logLevel).toBe("info");
  });

  it("rejects invalid configuration before wiring anything", () => {
    expect(() => createGovernanceToolkit({ graph: { batchSize: 0 } }, { tokenProvider: staticTokens() })).toThrow(ConfigError);
  });

  it("enables diagnostics when configured", () => {
    createGovernanceToolkit({ diagnostics: { enabled: true } }, { tokenProvider: staticTokens(), transports: [] });
    expect(isGovernanceDiagnosticsEnabled()).toBe(true);
  });

  it("runs an analysis through the injected transport", async () => {
    const { fetch, urls } = collections({
      "identity/conditionalAccess/policies": [
        {
          id: "p1",
          state: "enabled",
          conditions: { users: { includeUsers: ["All"] }, applications: { includeApplications: ["All"] } },
          grantControls: { operator: "OR", builtInControls: ["mfa"] },
        },
      ],
      users: [{ id: "u1", userType: "Member", accountEnabled: true }],
      servicePrincipals: [],
      "roleManagement/directory/roleDefinitions": [{ id: "role-ga", displayName: "Global Administrator" }],
      "roleManagement/directory/roleEligibilityScheduleInstances": [],
      "roleManagement/directory/roleAssignmentScheduleInstances": [],
      "roleManagement/directory/roleAssignmentScheduleRequests": [],
      "identityGovernance/accessReviews/definitions": [],
      "identityGovernance/entitlementManagement/accessPackages": [],
      "identityGovernance/entitlementManagement/catalogs": [],
      "identityGovernance/entitlementManagement/assignments": [],
    });
    const memory = new MemoryTransport();
    const toolkit = createGovernanceToolkit(
      { graph: { baseUrl: BASE } },
      { tokenProvider: staticTokens(), fetch, clock: () => NOW, transports: [memory] },
    );

    const report = await toolkit.runAnalysis();

    expect(report.degradedSections).toEqual([]);
    expect(report.scores.pimCompliance).toBe(100);
    expect(report.scores.reviewCompletion).toBe(100);
    expect(urls.every((u) => u.startsWith(`${BASE}/`))).toBe(true);
    expect(memory.messages("info")).toContain("Analysis completed with 3 violations");

    const csv = toolkit.exportReport(report, "csv");
    expect(csv.violationCount).toBe(3);
  });
});
