/**
 * Conditional Access Policy Repository Tests
 */

import { describe, it, expect } from "vitest";
import { MalformedEntityError } from "../errors.js";
import { FakeGraph } from "../testing/fake-graph.js";
import { POLICIES_PATH, PolicyRepository } from "./policies.js";

const rawPolicy = {
  id: "p1",
  displayName: "Require MFA for admins",
  state: "enabledForReportingButNotEnforced",
  modifiedDateTime: "2024-03-01T10:00:00Z",
  createdDateTime: "2023-01-01T00:00:00Z",
  conditions: {
    users: { includeUsers: ["All"], excludeUsers: ["break-glass"], includeRoles: ["role-ga"] },
    applications: { includeApplications: ["All"] },
    locations: { includeLocations: ["All"], excludeLocations: ["AllTrusted"] },
    clientAppTypes: ["browser", "exchangeActiveSync"],
    platforms: { includePlatforms: ["android", "iOS"] },
    signInRiskLevels: ["high"],
  },
  grantControls: {
    operator: "and",
    builtInControls: ["mfa", "compliantDevice"],
    authenticationStrength: { id: "s1", displayName: "Phishing-resistant MFA" },
  },
  sessionControls: {
    signInFrequency: { isEnabled: true, value: 4 },
    persistentBrowser: { isEnabled: false },
    disableResilienceDefaults: true,
    cloudAppSecurity: null,
  },
};

describe("PolicyRepository", () => {
  it("normalizes every field of a policy", async () => {
    const graph = new FakeGraph().collection(POLICIES_PATH, [rawPolicy]);
    const [policy] = await new PolicyRepository(graph).fetchPolicies();

    expect(policy).toEqual({
      id: "p1",
      displayName: "Require MFA for admins",
      state: "reportOnly",
      conditions: {
        users: {
          includeUsers: ["All"],
          excludeUsers: ["break-glass"],
          includeGroups: [],
          excludeGroups: [],
          includeRoles: ["role-ga"],
          excludeRoles: [],
        },
        applications: { includeApplications: ["All"], excludeApplications: [] },
        locations: { includeLocations: ["All"], excludeLocations: ["AllTrusted"] },
        clientAppTypes: ["browser", "exchangeActiveSync"],
        userRiskLevels: [],
        signInRiskLevels: ["high"],
        platforms: ["android", "iOS"],
      },
      controls: { operator: "AND", builtInControls: ["mfa", "compliantDevice"], authenticationStrength: "Phishing-resistant MFA" },
      sessionControls: ["disableResilienceDefaults", "signInFrequency"],
      modifiedAt: Date.parse("2024-03-01T10:00:00Z"),
    });
  });

  it("defaults absent sections", async () => {
    const graph = new FakeGraph().collection(POLICIES_PATH, [{ id: "p2", state: "disabled", createdDateTime: "2023-01-01T00:00:00Z" }]);
    const [policy] = await new PolicyRepository(graph).fetchPolicies();

    expect(policy.displayName).toBe("p2");
    expect(policy.controls).toEqual({ operator: "OR", builtInControls: [], authenticationStrength: null });
    expect(policy.sessionControls).toEqual([]);
    expect(policy.conditions.users.includeUsers).toEqual([]);
    expect(policy.modifiedAt).toBe(Date.parse("2023-01-01T00:00:00Z"));
  });

  it("rejects an unknown state with the record index", async () => {
    const graph = new FakeGraph().collection(POLICIES_PATH, [rawPolicy, { id: "p3", state: "paused" }]);
    const error = await new PolicyRepository(graph).fetchPolicies().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MalformedEntityError);
    if (error instanceof MalformedEntityError) {
      expect(error.field).toBe("state");
      expect(error.index).toBe(1);
    }
  });

  it("rejects a record without an id", async () => {
    const graph = new FakeGraph().collection(POLICIES_PATH, [{ state: "enabled" }]);
    await expect(new PolicyRepository(graph).fetchPolicies()).rejects.toThrow('Malformed policy at index 0: missing or invalid "id"');
  });

  it("fetches a single policy", async () => {
    const graph = new FakeGraph().body(`${POLICIES_PATH}/p1`, rawPolicy);
    const policy = await new PolicyRepository(graph).fetchPolicy("p1");
    expect(policy.id).toBe("p1");
  });

  it("writes the Graph spelling of report-only", async () => {
    const graph = new FakeGraph();
    await new PolicyRepository(graph).setPolicyState("p1", "reportOnly");
    expect(graph.calls).toEqual([
      { method: "PATCH", path: `${POLICIES_PATH}/p1`, params: undefined, body: { state: "enabledForReportingButNotEnforced" } },
    ]);
  });
});
