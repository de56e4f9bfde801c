/**
 * Governance Service Tests
 */

import { describe, it, expect } from "vitest";
import { RequestError, TransientServerError } from "../errors.js";
import { MemoryTransport, createGovernanceLogger } from "../logging/index.js";
import { POLICIES_PATH } from "../repositories/policies.js";
import { FakeGraph } from "../testing/fake-graph.js";
import { GovernanceService } from "./service.js";

const NOW = Date.parse("2024-06-01T00:00:00Z");

const ROLE_DEFINITIONS = "roleManagement/directory/roleDefinitions";
const ACTIVATIONS = "roleManagement/directory/roleAssignmentScheduleRequests";
const REVIEW_DEFINITIONS = "identityGovernance/accessReviews/definitions";
const PACKAGES = "identityGovernance/entitlementManagement/accessPackages";
const CATALOGS = "identityGovernance/entitlementManagement/catalogs";
const PACKAGE_ASSIGNMENTS = "identityGovernance/entitlementManagement/assignments";

function tenant(): FakeGraph {
  return new FakeGraph()
    .collection(POLICIES_PATH, [
      {
        id: "p1",
        displayName: "Require MFA",
        state: "enabled",
        conditions: { users: { includeUsers: ["All"] }, applications: { includeApplications: ["All"] } },
        grantControls: { operator: "OR", builtInControls: ["mfa"] },
        sessionControls: { signInFrequency: { isEnabled: true, value: 4 } },
      },
    ])
    .collection("users", [{ id: "u1", displayName: "Ada", userType: "Member", accountEnabled: true }])
    .collection("servicePrincipals", [{ appId: "app-1", displayName: "Payroll" }])
    .collection(ROLE_DEFINITIONS, [
      { id: "role-ga", displayName: "Global Administrator", templateId: "62e90394-69f5-4237-9190-012177145e10", isBuiltIn: true },
    ])
    .collection("roleManagement/directory/roleEligibilityScheduleInstances", [])
    .collection("roleManagement/directory/roleAssignmentScheduleInstances", [
      { id: "a1", principalId: "u1", roleDefinitionId: "role-ga", memberType: "Direct" },
    ])
    .collection(ACTIVATIONS, [])
    .collection(REVIEW_DEFINITIONS, [])
    .collection(PACKAGES, [])
    .collection(CATALOGS, [])
    .collection(PACKAGE_ASSIGNMENTS, []);
}

function service(graph: FakeGraph, memory = new MemoryTransport()): GovernanceService {
  return new GovernanceService({
    graph,
    clock: () => NOW,
    logger: createGovernanceLogger("analysis", { level: "debug", transports: [memory] }),
  });
}

describe("GovernanceService", () => {
  it("analyzes every section of a healthy tenant", async () => {
    const report = await service(tenant()).runAnalysis();

    expect(report.generatedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(report.degradedSections).toEqual([]);
    expect(report.scores).toEqual({ conditionalAccess: 100, pimCompliance: 94, reviewCompletion: 100, posture: 97 });
    expect(report.violations.filter((v) => v.severity === "high").map((v) => v.subjectRef)).toEqual(["assignment:a1"]);
  });

  it("fetches each dataset once per run", async () => {
    const graph = tenant();
    await service(graph).runAnalysis();

    expect(graph.callsTo(POLICIES_PATH)).toHaveLength(1);
    expect(graph.callsTo(ROLE_DEFINITIONS)).toHaveLength(1);
    expect(graph.callsTo("users")).toHaveLength(1);
    expect(graph.callsTo(ACTIVATIONS)).toHaveLength(1);
  });

  it("degrades only the section whose data failed", async () => {
    const graph = tenant().fail(ACTIVATIONS, new RequestError(ACTIVATIONS, 403, null));
    const memory = new MemoryTransport();
    const report = await service(graph, memory).runAnalysis();

    expect(report.degradedSections.map((d) => [d.section, d.error.code])).toEqual([["pim", "REQUEST_FAILED"]]);
    expect(report.sections.conditionalAccess.status).toBe("ok");
    expect(report.sections.conflicts.status).toBe("ok");
    expect(report.sections.accessReviews.status).toBe("ok");
    expect(report.sections.entitlements.status).toBe("ok");
    expect(report.scores.pimCompliance).toBeNull();
    expect(report.scores.posture).toBe(100);
    expect(memory.messages("warn")).toEqual(["Analysis completed with degraded sections: pim"]);
  });

  it("still analyzes coverage when role data is unavailable", async () => {
    const graph = tenant().fail(ROLE_DEFINITIONS, new TransientServerError(ROLE_DEFINITIONS, 500, 4));
    const memory = new MemoryTransport();
    const report = await service(graph, memory).runAnalysis();

    expect(report.degradedSections.map((d) => d.section)).toEqual(["pim"]);
    expect(report.sections.conditionalAccess.status).toBe("ok");
    expect(graph.callsTo(ROLE_DEFINITIONS)).toHaveLength(1);
    expect(memory.messages("warn")[0]).toMatch(/^Role data unavailable for coverage resolution: /);
  });

  it("fails both policy sections when policies cannot be read", async () => {
    const graph = tenant().fail(POLICIES_PATH, new RequestError(POLICIES_PATH, 403, null));
    const report = await service(graph).runAnalysis();

    expect(report.degradedSections.map((d) => d.section)).toEqual(["conditionalAccess", "conflicts"]);
    expect(report.scores.conditionalAccess).toBeNull();
    expect(report.scores.pimCompliance).toBe(94);
    expect(graph.callsTo(POLICIES_PATH)).toHaveLength(1);
  });

  it("degrades the review section on malformed records", async () => {
    const graph = tenant().collection(REVIEW_DEFINITIONS, ["not-a-record"]);
    const report = await service(graph).runAnalysis();
    expect(report.degradedSections.map((d) => d.section)).toEqual(["accessReviews"]);
  });

  it("reports access packages handed out without controls", async () => {
    const graph = tenant()
      .collection(PACKAGES, [{ id: "pkg-1", displayName: "Contractors", catalog: { id: "cat-1" } }])
      .collection(`${PACKAGES}/pkg-1/assignmentPolicies`, [
        { id: "pol-1", requestApprovalSettings: { isApprovalRequiredForAdd: true }, expiration: { type: "noExpiration" } },
      ])
      .collection(CATALOGS, [
        { id: "cat-1", displayName: "Partners" },
        { id: "cat-2", displayName: "Unused" },
      ])
      .collection(
        PACKAGE_ASSIGNMENTS,
        Array.from({ length: 11 }, (_, i) => ({ id: `pa-${i}`, accessPackage: { id: "pkg-1" }, target: { id: `u${i}` } })),
      );
    const report = await service(graph).runAnalysis();

    expect(report.degradedSections).toEqual([]);
    expect(report.summaryCounts.byKind.OverPrivilegedAccessPackage).toBe(1);
    expect(report.summaryCounts.byKind.EmptyCatalog).toBe(1);
    expect(report.violations.filter((v) => v.kind === "OverPrivilegedAccessPackage").map((v) => [v.severity, v.subjectRef])).toEqual([
      ["medium", "accessPackage:pkg-1"],
    ]);
    expect(graph.callsTo(PACKAGES)).toHaveLength(1);
    expect(graph.callsTo(PACKAGE_ASSIGNMENTS)).toHaveLength(1);
  });

  it("degrades only the entitlement section when entitlement data fails", async () => {
    const graph = tenant().fail(CATALOGS, new RequestError(CATALOGS, 403, null));
    const report = await service(graph).runAnalysis();

    expect(report.degradedSections.map((d) => [d.section, d.error.code])).toEqual([["entitlements", "REQUEST_FAILED"]]);
    expect(report.scores).toEqual({ conditionalAccess: 100, pimCompliance: 94, reviewCompletion: 100, posture: 97 });
  });
});
