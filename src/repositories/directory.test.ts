/**
 * Directory Repository Tests
 */

import { describe, it, expect } from "vitest";
import { RequestError } from "../errors.js";
import type { BatchResult } from "../graph/types.js";
import { MemoryTransport, createGovernanceLogger } from "../logging/index.js";
import { FakeGraph } from "../testing/fake-graph.js";
import { DirectoryRepository, buildRoleMembers } from "./directory.js";
import { normalizePolicy } from "./policies.js";
import type { RoleAssignment } from "./types.js";

const NOW = Date.parse("2024-06-01T00:00:00Z");
const DAY = 86_400_000;

function membersPath(groupId: string): string {
  return `groups/${groupId}/transitiveMembers/microsoft.graph.user?$select=id`;
}

function assignment(overrides: Partial<RoleAssignment>): RoleAssignment {
  return {
    id: "a1",
    principalId: "u1",
    roleId: "role-1",
    roleName: "Role",
    assignmentType: "Active",
    memberType: "Direct",
    start: null,
    end: null,
    ...overrides,
  };
}

describe("DirectoryRepository", () => {
  it("maps users with defaults", async () => {
    const graph = new FakeGraph().collection("users", [
      { id: "u1", displayName: "Ada", userType: "Member", accountEnabled: true },
      { id: "u2", userType: "Guest", accountEnabled: false },
      { id: "u3" },
    ]);
    const users = await new DirectoryRepository(graph).fetchUsers();

    expect(users).toEqual([
      { id: "u1", displayName: "Ada", userType: "Member", accountEnabled: true },
      { id: "u2", displayName: "u2", userType: "Guest", accountEnabled: false },
      { id: "u3", displayName: "u3", userType: "Member", accountEnabled: true },
    ]);
    expect(graph.calls[0].params).toEqual({ $select: "id,displayName,userType,accountEnabled" });
  });

  it("keys applications by appId", async () => {
    const graph = new FakeGraph().collection("servicePrincipals", [{ id: "sp1", appId: "app-1", displayName: "Portal" }]);
    expect(await new DirectoryRepository(graph).fetchApplications()).toEqual([{ appId: "app-1", displayName: "Portal" }]);
  });

  it("resolves group members in one batch, once per group", async () => {
    const graph = new FakeGraph()
      .collection(membersPath("g1"), [{ id: "u1" }, { id: "u2" }])
      .collection(membersPath("g2"), []);
    const members = await new DirectoryRepository(graph).fetchGroupMembers(["g1", "g2", "g1"]);

    expect(graph.calls.filter((c) => c.method === "BATCH")).toHaveLength(2);
    expect(members.get("g1")).toEqual(new Set(["u1", "u2"]));
    expect(members.get("g2")).toEqual(new Set());
  });

  it("follows a continuation link in a group sub-response", async () => {
    const graph = new FakeGraph().collection("https://graph.test/next", [{ id: "u9" }]);
    graph.batch = async (requests) =>
      requests.map((r): BatchResult => ({
        id: r.id ?? "0",
        ok: true,
        status: 200,
        body: { value: [{ id: "u1" }], "@odata.nextLink": "https://graph.test/next" },
      }));
    const members = await new DirectoryRepository(graph).fetchGroupMembers(["g1"]);
    expect(members.get("g1")).toEqual(new Set(["u1", "u9"]));
  });

  it("rejects with the sub-response error when a group lookup fails", async () => {
    const denied = new RequestError(membersPath("g1"), 403, null);
    const graph = new FakeGraph().fail(membersPath("g1"), denied).collection(membersPath("g2"), [{ id: "u1" }]);
    const memory = new MemoryTransport();
    const logger = createGovernanceLogger("directory", { level: "debug", transports: [memory] });

    await expect(new DirectoryRepository(graph, logger).fetchGroupMembers(["g1", "g2"])).rejects.toBe(denied);
    expect(memory.messages("error")).toEqual([]);
  });

  it("skips the batch when no groups are referenced", async () => {
    const graph = new FakeGraph();
    expect((await new DirectoryRepository(graph).fetchGroupMembers([])).size).toBe(0);
    expect(graph.calls).toHaveLength(0);
  });

  it("builds a snapshot for the groups policies reference", async () => {
    const policy = normalizePolicy(
      { state: "enabled", conditions: { users: { includeGroups: ["g1"], excludeGroups: ["g2"] } } },
      "p1",
      0,
    );
    const graph = new FakeGraph()
      .collection("users", [{ id: "u1" }])
      .collection("servicePrincipals", [])
      .collection(membersPath("g1"), [{ id: "u1" }])
      .collection(membersPath("g2"), []);
    const snapshot = await new DirectoryRepository(graph).fetchSnapshot([policy], [assignment({})], [], NOW);

    expect([...snapshot.groupMembers.keys()]).toEqual(["g1", "g2"]);
    expect(snapshot.roleMembers.get("role-1")).toEqual(new Set(["u1"]));
  });
});

describe("buildRoleMembers", () => {
  it("keeps active assignments in effect, keyed by role and template", () => {
    const members = buildRoleMembers(
      [
        assignment({ principalId: "u1" }),
        assignment({ principalId: "u2", assignmentType: "Eligible" }),
        assignment({ principalId: "u3", end: NOW - DAY }),
        assignment({ principalId: "u4", start: NOW + DAY }),
        assignment({ principalId: "u5", start: NOW - DAY, end: NOW + DAY }),
      ],
      [{ id: "role-1", displayName: "Role", templateId: "tmpl-1", isBuiltIn: true }],
      NOW,
    );

    expect(members.get("role-1")).toEqual(new Set(["u1", "u5"]));
    expect(members.get("tmpl-1")).toEqual(new Set(["u1", "u5"]));
  });
});
