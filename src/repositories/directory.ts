/**
 * Directory Repository
 *
 * Users, applications and the group/role membership needed to resolve
 * conditional access targets into concrete subjects.
 */

import type { GraphApi } from "../graph/types.js";
import { isRecord, readBoolean, readString } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { mapRecords, readBatchCollection } from "./records.js";
import type { DirectoryApplication, DirectorySnapshot, DirectoryUser, Policy, RoleAssignment, RoleDefinition } from "./types.js";

export class DirectoryRepository {
  private readonly logger: GovernanceLogger;

  constructor(
    private readonly graph: GraphApi,
    logger?: GovernanceLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async fetchUsers(): Promise<DirectoryUser[]> {
    const raw = await this.graph.getAllPages("users", { $select: "id,displayName,userType,accountEnabled" });
    const users = mapRecords(raw, "user", (record, id): DirectoryUser => ({
      id,
      displayName: readString(record, "displayName") ?? id,
      userType: readString(record, "userType") === "Guest" ? "Guest" : "Member",
      accountEnabled: readBoolean(record, "accountEnabled") ?? true,
    }));
    this.logger.debug(`Retrieved ${users.length} users`);
    return users;
  }

  /** Enterprise applications (service principals), keyed by appId. */
  async fetchApplications(): Promise<DirectoryApplication[]> {
    const raw = await this.graph.getAllPages("servicePrincipals", { $select: "appId,displayName" });
    const apps = mapRecords(
      raw,
      "application",
      (record, appId) => ({ appId, displayName: readString(record, "displayName") ?? appId }),
      "appId",
    );
    this.logger.debug(`Retrieved ${apps.length} applications`);
    return apps;
  }

  /**
   * Transitive user members of each group, one $batch sub-request per group.
   * Continuation links in a sub-response are followed through the pager.
   */
  async fetchGroupMembers(groupIds: readonly string[]): Promise<Map<string, Set<string>>> {
    const unique = [...new Set(groupIds)];
    const members = new Map<string, Set<string>>();
    if (unique.length === 0) return members;

    const results = await this.graph.batch(
      unique.map((groupId) => ({
        id: groupId,
        method: "GET" as const,
        path: `groups/${encodeURIComponent(groupId)}/transitiveMembers/microsoft.graph.user?$select=id`,
      })),
    );

    // A failed sub-response rejects the whole read.
    for (const result of results) {
      const ids = new Set<string>();
      for (const item of await readBatchCollection(this.graph, result)) {
        const id = isRecord(item) ? readString(item, "id") : undefined;
        if (id) ids.add(id);
      }
      members.set(result.id, ids);
    }
    return members;
  }

  /**
   * Snapshot scoped to the groups the given policies reference. Role
   * membership comes from assignments in effect at `now`.
   */
  async fetchSnapshot(
    policies: readonly Policy[],
    assignments: readonly RoleAssignment[] = [],
    definitions: readonly RoleDefinition[] = [],
    now = Date.now(),
  ): Promise<DirectorySnapshot> {
    const groupIds = policies.flatMap((p) => [...p.conditions.users.includeGroups, ...p.conditions.users.excludeGroups]);
    const [users, applications, groupMembers] = await Promise.all([
      this.fetchUsers(),
      this.fetchApplications(),
      this.fetchGroupMembers(groupIds),
    ]);
    return { users, applications, groupMembers, roleMembers: buildRoleMembers(assignments, definitions, now) };
  }
}

/**
 * Principals holding each role through an active assignment in effect at
 * `now`. Keyed by role definition id and, where known, by template id, since
 * policies target roles by template.
 */
export function buildRoleMembers(
  assignments: readonly RoleAssignment[],
  definitions: readonly RoleDefinition[],
  now: number,
): Map<string, Set<string>> {
  const templateById = new Map(definitions.map((d) => [d.id, d.templateId]));
  const members = new Map<string, Set<string>>();
  const add = (key: string, principalId: string) => {
    const set = members.get(key) ?? new Set<string>();
    set.add(principalId);
    members.set(key, set);
  };

  for (const a of assignments) {
    if (a.assignmentType !== "Active") continue;
    if (a.start !== null && a.start > now) continue;
    if (a.end !== null && a.end <= now) continue;
    add(a.roleId, a.principalId);
    const templateId = templateById.get(a.roleId);
    if (templateId && templateId !== a.roleId) add(templateId, a.principalId);
  }
  return members;
}
