/**
 * Role Repository (PIM)
 *
 * Role definitions, eligible and active schedule instances, and activation
 * requests from the directory role management API.
 */

import { NotFoundError } from "../errors.js";
import type { GraphApi } from "../graph/types.js";
import { readBoolean, readString, readTimestamp, type JsonRecord } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { DAY_MS, systemClock, type Clock } from "../types.js";
import { mapRecords, requireString } from "./records.js";
import type { AssignmentType, RoleActivation, RoleAssignment, RoleDefinition } from "./types.js";

const ROLE_MANAGEMENT = "roleManagement/directory";

/** Request actions that represent a role coming into use. */
export const ACTIVATION_ACTIONS: readonly string[] = ["selfActivate", "adminAssign"];

export const UNKNOWN_ROLE_NAME = "Unknown";

export class RoleRepository {
  private readonly logger: GovernanceLogger;
  private readonly clock: Clock;

  constructor(
    private readonly graph: GraphApi,
    options: { logger?: GovernanceLogger; clock?: Clock } = {},
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Every directory role definition. An empty list means the app lacks
   * RoleManagement permissions or the tenant is misconfigured, so it is an
   * error rather than an empty result.
   */
  async fetchRoleDefinitions(): Promise<RoleDefinition[]> {
    const raw = await this.graph.getAllPages(`${ROLE_MANAGEMENT}/roleDefinitions`);
    if (raw.length === 0) {
      throw new NotFoundError("role definitions", "check RoleManagement.Read.Directory consent for the app registration");
    }
    const definitions = mapRecords(raw, "role definition", (record, id) => ({
      id,
      displayName: readString(record, "displayName") ?? id,
      templateId: readString(record, "templateId") ?? null,
      isBuiltIn: readBoolean(record, "isBuiltIn") ?? false,
    }));
    this.logger.info(`Retrieved ${definitions.length} role definitions`);
    return definitions;
  }

  /**
   * Eligible and active schedule instances, merged. Role names come from
   * `definitions` (fetched when omitted); unknown ids keep "Unknown".
   */
  async fetchRoleAssignments(definitions?: readonly RoleDefinition[]): Promise<RoleAssignment[]> {
    const defs = definitions ?? (await this.fetchRoleDefinitions());
    const roleNames = new Map(defs.map((d) => [d.id, d.displayName]));

    const [eligibleRaw, activeRaw] = await Promise.all([
      this.graph.getAllPages(`${ROLE_MANAGEMENT}/roleEligibilityScheduleInstances`),
      this.graph.getAllPages(`${ROLE_MANAGEMENT}/roleAssignmentScheduleInstances`),
    ]);

    const eligible = mapRecords(eligibleRaw, "eligible assignment", (r, id, i) => toAssignment(r, id, i, "Eligible", roleNames));
    const active = mapRecords(activeRaw, "active assignment", (r, id, i) => toAssignment(r, id, i, "Active", roleNames));
    this.logger.info(`Retrieved ${eligible.length} eligible and ${active.length} active role assignments`);
    return [...eligible, ...active];
  }

  /** Activation requests created within the last `sinceDays` days. */
  async fetchActivations(sinceDays: number): Promise<RoleActivation[]> {
    const since = new Date(this.clock() - sinceDays * DAY_MS).toISOString();
    const raw = await this.graph.getAllPages(`${ROLE_MANAGEMENT}/roleAssignmentScheduleRequests`, {
      $filter: `createdDateTime ge ${since}`,
    });
    const activations = mapRecords(raw, "activation request", (record, id, index) => ({
      id,
      principalId: requireString(record, "principalId", "activation request", index),
      roleId: requireString(record, "roleDefinitionId", "activation request", index),
      createdAt: readTimestamp(record, "createdDateTime") ?? 0,
      action: readString(record, "action") ?? "",
    })).filter((a) => ACTIVATION_ACTIONS.includes(a.action));
    this.logger.info(`Retrieved ${activations.length} activations from the last ${sinceDays} days`);
    return activations;
  }
}

function toAssignment(
  record: JsonRecord,
  id: string,
  index: number,
  assignmentType: AssignmentType,
  roleNames: ReadonlyMap<string, string>,
): RoleAssignment {
  const entity = assignmentType === "Eligible" ? "eligible assignment" : "active assignment";
  const roleId = requireString(record, "roleDefinitionId", entity, index);
  return {
    id,
    principalId: requireString(record, "principalId", entity, index),
    roleId,
    roleName: roleNames.get(roleId) ?? UNKNOWN_ROLE_NAME,
    assignmentType,
    memberType: readString(record, "memberType") ?? "Direct",
    start: readTimestamp(record, "startDateTime"),
    end: readTimestamp(record, "endDateTime"),
  };
}
