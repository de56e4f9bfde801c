/**
 * Conditional Access Policy Repository
 */

import { MalformedEntityError } from "../errors.js";
import type { GraphApi } from "../graph/types.js";
import { isRecord, readBoolean, readRecord, readString, readStringArray, readTimestamp, type JsonRecord } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { mapRecords } from "./records.js";
import type { GrantControls, Policy, PolicyConditions, PolicyState } from "./types.js";

export const POLICIES_PATH = "identity/conditionalAccess/policies";

const STATE_MAP: Record<string, PolicyState> = {
  enabled: "enabled",
  disabled: "disabled",
  enabledForReportingButNotEnforced: "reportOnly",
};

export class PolicyRepository {
  private readonly logger: GovernanceLogger;

  constructor(
    private readonly graph: GraphApi,
    logger?: GovernanceLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  /** All conditional access policies, whatever their state. */
  async fetchPolicies(): Promise<Policy[]> {
    this.logger.info("Fetching conditional access policies");
    const raw = await this.graph.getAllPages(POLICIES_PATH);
    const policies = mapRecords(raw, "policy", normalizePolicy);
    this.logger.info(`Retrieved ${policies.length} conditional access policies`);
    return policies;
  }

  async fetchPolicy(policyId: string): Promise<Policy> {
    const raw = await this.graph.request("GET", `${POLICIES_PATH}/${encodeURIComponent(policyId)}`);
    return mapRecords([raw], "policy", normalizePolicy)[0];
  }

  /**
   * Pass-through state change. Issued once; writes are never replayed after a
   * definitive response.
   */
  async setPolicyState(policyId: string, state: PolicyState): Promise<void> {
    const graphState = state === "reportOnly" ? "enabledForReportingButNotEnforced" : state;
    this.logger.info(`Setting policy ${policyId} state to ${graphState}`);
    await this.graph.request("PATCH", `${POLICIES_PATH}/${encodeURIComponent(policyId)}`, { body: { state: graphState } });
  }
}

// =============================================================================
// Normalization
// =============================================================================

export function normalizePolicy(record: JsonRecord, id: string, index: number): Policy {
  const rawState = readString(record, "state") ?? "";
  const state = STATE_MAP[rawState];
  if (!state) throw new MalformedEntityError("policy", "state", index);

  return {
    id,
    displayName: readString(record, "displayName") ?? id,
    state,
    conditions: normalizeConditions(readRecord(record, "conditions")),
    controls: normalizeGrantControls(readRecord(record, "grantControls")),
    sessionControls: enabledSessionControls(readRecord(record, "sessionControls")),
    modifiedAt: readTimestamp(record, "modifiedDateTime") ?? readTimestamp(record, "createdDateTime"),
  };
}

function normalizeConditions(conditions: JsonRecord | undefined): PolicyConditions {
  const users = conditions ? readRecord(conditions, "users") : undefined;
  const applications = conditions ? readRecord(conditions, "applications") : undefined;
  const locations = conditions ? readRecord(conditions, "locations") : undefined;
  const platforms = conditions ? readRecord(conditions, "platforms") : undefined;

  return {
    users: {
      includeUsers: readStringArray(users, "includeUsers"),
      excludeUsers: readStringArray(users, "excludeUsers"),
      includeGroups: readStringArray(users, "includeGroups"),
      excludeGroups: readStringArray(users, "excludeGroups"),
      includeRoles: readStringArray(users, "includeRoles"),
      excludeRoles: readStringArray(users, "excludeRoles"),
    },
    applications: {
      includeApplications: readStringArray(applications, "includeApplications"),
      excludeApplications: readStringArray(applications, "excludeApplications"),
    },
    locations: {
      includeLocations: readStringArray(locations, "includeLocations"),
      excludeLocations: readStringArray(locations, "excludeLocations"),
    },
    clientAppTypes: readStringArray(conditions, "clientAppTypes"),
    userRiskLevels: readStringArray(conditions, "userRiskLevels"),
    signInRiskLevels: readStringArray(conditions, "signInRiskLevels"),
    platforms: readStringArray(platforms, "includePlatforms"),
  };
}

function normalizeGrantControls(grant: JsonRecord | undefined): GrantControls {
  if (!grant) return { operator: "OR", builtInControls: [], authenticationStrength: null };
  const strength = readRecord(grant, "authenticationStrength");
  return {
    operator: readString(grant, "operator")?.toUpperCase() === "AND" ? "AND" : "OR",
    builtInControls: readStringArray(grant, "builtInControls"),
    authenticationStrength: strength ? (readString(strength, "displayName") ?? readString(strength, "id") ?? null) : null,
  };
}

/** Session control names that are present and not explicitly disabled, sorted. */
function enabledSessionControls(session: JsonRecord | undefined): string[] {
  if (!session) return [];
  const names: string[] = [];
  for (const [name, value] of Object.entries(session)) {
    if (value === true || (isRecord(value) && readBoolean(value, "isEnabled") !== false)) {
      names.push(name);
    }
  }
  return names.sort();
}
