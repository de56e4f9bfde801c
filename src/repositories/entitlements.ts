/**
 * Entitlement Repository
 *
 * Access packages, catalogs and package assignments from entitlement
 * management. Assignment policies of all packages are read in one $batch
 * round.
 */

import type { GraphApi } from "../graph/types.js";
import { isRecord, readBoolean, readRecord, readString, readTimestamp, type JsonRecord } from "../json.js";
import { createSilentLogger, type GovernanceLogger } from "../logging/index.js";
import { mapRecords, readBatchCollection } from "./records.js";
import type { AccessPackage, AccessPackageCatalog, PackageAssignment, PackageControls } from "./types.js";

export const ENTITLEMENT_MANAGEMENT = "identityGovernance/entitlementManagement";

export type EntitlementData = {
  packages: AccessPackage[];
  catalogs: AccessPackageCatalog[];
  assignments: PackageAssignment[];
};

export class EntitlementRepository {
  private readonly logger: GovernanceLogger;

  constructor(
    private readonly graph: GraphApi,
    logger?: GovernanceLogger,
  ) {
    this.logger = logger ?? createSilentLogger();
  }

  async fetchEntitlements(): Promise<EntitlementData> {
    const [packages, catalogs, assignments] = await Promise.all([
      this.fetchAccessPackages(),
      this.fetchCatalogs(),
      this.fetchAssignments(),
    ]);
    return { packages, catalogs, assignments };
  }

  /** Packages with the controls of their assignment policies. */
  async fetchAccessPackages(): Promise<AccessPackage[]> {
    const raw = await this.graph.getAllPages(`${ENTITLEMENT_MANAGEMENT}/accessPackages`, { $expand: "catalog($select=id)" });
    const records = mapRecords(raw, "access package", (record, id) => ({ record, id }));
    this.logger.info(`Retrieved ${records.length} access packages`);
    if (records.length === 0) return [];

    const policyResults = await this.graph.batch(
      records.map(({ id }) => ({
        id,
        method: "GET" as const,
        path: `${ENTITLEMENT_MANAGEMENT}/accessPackages/${encodeURIComponent(id)}/assignmentPolicies`,
      })),
    );

    const packages: AccessPackage[] = [];
    for (const [i, { record, id }] of records.entries()) {
      const policies = await readBatchCollection(this.graph, policyResults[i]);
      packages.push(normalizeAccessPackage(record, id, policies));
    }
    return packages;
  }

  async fetchCatalogs(): Promise<AccessPackageCatalog[]> {
    const raw = await this.graph.getAllPages(`${ENTITLEMENT_MANAGEMENT}/catalogs`);
    const catalogs = mapRecords(raw, "access package catalog", (record, id): AccessPackageCatalog => ({
      id,
      displayName: readString(record, "displayName") ?? id,
      description: readString(record, "description") ?? null,
      catalogType: readString(record, "catalogType") ?? null,
      state: readString(record, "state") ?? null,
      isExternallyVisible: readBoolean(record, "isExternallyVisible") ?? false,
    }));
    this.logger.info(`Retrieved ${catalogs.length} catalogs`);
    return catalogs;
  }

  async fetchAssignments(): Promise<PackageAssignment[]> {
    const raw = await this.graph.getAllPages(`${ENTITLEMENT_MANAGEMENT}/assignments`, {
      $expand: "accessPackage($select=id),target($select=id)",
    });
    const assignments = mapRecords(raw, "access package assignment", normalizeAssignment);
    this.logger.info(`Retrieved ${assignments.length} access package assignments`);
    return assignments;
  }
}

// =============================================================================
// Normalization
// =============================================================================

/** Id of an expanded navigation property, or of its flat `<name>Id` field. */
function relatedId(record: JsonRecord, property: string): string | null {
  const related = readRecord(record, property);
  return (related ? readString(related, "id") : undefined) ?? readString(record, `${property}Id`) ?? null;
}

export function normalizeAccessPackage(record: JsonRecord, id: string, policies: readonly unknown[]): AccessPackage {
  return {
    id,
    displayName: readString(record, "displayName") ?? id,
    catalogId: relatedId(record, "catalog"),
    isHidden: readBoolean(record, "isHidden") ?? false,
    state: readString(record, "state") ?? null,
    controls: packageControls(policies),
  };
}

export function packageControls(policies: readonly unknown[]): PackageControls {
  const records = policies.filter(isRecord);
  return {
    policyCount: records.length,
    requiresApproval: records.some(requiresApproval),
    hasExpiration: records.some(hasExpiration),
  };
}

function requiresApproval(policy: JsonRecord): boolean {
  const settings = readRecord(policy, "requestApprovalSettings");
  if (!settings) return false;
  return readBoolean(settings, "isApprovalRequiredForAdd") === true || readBoolean(settings, "isApprovalRequired") === true;
}

/**
 * `expiration.type` other than `noExpiration`, or the older
 * `requestorSettings.expirationSettings.expirationDuration`.
 */
function hasExpiration(policy: JsonRecord): boolean {
  const expiration = readRecord(policy, "expiration");
  const type = expiration ? readString(expiration, "type") : undefined;
  if (type !== undefined) return type !== "noExpiration";

  const requestor = readRecord(policy, "requestorSettings");
  const settings = requestor ? readRecord(requestor, "expirationSettings") : undefined;
  return settings !== undefined && Boolean(readString(settings, "expirationDuration"));
}

function normalizeAssignment(record: JsonRecord, id: string): PackageAssignment {
  const schedule = readRecord(record, "schedule");
  const expiration = schedule ? readRecord(schedule, "expiration") : undefined;
  return {
    id,
    accessPackageId: relatedId(record, "accessPackage"),
    targetId: relatedId(record, "target"),
    state: readString(record, "state") ?? null,
    end: readTimestamp(expiration, "endDateTime"),
  };
}
