/**
 * Entitlement Analyzer
 *
 * Usage of access packages and catalogs, packages handed out widely without
 * approval or expiration, empty catalogs and assignments about to lapse.
 */

import type { AccessPackage, AccessPackageCatalog, PackageAssignment } from "../repositories/types.js";
import { DAY_MS, roundTo, type Violation } from "../types.js";
import type {
  CatalogUsage,
  EntitlementResult,
  ExpiringAssignment,
  OverPrivilegedPackage,
  PackageUsage,
} from "./types.js";

export type EntitlementInput = {
  packages: readonly AccessPackage[];
  catalogs: readonly AccessPackageCatalog[];
  assignments: readonly PackageAssignment[];
};

export type EntitlementOptions = {
  /** Packages with more assignments than this must require approval and expire. */
  assignmentThreshold?: number;
  expiringWithinDays?: number;
};

export const DEFAULT_ENTITLEMENT_OPTIONS: Required<EntitlementOptions> = {
  assignmentThreshold: 10,
  expiringWithinDays: 30,
};

export function analyzeEntitlements(input: EntitlementInput, now: number, options: EntitlementOptions = {}): EntitlementResult {
  const threshold = options.assignmentThreshold ?? DEFAULT_ENTITLEMENT_OPTIONS.assignmentThreshold;
  const windowDays = options.expiringWithinDays ?? DEFAULT_ENTITLEMENT_OPTIONS.expiringWithinDays;

  const packages = packageUsage(input);
  const catalogs = catalogUsage(input);
  const overPrivileged = packages
    .filter((p) => p.assignmentCount > threshold && (!p.requiresApproval || !p.hasExpiration))
    .map(
      (p): OverPrivilegedPackage => ({
        id: p.id,
        displayName: p.displayName,
        assignmentCount: p.assignmentCount,
        requiresApproval: p.requiresApproval,
        hasExpiration: p.hasExpiration,
        severity: !p.requiresApproval && !p.hasExpiration ? "high" : "medium",
      }),
    )
    .sort((a, b) => b.assignmentCount - a.assignmentCount || a.id.localeCompare(b.id));
  const emptyCatalogs = catalogs.filter((c) => c.packageCount === 0);
  const expiring = expiringAssignments(input.assignments, now, windowDays);

  const totalAssignments = packages.reduce((sum, p) => sum + p.assignmentCount, 0);
  const catalogued = input.packages.filter((p) => p.catalogId !== null).length;

  return {
    summary: {
      totalPackages: packages.length,
      totalCatalogs: catalogs.length,
      totalAssignments,
      averageAssignmentsPerPackage: packages.length === 0 ? 0 : roundTo(totalAssignments / packages.length),
      averagePackagesPerCatalog: catalogs.length === 0 ? 0 : roundTo(catalogued / catalogs.length),
      emptyCatalogs: emptyCatalogs.length,
      overPrivilegedPackages: overPrivileged.length,
      expiringAssignments: expiring.length,
    },
    packages,
    catalogs,
    overPrivileged,
    expiring,
    violations: [
      ...overPrivileged.map(overPrivilegedViolation),
      ...emptyCatalogs.map((c) =>
        Object.freeze({
          kind: "EmptyCatalog" as const,
          severity: "medium" as const,
          subjectRef: `catalog:${c.id}`,
          evidence: Object.freeze({ displayName: c.displayName, catalogType: c.catalogType }),
          recommendation: `Remove the empty catalog "${c.displayName}" or publish its packages.`,
        }),
      ),
      ...expiring.map((e) =>
        Object.freeze({
          kind: "ExpiringAssignment" as const,
          severity: "low" as const,
          subjectRef: `packageAssignment:${e.assignmentId}`,
          evidence: Object.freeze({
            accessPackageId: e.accessPackageId,
            targetId: e.targetId,
            expiresAt: e.expiresAt,
            daysUntilExpiration: e.daysUntilExpiration,
          }),
          recommendation: "Notify the assignee to request renewal if the access is still needed.",
        }),
      ),
    ],
    recommendations: entitlementRecommendations(overPrivileged.length, emptyCatalogs.length, expiring.length, windowDays),
  };
}

function packageUsage(input: EntitlementInput): PackageUsage[] {
  const catalogNames = new Map(input.catalogs.map((c) => [c.id, c.displayName]));
  const assignmentCounts = new Map<string, number>();
  for (const a of input.assignments) {
    if (a.accessPackageId !== null) assignmentCounts.set(a.accessPackageId, (assignmentCounts.get(a.accessPackageId) ?? 0) + 1);
  }

  return input.packages.map((p) => ({
    id: p.id,
    displayName: p.displayName,
    catalog: (p.catalogId !== null ? catalogNames.get(p.catalogId) : undefined) ?? "Unknown",
    isHidden: p.isHidden,
    state: p.state,
    policyCount: p.controls.policyCount,
    assignmentCount: assignmentCounts.get(p.id) ?? 0,
    requiresApproval: p.controls.requiresApproval,
    hasExpiration: p.controls.hasExpiration,
  }));
}

function catalogUsage(input: EntitlementInput): CatalogUsage[] {
  const packageCounts = new Map<string, number>();
  for (const p of input.packages) {
    if (p.catalogId !== null) packageCounts.set(p.catalogId, (packageCounts.get(p.catalogId) ?? 0) + 1);
  }
  return input.catalogs.map((c) => ({
    id: c.id,
    displayName: c.displayName,
    catalogType: c.catalogType,
    state: c.state,
    isExternallyVisible: c.isExternallyVisible,
    packageCount: packageCounts.get(c.id) ?? 0,
  }));
}

/** Whole days left, rounded down; an assignment already past its end is not listed. */
function expiringAssignments(assignments: readonly PackageAssignment[], now: number, windowDays: number): ExpiringAssignment[] {
  const expiring: ExpiringAssignment[] = [];
  for (const a of assignments) {
    if (a.end === null) continue;
    const days = Math.floor((a.end - now) / DAY_MS);
    if (days < 0 || days > windowDays) continue;
    expiring.push({
      assignmentId: a.id,
      targetId: a.targetId,
      accessPackageId: a.accessPackageId,
      expiresAt: new Date(a.end).toISOString(),
      daysUntilExpiration: days,
      state: a.state,
    });
  }
  return expiring.sort((a, b) => a.daysUntilExpiration - b.daysUntilExpiration || a.assignmentId.localeCompare(b.assignmentId));
}

function overPrivilegedViolation(p: OverPrivilegedPackage): Violation {
  const missing = [p.requiresApproval ? null : "an approval step", p.hasExpiration ? null : "an expiration policy"].filter(
    (control): control is string => control !== null,
  );
  return Object.freeze({
    kind: "OverPrivilegedAccessPackage",
    severity: p.severity,
    subjectRef: `accessPackage:${p.id}`,
    evidence: Object.freeze({
      displayName: p.displayName,
      assignmentCount: p.assignmentCount,
      requiresApproval: p.requiresApproval,
      hasExpiration: p.hasExpiration,
    }),
    recommendation: `Add ${missing.join(" and ")} to "${p.displayName}".`,
  });
}

function entitlementRecommendations(overPrivileged: number, emptyCatalogs: number, expiring: number, windowDays: number): string[] {
  const recommendations: string[] = [];
  if (overPrivileged > 0) {
    recommendations.push(`${overPrivileged} access packages lack governance controls. Add approval workflows and expiration policies.`);
  }
  if (emptyCatalogs > 0) {
    recommendations.push(`${emptyCatalogs} empty catalogs should be removed.`);
  }
  if (expiring > 0) {
    recommendations.push(`${expiring} assignments expire within ${windowDays} days. Notify users to renew if needed.`);
  }
  return recommendations;
}
