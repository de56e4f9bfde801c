/**
 * Privileged Identity Management Analyzer
 *
 * Standing admin access, excessive privileged role holdings and dormant
 * eligibility, rolled up into a compliance score.
 */

import { AnalyzerError } from "../errors.js";
import type { RoleActivation, RoleAssignment, RoleDefinition } from "../repositories/types.js";
import { DAY_MS, clampScore, roundTo, type Severity, type Violation } from "../types.js";
import type { ActivationStatistics, PimResult, PimUsageSummary, PimViolationKind, RoleCount } from "./types.js";

export type PimOptions = {
  /** Role display names or role/template ids. */
  privilegedRoles: readonly string[];
  excessiveRoleThreshold: number;
  dormancyDays: number;
  permanentThresholdDays: number;
  kindWeights: Record<PimViolationKind, number>;
  severityWeights: Record<Severity, number>;
};

/** Built-in directory roles treated as privileged unless configured otherwise. */
export const DEFAULT_PRIVILEGED_ROLES: readonly string[] = [
  "Global Administrator",
  "Privileged Role Administrator",
  "Security Administrator",
  "Exchange Administrator",
  "SharePoint Administrator",
  "User Administrator",
  "Application Administrator",
  "Cloud Application Administrator",
  // Global Administrator and Privileged Role Administrator templates
  "62e90394-69f5-4237-9190-012177145e10",
  "e8611ab8-c189-46e8-94e1-60213ab1f814",
];

export const DEFAULT_PIM_OPTIONS: PimOptions = {
  privilegedRoles: DEFAULT_PRIVILEGED_ROLES,
  excessiveRoleThreshold: 3,
  dormancyDays: 90,
  permanentThresholdDays: 365,
  kindWeights: { StandingAdminAccess: 2, ExcessiveRoleAssignments: 1, DormantEligibility: 0.5 },
  severityWeights: { low: 1, medium: 2, high: 3, critical: 5 },
};

export type PimInput = {
  assignments: readonly RoleAssignment[];
  activations: readonly RoleActivation[];
  definitions?: readonly RoleDefinition[];
  now: number;
};

export function detectPimViolations(input: PimInput, options: PimOptions): PimResult {
  validateOptions(options);
  const { assignments, activations, now } = input;
  const isPrivileged = privilegedMatcher(options.privilegedRoles, input.definitions ?? []);

  const violations = [
    ...standingAccess(assignments, isPrivileged, now, options.permanentThresholdDays),
    ...excessiveAssignments(assignments, isPrivileged, now, options.excessiveRoleThreshold),
    ...dormantEligibility(assignments, activations, isPrivileged, now, options.dormancyDays),
  ];

  const penalty = violations.reduce((sum, v) => sum + pimWeight(v, options), 0);
  const complianceScore = roundTo(clampScore(100 - penalty));

  const usage = usageSummary(assignments, options.privilegedRoles);
  const activationStats = activationStatistics(activations, assignments, options.dormancyDays);

  return {
    complianceScore,
    violations,
    usage,
    activations: activationStats,
    recommendations: pimRecommendations(violations, usage, options.excessiveRoleThreshold),
  };
}

function validateOptions(options: PimOptions): void {
  if (!Number.isInteger(options.excessiveRoleThreshold) || options.excessiveRoleThreshold < 1) {
    throw new AnalyzerError("pim", `excessiveRoleThreshold must be a positive integer (got ${options.excessiveRoleThreshold})`);
  }
  if (options.dormancyDays <= 0 || options.permanentThresholdDays <= 0) {
    throw new AnalyzerError("pim", "dormancyDays and permanentThresholdDays must be positive");
  }
}

function pimWeight(violation: Violation, options: PimOptions): number {
  switch (violation.kind) {
    case "StandingAdminAccess":
    case "ExcessiveRoleAssignments":
    case "DormantEligibility":
      return options.kindWeights[violation.kind] * options.severityWeights[violation.severity];
    default:
      return 0;
  }
}

// =============================================================================
// Detection
// =============================================================================

type PrivilegedMatcher = (assignment: RoleAssignment) => boolean;

function privilegedMatcher(privilegedRoles: readonly string[], definitions: readonly RoleDefinition[]): PrivilegedMatcher {
  const configured = new Set(privilegedRoles.map((r) => r.toLowerCase()));
  const templateById = new Map(definitions.map((d) => [d.id, d.templateId]));
  return (a) => {
    if (configured.has(a.roleName.toLowerCase()) || configured.has(a.roleId.toLowerCase())) return true;
    const templateId = templateById.get(a.roleId);
    return templateId ? configured.has(templateId.toLowerCase()) : false;
  };
}

function inEffect(a: RoleAssignment, now: number): boolean {
  return (a.start === null || a.start <= now) && (a.end === null || a.end > now);
}

function violation(
  kind: PimViolationKind,
  severity: Severity,
  subjectRef: string,
  evidence: Violation["evidence"],
  recommendation: string,
): Violation {
  return Object.freeze({ kind, severity, subjectRef, evidence: Object.freeze(evidence), recommendation });
}

/** Active privileged assignments with no end, or one further away than the threshold. */
function standingAccess(
  assignments: readonly RoleAssignment[],
  isPrivileged: PrivilegedMatcher,
  now: number,
  thresholdDays: number,
): Violation[] {
  const horizon = thresholdDays * DAY_MS;
  return assignments
    .filter((a) => a.assignmentType === "Active" && isPrivileged(a))
    .filter((a) => a.end === null || a.end - now > horizon)
    .map((a) =>
      violation(
        "StandingAdminAccess",
        "high",
        `assignment:${a.id}`,
        {
          principalId: a.principalId,
          roleId: a.roleId,
          roleName: a.roleName,
          end: a.end === null ? null : new Date(a.end).toISOString(),
          memberType: a.memberType,
        },
        `Convert the ${a.roleName} assignment to a PIM eligible assignment with just-in-time activation.`,
      ),
    );
}

/** Principals holding at least `threshold` distinct privileged roles right now. */
function excessiveAssignments(
  assignments: readonly RoleAssignment[],
  isPrivileged: PrivilegedMatcher,
  now: number,
  threshold: number,
): Violation[] {
  const rolesByPrincipal = new Map<string, Map<string, string>>();
  for (const a of assignments) {
    if (!isPrivileged(a) || !inEffect(a, now)) continue;
    const roles = rolesByPrincipal.get(a.principalId) ?? new Map<string, string>();
    roles.set(a.roleId, a.roleName);
    rolesByPrincipal.set(a.principalId, roles);
  }

  const violations: Violation[] = [];
  for (const principalId of [...rolesByPrincipal.keys()].sort()) {
    const roles = rolesByPrincipal.get(principalId);
    if (!roles || roles.size < threshold) continue;
    violations.push(
      violation(
        "ExcessiveRoleAssignments",
        roles.size >= threshold * 2 ? "high" : "medium",
        `principal:${principalId}`,
        { principalId, roleCount: roles.size, roles: Object.freeze([...roles.values()].sort()) },
        "Review whether every privileged role is still needed and apply least privilege.",
      ),
    );
  }
  return violations;
}

/**
 * Eligible assignments with no activation inside the lookback window.
 * Assignments that started inside the window are exempt; they have not had
 * a full window in which to be used.
 */
function dormantEligibility(
  assignments: readonly RoleAssignment[],
  activations: readonly RoleActivation[],
  isPrivileged: PrivilegedMatcher,
  now: number,
  dormancyDays: number,
): Violation[] {
  const windowStart = now - dormancyDays * DAY_MS;
  const activated = new Set(
    activations.filter((x) => x.createdAt >= windowStart && x.createdAt <= now).map((x) => `${x.principalId}|${x.roleId}`),
  );

  return assignments
    .filter((a) => a.assignmentType === "Eligible")
    .filter((a) => a.end === null || a.end > now)
    .filter((a) => a.start === null || a.start <= windowStart)
    .filter((a) => !activated.has(`${a.principalId}|${a.roleId}`))
    .map((a) =>
      violation(
        "DormantEligibility",
        isPrivileged(a) ? "medium" : "low",
        `assignment:${a.id}`,
        { principalId: a.principalId, roleId: a.roleId, roleName: a.roleName, lookbackDays: dormancyDays },
        `Remove the unused ${a.roleName} eligibility or confirm it is still required.`,
      ),
    );
}

// =============================================================================
// Usage
// =============================================================================

function countBy(items: readonly RoleAssignment[]): RoleCount[] {
  const counts = new Map<string, number>();
  for (const a of items) counts.set(a.roleName, (counts.get(a.roleName) ?? 0) + 1);
  return [...counts.entries()]
    .map(([role, count]) => ({ role, count }))
    .sort((x, y) => y.count - x.count || x.role.localeCompare(y.role));
}

function usageSummary(assignments: readonly RoleAssignment[], privilegedRoles: readonly string[]): PimUsageSummary {
  const eligible = assignments.filter((a) => a.assignmentType === "Eligible");
  const active = assignments.filter((a) => a.assignmentType === "Active");
  const matches = (role: string) => (a: RoleAssignment) => a.roleName === role || a.roleId === role;

  const privileged = privilegedRoles.map((role) => {
    const eligibleCount = eligible.filter(matches(role)).length;
    return { role, eligible: eligibleCount, active: active.filter(matches(role)).length, pimAdoption: eligibleCount > 0 };
  });

  return {
    totalEligible: eligible.length,
    totalActive: active.length,
    eligibleByRole: countBy(eligible).slice(0, 10),
    activeByRole: countBy(active).slice(0, 10),
    privilegedRoles: privileged,
    rolesUsingPim: privileged.filter((p) => p.pimAdoption).length,
  };
}

function activationStatistics(
  activations: readonly RoleActivation[],
  assignments: readonly RoleAssignment[],
  periodDays: number,
): ActivationStatistics {
  const roleNames = new Map(assignments.map((a) => [a.roleId, a.roleName]));
  const byRole = new Map<string, number>();
  for (const x of activations) {
    const name = roleNames.get(x.roleId) ?? x.roleId;
    byRole.set(name, (byRole.get(name) ?? 0) + 1);
  }
  return {
    periodDays,
    totalActivations: activations.length,
    uniquePrincipals: new Set(activations.map((x) => x.principalId)).size,
    uniqueRoles: new Set(activations.map((x) => x.roleId)).size,
    mostActivatedRoles: [...byRole.entries()]
      .map(([role, count]) => ({ role, count }))
      .sort((x, y) => y.count - x.count || x.role.localeCompare(y.role))
      .slice(0, 10),
    averagePerDay: roundTo(activations.length / periodDays),
  };
}

function pimRecommendations(violations: readonly Violation[], usage: PimUsageSummary, threshold: number): string[] {
  const recommendations: string[] = [];
  const standing = violations.filter((v) => v.kind === "StandingAdminAccess").length;
  const excessive = violations.filter((v) => v.kind === "ExcessiveRoleAssignments").length;
  const dormant = violations.filter((v) => v.kind === "DormantEligibility").length;

  if (standing > 0) {
    recommendations.push(`CRITICAL: ${standing} standing admin assignments detected. Convert them to PIM eligible assignments.`);
  }
  if (usage.totalEligible === 0) {
    recommendations.push("CRITICAL: No PIM eligible assignments found. Use PIM for privileged roles to enable just-in-time access.");
  } else if (usage.totalEligible < usage.totalActive) {
    recommendations.push(
      `HIGH: More active (${usage.totalActive}) than eligible (${usage.totalEligible}) assignments. Migrate more roles to eligible assignments.`,
    );
  }
  if (excessive > 0) {
    recommendations.push(`MEDIUM: ${excessive} principals hold ${threshold}+ privileged roles. Review for least privilege.`);
  }
  if (dormant > 0) {
    recommendations.push(`LOW: ${dormant} eligible assignments have not been activated recently. Consider removing them.`);
  }
  recommendations.push("INFO: Require approval for activation of the most critical roles.");
  recommendations.push("INFO: Keep activation durations short (4 to 8 hours).");
  return recommendations;
}
