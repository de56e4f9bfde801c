/**
 * Analyzer Result Types
 */

import type { Severity, Violation } from "../types.js";

// =============================================================================
// Coverage
// =============================================================================

export type CoverageWeights = {
  coverage: number;
  mfaStrictness: number;
  sessionControls: number;
  exclusions: number;
};

export type CoverageSubScores = CoverageWeights;

export type PolicyScore = {
  id: string;
  displayName: string;
  score: number;
  controls: string[];
};

export type PolicyStateSummary = {
  total: number;
  enabled: number;
  disabled: number;
  reportOnly: number;
};

export type CoverageResult = {
  /** Weighted 0..100 posture of the conditional access configuration, integer. */
  score: number;
  subScores: CoverageSubScores;
  userCoveragePct: number;
  appCoveragePct: number;
  coveredUsers: number;
  totalUsers: number;
  coveredApps: number;
  totalApps: number;
  summary: PolicyStateSummary;
  policyScores: PolicyScore[];
  averagePolicyScore: number;
  violations: Violation[];
  recommendations: string[];
};

// =============================================================================
// Conflicts
// =============================================================================

export type ConflictType = "contradictory" | "redundant" | "operator-mismatch";

export type PolicyConflict = {
  type: ConflictType;
  severity: Severity;
  /** Lower policy id of the pair. */
  policyA: string;
  policyB: string;
  policyNames: [string, string];
  description: string;
  recommendation: string;
};

export type ConflictResult = {
  conflicts: PolicyConflict[];
  violations: Violation[];
};

// =============================================================================
// PIM
// =============================================================================

export type PimViolationKind = "StandingAdminAccess" | "ExcessiveRoleAssignments" | "DormantEligibility";

export type PrivilegedRoleUsage = {
  role: string;
  eligible: number;
  active: number;
  pimAdoption: boolean;
};

export type RoleCount = { role: string; count: number };

export type PimUsageSummary = {
  totalEligible: number;
  totalActive: number;
  eligibleByRole: RoleCount[];
  activeByRole: RoleCount[];
  privilegedRoles: PrivilegedRoleUsage[];
  rolesUsingPim: number;
};

export type ActivationStatistics = {
  periodDays: number;
  totalActivations: number;
  uniquePrincipals: number;
  uniqueRoles: number;
  mostActivatedRoles: RoleCount[];
  averagePerDay: number;
};

export type PimResult = {
  complianceScore: number;
  violations: Violation[];
  usage: PimUsageSummary;
  activations: ActivationStatistics;
  recommendations: string[];
};

// =============================================================================
// Access Reviews
// =============================================================================

export type InstanceCompletion = {
  id: string;
  displayName: string;
  status: string;
  decisionsRequired: number;
  decisionsCompleted: number;
  completionRate: number;
  overdue: boolean;
  daysOverdue: number;
};

export type ReviewerParticipation = {
  reviewerId: string;
  decisionsMade: number;
  decisionsAssigned: number;
  participationRate: number;
  rating: "Good" | "Needs Improvement";
};

export type ReviewResult = {
  overallCompletionRate: number;
  statusCounts: Record<"NotStarted" | "InProgress" | "Completed", number>;
  instances: InstanceCompletion[];
  pendingInstances: string[];
  overdueInstances: string[];
  reviewers: ReviewerParticipation[];
  violations: Violation[];
  recommendations: string[];
};

// =============================================================================
// Entitlements
// =============================================================================

export type PackageUsage = {
  id: string;
  displayName: string;
  /** Catalog display name, or "Unknown" when the catalog was not found. */
  catalog: string;
  isHidden: boolean;
  state: string | null;
  policyCount: number;
  assignmentCount: number;
  requiresApproval: boolean;
  hasExpiration: boolean;
};

export type CatalogUsage = {
  id: string;
  displayName: string;
  catalogType: string | null;
  state: string | null;
  isExternallyVisible: boolean;
  packageCount: number;
};

export type OverPrivilegedPackage = {
  id: string;
  displayName: string;
  assignmentCount: number;
  requiresApproval: boolean;
  hasExpiration: boolean;
  severity: Severity;
};

export type ExpiringAssignment = {
  assignmentId: string;
  targetId: string | null;
  accessPackageId: string | null;
  expiresAt: string;
  daysUntilExpiration: number;
  state: string | null;
};

export type EntitlementSummary = {
  totalPackages: number;
  totalCatalogs: number;
  totalAssignments: number;
  averageAssignmentsPerPackage: number;
  averagePackagesPerCatalog: number;
  emptyCatalogs: number;
  overPrivilegedPackages: number;
  expiringAssignments: number;
};

export type EntitlementResult = {
  summary: EntitlementSummary;
  packages: PackageUsage[];
  catalogs: CatalogUsage[];
  /** Most assignments first. */
  overPrivileged: OverPrivilegedPackage[];
  /** Soonest first. */
  expiring: ExpiringAssignment[];
  violations: Violation[];
  recommendations: string[];
};
