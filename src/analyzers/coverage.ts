/**
 * Conditional Access Coverage Analyzer
 *
 * Scores how completely enabled MFA-equivalent policies protect in-scope
 * users and applications, and reports coverage gaps.
 */

import { AnalyzerError } from "../errors.js";
import type { DirectorySnapshot, DirectoryUser, Policy } from "../repositories/types.js";
import { clampScore, roundTo, type Severity, type Violation } from "../types.js";
import {
  blocksLegacyAuth,
  requiresMfa,
  requiresMfaStrictly,
  resolveApps,
  resolveExcludedUsers,
  resolveUsers,
  usesLocations,
} from "./policy-targets.js";
import type { CoverageResult, CoverageSubScores, CoverageWeights, PolicyScore, PolicyStateSummary } from "./types.js";

export const DEFAULT_COVERAGE_WEIGHTS: CoverageWeights = {
  coverage: 0.4,
  mfaStrictness: 0.3,
  sessionControls: 0.15,
  exclusions: 0.15,
};

/** Points per control family in the per-policy strength score. */
export const POLICY_SCORE_WEIGHTS = {
  mfa: 25,
  deviceCompliance: 20,
  legacyAuth: 20,
  location: 15,
  appProtection: 10,
  sessionControls: 10,
} as const;

export type CoverageOptions = {
  weights?: CoverageWeights;
};

const WEIGHT_TOLERANCE = 1e-6;

export function analyzeCoverage(
  policies: readonly Policy[],
  snapshot: DirectorySnapshot,
  options: CoverageOptions = {},
): CoverageResult {
  const weights = options.weights ?? DEFAULT_COVERAGE_WEIGHTS;
  validateWeights(weights);

  const enabled = policies.filter((p) => p.state === "enabled");
  const reportOnly = policies.filter((p) => p.state === "reportOnly");
  const enforcingMfa = enabled.filter(requiresMfa);
  const reportOnlyMfa = reportOnly.filter(requiresMfa);

  const inScopeUsers = snapshot.users.filter((u) => u.accountEnabled);
  const userIds = new Set(inScopeUsers.map((u) => u.id));
  const appIds = new Set(snapshot.applications.map((a) => a.appId));

  const coveredUsers = intersect(unionOf(enforcingMfa, (p) => resolveUsers(p.conditions.users, snapshot)), userIds);
  const coveredApps = intersect(unionOf(enforcingMfa, (p) => resolveApps(p, snapshot)), appIds);
  const excludedUsers = intersect(unionOf(enforcingMfa, (p) => resolveExcludedUsers(p.conditions.users, snapshot)), userIds);

  const userCoveragePct = percentage(coveredUsers.size, userIds.size);
  const appCoveragePct = percentage(coveredApps.size, appIds.size);

  const subScores = computeSubScores(enabled, enforcingMfa, {
    userCoveragePct,
    appCoveragePct,
    hasUsers: userIds.size > 0,
    hasApps: appIds.size > 0,
    excludedFraction: userIds.size === 0 ? 0 : excludedUsers.size / userIds.size,
  });

  const score = Math.round(
    clampScore(
      subScores.coverage * weights.coverage +
        subScores.mfaStrictness * weights.mfaStrictness +
        subScores.sessionControls * weights.sessionControls +
        subScores.exclusions * weights.exclusions,
    ),
  );

  const reportOnlyUsers = intersect(unionOf(reportOnlyMfa, (p) => resolveUsers(p.conditions.users, snapshot)), userIds);
  const reportOnlyApps = intersect(unionOf(reportOnlyMfa, (p) => resolveApps(p, snapshot)), appIds);

  const violations = [
    ...segmentGaps(inScopeUsers, coveredUsers, reportOnlyUsers),
    ...applicationGaps(snapshot, coveredApps, reportOnlyApps),
    ...bestPracticeGaps(enabled),
  ];

  const policyScores = enabled
    .map((p): PolicyScore => ({ id: p.id, displayName: p.displayName, score: scorePolicy(p), controls: [...p.controls.builtInControls] }))
    .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id));
  const averagePolicyScore =
    policyScores.length === 0 ? 0 : roundTo(policyScores.reduce((sum, p) => sum + p.score, 0) / policyScores.length);

  const summary: PolicyStateSummary = {
    total: policies.length,
    enabled: enabled.length,
    disabled: policies.filter((p) => p.state === "disabled").length,
    reportOnly: reportOnly.length,
  };

  return {
    score,
    subScores,
    userCoveragePct: roundTo(userCoveragePct),
    appCoveragePct: roundTo(appCoveragePct),
    coveredUsers: coveredUsers.size,
    totalUsers: userIds.size,
    coveredApps: coveredApps.size,
    totalApps: appIds.size,
    summary,
    policyScores,
    averagePolicyScore,
    violations,
    recommendations: coverageRecommendations(enabled, summary, policyScores, averagePolicyScore),
  };
}

// =============================================================================
// Scoring
// =============================================================================

function validateWeights(weights: CoverageWeights): void {
  const values = [weights.coverage, weights.mfaStrictness, weights.sessionControls, weights.exclusions];
  if (values.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new AnalyzerError("coverage", "sub-score weights must be non-negative numbers");
  }
  const sum = values.reduce((a, b) => a + b, 0);
  if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
    throw new AnalyzerError("coverage", `sub-score weights must sum to 1 (got ${sum})`);
  }
}

function computeSubScores(
  enabled: readonly Policy[],
  enforcingMfa: readonly Policy[],
  inputs: { userCoveragePct: number; appCoveragePct: number; hasUsers: boolean; hasApps: boolean; excludedFraction: number },
): CoverageSubScores {
  if (enabled.length === 0) {
    return { coverage: 0, mfaStrictness: 0, sessionControls: 0, exclusions: 0 };
  }

  // An empty population contributes nothing rather than counting as 0%.
  const populations = [
    ...(inputs.hasUsers ? [inputs.userCoveragePct] : []),
    ...(inputs.hasApps ? [inputs.appCoveragePct] : []),
  ];
  const coverage = populations.length === 0 ? 0 : populations.reduce((a, b) => a + b, 0) / populations.length;

  const mfaStrictness =
    enforcingMfa.length === 0
      ? 0
      : enforcingMfa.reduce((sum, p) => sum + (requiresMfaStrictly(p) ? 100 : 50), 0) / enforcingMfa.length;

  const withContext = enabled.filter((p) => usesLocations(p) || p.sessionControls.length > 0).length;
  const sessionControls = (withContext / enabled.length) * 100;

  const exclusions = 100 * (1 - inputs.excludedFraction);

  return {
    coverage: roundTo(clampScore(coverage)),
    mfaStrictness: roundTo(clampScore(mfaStrictness)),
    sessionControls: roundTo(clampScore(sessionControls)),
    exclusions: roundTo(clampScore(exclusions)),
  };
}

/** Strength of a single policy's controls, 0..100. */
export function scorePolicy(policy: Policy): number {
  const controls = policy.controls.builtInControls;
  let score = 0;

  if (requiresMfa(policy)) score += POLICY_SCORE_WEIGHTS.mfa;
  if (controls.includes("compliantDevice") || controls.includes("domainJoinedDevice")) {
    score += POLICY_SCORE_WEIGHTS.deviceCompliance;
  }
  if (policy.conditions.clientAppTypes.some((t) => t === "exchangeActiveSync" || t === "other")) {
    // Legacy clients addressed, but an OR grant leaves a way around the requirement.
    score += policy.controls.operator === "OR" && !controls.includes("block")
      ? POLICY_SCORE_WEIGHTS.legacyAuth / 2
      : POLICY_SCORE_WEIGHTS.legacyAuth;
  }
  if (usesLocations(policy)) score += POLICY_SCORE_WEIGHTS.location;
  if (controls.includes("approvedApplication") || controls.includes("compliantApplication")) {
    score += POLICY_SCORE_WEIGHTS.appProtection;
  }
  if (policy.sessionControls.length > 0) score += POLICY_SCORE_WEIGHTS.sessionControls;

  return Math.min(score, 100);
}

// =============================================================================
// Gaps
// =============================================================================

function gap(subjectRef: string, severity: Severity, evidence: Violation["evidence"], recommendation: string): Violation {
  return Object.freeze({ kind: "CoverageGap", severity, subjectRef, evidence: Object.freeze(evidence), recommendation });
}

function segmentGaps(users: readonly DirectoryUser[], covered: ReadonlySet<string>, reportOnly: ReadonlySet<string>): Violation[] {
  const violations: Violation[] = [];
  const segments: Array<[string, DirectoryUser[]]> = [
    ["members", users.filter((u) => u.userType === "Member")],
    ["guests", users.filter((u) => u.userType === "Guest")],
  ];

  for (const [segment, members] of segments) {
    if (members.length === 0 || members.some((u) => covered.has(u.id))) continue;
    const inReportOnly = members.some((u) => reportOnly.has(u.id));
    violations.push(
      gap(
        `segment:${segment}`,
        inReportOnly ? "medium" : "high",
        { segment, users: members.length, reportOnlyCoverage: inReportOnly },
        inReportOnly
          ? `Move the report-only MFA policy covering ${segment} to enforced once sign-in impact has been reviewed.`
          : `Create an enabled conditional access policy requiring MFA for ${segment}.`,
      ),
    );
  }
  return violations;
}

function applicationGaps(snapshot: DirectorySnapshot, covered: ReadonlySet<string>, reportOnly: ReadonlySet<string>): Violation[] {
  return snapshot.applications
    .filter((app) => !covered.has(app.appId))
    .map((app) => {
      const inReportOnly = reportOnly.has(app.appId);
      return gap(
        `app:${app.appId}`,
        inReportOnly ? "medium" : "high",
        { appId: app.appId, displayName: app.displayName, reportOnlyCoverage: inReportOnly },
        inReportOnly
          ? `Enforce the report-only MFA policy that targets ${app.displayName}.`
          : `Include ${app.displayName} in an enabled MFA policy, or target "All" cloud apps.`,
      );
    });
}

function bestPracticeGaps(enabled: readonly Policy[]): Violation[] {
  const violations: Violation[] = [];
  if (!enabled.some((p) => p.sessionControls.length > 0)) {
    violations.push(
      gap("tenant:session-controls", "low", { enabledPolicies: enabled.length }, "Add sign-in frequency or persistent browser session controls for sensitive apps."),
    );
  }
  if (!enabled.some(usesLocations)) {
    violations.push(
      gap("tenant:location-conditions", "low", { enabledPolicies: enabled.length }, "Use named locations to restrict or step up access from untrusted networks."),
    );
  }
  if (!enabled.some(blocksLegacyAuth)) {
    violations.push(
      gap("tenant:legacy-authentication", "low", { enabledPolicies: enabled.length }, "Block legacy authentication clients (Exchange ActiveSync and other clients)."),
    );
  }
  return violations;
}

function coverageRecommendations(
  enabled: readonly Policy[],
  summary: PolicyStateSummary,
  scores: readonly PolicyScore[],
  average: number,
): string[] {
  const recommendations: string[] = [];
  const controls = new Set(enabled.flatMap((p) => p.controls.builtInControls));

  if (!enabled.some(requiresMfa)) {
    recommendations.push("CRITICAL: No enabled policy requires MFA. Require MFA for all users, or at least for risky sign-ins.");
  }
  if (!enabled.some(blocksLegacyAuth)) {
    recommendations.push("HIGH: Legacy authentication is not blocked. Add a policy blocking legacy client app types.");
  }
  if (!controls.has("compliantDevice")) {
    recommendations.push("MEDIUM: No policy checks device compliance. Consider requiring compliant devices for privileged access.");
  }
  if (enabled.length < 3) {
    recommendations.push(`LOW: Only ${enabled.length} policies enabled. Consider more granular controls.`);
  }
  if (summary.reportOnly > 0) {
    recommendations.push(`INFO: ${summary.reportOnly} policies are in report-only mode. Review them for enforcement.`);
  }
  if (scores.length > 0 && average < 60) {
    recommendations.push("Overall policy strength is weak. Combine MFA with device compliance requirements.");
  } else if (scores.length > 0 && average < 80) {
    recommendations.push("Solid baseline. Add location-based controls and app protection to strengthen it.");
  }
  const weak = scores.filter((p) => p.score < 50);
  if (weak.length > 0) {
    recommendations.push(`${weak.length} policies have weak controls. Review: ${weak.slice(0, 3).map((p) => p.displayName).join(", ")}`);
  }
  return recommendations;
}

// =============================================================================
// Set helpers
// =============================================================================

function unionOf<T>(items: readonly T[], select: (item: T) => Set<string>): Set<string> {
  const result = new Set<string>();
  for (const item of items) for (const id of select(item)) result.add(id);
  return result;
}

function intersect(a: ReadonlySet<string>, b: ReadonlySet<string>): Set<string> {
  return new Set([...a].filter((v) => b.has(v)));
}

function percentage(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}
