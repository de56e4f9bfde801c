/**
 * Shared Types
 *
 * Core type definitions used across the access layer, analyzers and report.
 */

// =============================================================================
// Severity & Violations
// =============================================================================

export type Severity = "low" | "medium" | "high" | "critical";

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

export type ViolationKind =
  | "StandingAdminAccess"
  | "ExcessiveRoleAssignments"
  | "DormantEligibility"
  | "CoverageGap"
  | "PolicyConflict"
  | "OverdueReview"
  | "LowReviewerParticipation"
  | "OverPrivilegedAccessPackage"
  | "EmptyCatalog"
  | "ExpiringAssignment";

export const VIOLATION_KINDS: readonly ViolationKind[] = [
  "StandingAdminAccess",
  "ExcessiveRoleAssignments",
  "DormantEligibility",
  "CoverageGap",
  "PolicyConflict",
  "OverdueReview",
  "LowReviewerParticipation",
  "OverPrivilegedAccessPackage",
  "EmptyCatalog",
  "ExpiringAssignment",
];

export type ViolationEvidence = Readonly<Record<string, string | number | boolean | null | readonly string[]>>;

export type Violation = {
  readonly kind: ViolationKind;
  readonly severity: Severity;
  /** Identifier of the offending object, e.g. `principal:<id>` or `policy:<id>`. */
  readonly subjectRef: string;
  readonly evidence: ViolationEvidence;
  readonly recommendation: string;
};

/** Ranking used when ordering violations, highest first. */
export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 3,
  high: 2,
  medium: 1,
  low: 0,
};

// =============================================================================
// Retry
// =============================================================================

export type GraphRetryOptions = {
  /** Retries allowed for 429 / 503-with-Retry-After responses. */
  maxRateLimitAttempts?: number;
  /** Retries allowed for other 5xx responses. */
  maxServerErrorAttempts?: number;
  /** Retries allowed for connection failures and timeouts. */
  maxNetworkAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
};

// =============================================================================
// Common helpers
// =============================================================================

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const DAY_MS = 86_400_000;

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(100, Math.max(0, value));
}

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
