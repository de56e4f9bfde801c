/**
 * Report Assembler
 *
 * Pure merge of analyzer section results into one report. Equal inputs give a
 * deep-equal, deeply frozen report.
 */

import { isGovernanceError } from "../errors.js";
import { SEVERITY_RANK, roundTo, type Severity, type Violation, type ViolationKind } from "../types.js";
import {
  SECTION_NAMES,
  type DegradedSection,
  type PostureWeights,
  type Report,
  type ReportScores,
  type ReportSections,
  type SectionFailure,
  type SectionResult,
  type SummaryCounts,
} from "./types.js";

export const DEFAULT_POSTURE_WEIGHTS: PostureWeights = { conditionalAccess: 0.5, pim: 0.5 };

export type AssembleOptions = {
  generatedAt: Date | string;
  postureWeights?: PostureWeights;
};

export function sectionOk<T>(value: T): SectionResult<T> {
  return { status: "ok", value };
}

export function sectionFailed<T>(error: unknown): SectionResult<T> {
  return { status: "failed", error: describeFailure(error) };
}

export function describeFailure(error: unknown): SectionFailure {
  if (isGovernanceError(error)) return { name: error.name, code: error.code, message: error.message };
  if (error instanceof Error) return { name: error.name, code: null, message: error.message };
  return { name: "Error", code: null, message: String(error) };
}

export function assembleReport(sections: ReportSections, options: AssembleOptions): Report {
  const generatedAt = typeof options.generatedAt === "string" ? options.generatedAt : options.generatedAt.toISOString();
  const weights = options.postureWeights ?? DEFAULT_POSTURE_WEIGHTS;

  const violations = sortViolations(collectViolations(sections));
  const degradedSections: DegradedSection[] = [];
  for (const name of SECTION_NAMES) {
    const section = sections[name];
    if (section.status === "failed") degradedSections.push({ section: name, error: { ...section.error } });
  }

  const conditionalAccess = sections.conditionalAccess.status === "ok" ? sections.conditionalAccess.value.score : null;
  const pimCompliance = sections.pim.status === "ok" ? sections.pim.value.complianceScore : null;
  const reviewCompletion =
    sections.accessReviews.status === "ok" ? roundTo(sections.accessReviews.value.overallCompletionRate * 100) : null;

  const scores: ReportScores = {
    conditionalAccess,
    pimCompliance,
    reviewCompletion,
    posture: postureScore(conditionalAccess, pimCompliance, weights),
  };

  return deepFreeze({
    generatedAt,
    scores,
    violations,
    summaryCounts: countViolations(violations),
    sections: structuredClone(sections),
    degradedSections,
  });
}

function collectViolations(sections: ReportSections): Violation[] {
  const all: Violation[] = [];
  for (const name of SECTION_NAMES) {
    const section = sections[name];
    if (section.status === "ok") all.push(...section.value.violations);
  }
  return all;
}

/** Severity descending, then kind, then subject. */
export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      compareText(a.kind, b.kind) ||
      compareText(a.subjectRef, b.subjectRef),
  );
}

// Locale-independent so ordering is stable across hosts.
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function countViolations(violations: readonly Violation[]): SummaryCounts {
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  const byKind: Record<ViolationKind, number> = {
    StandingAdminAccess: 0,
    ExcessiveRoleAssignments: 0,
    DormantEligibility: 0,
    CoverageGap: 0,
    PolicyConflict: 0,
    OverdueReview: 0,
    LowReviewerParticipation: 0,
    OverPrivilegedAccessPackage: 0,
    EmptyCatalog: 0,
    ExpiringAssignment: 0,
  };
  for (const v of violations) {
    bySeverity[v.severity]++;
    byKind[v.kind]++;
  }
  return { total: violations.length, bySeverity, byKind };
}

/** Weighted mean renormalised over the scores that exist. */
export function postureScore(ca: number | null, pim: number | null, weights: PostureWeights): number | null {
  const parts: Array<[number, number]> = [];
  if (ca !== null) parts.push([ca, weights.conditionalAccess]);
  if (pim !== null) parts.push([pim, weights.pim]);
  const totalWeight = parts.reduce((sum, [, w]) => sum + w, 0);
  if (parts.length === 0 || totalWeight === 0) return null;
  return roundTo(parts.reduce((sum, [score, w]) => sum + score * w, 0) / totalWeight);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
