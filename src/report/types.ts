/**
 * Report Types
 */

import type { ConflictResult, CoverageResult, EntitlementResult, PimResult, ReviewResult } from "../analyzers/types.js";
import type { Severity, Violation, ViolationKind } from "../types.js";

export type SectionName = "conditionalAccess" | "conflicts" | "pim" | "accessReviews" | "entitlements";

export const SECTION_NAMES: readonly SectionName[] = ["conditionalAccess", "conflicts", "pim", "accessReviews", "entitlements"];

export type SectionFailure = {
  name: string;
  code: string | null;
  message: string;
};

export type SectionResult<T> = { status: "ok"; value: T } | { status: "failed"; error: SectionFailure };

export type ReportSections = {
  conditionalAccess: SectionResult<CoverageResult>;
  conflicts: SectionResult<ConflictResult>;
  pim: SectionResult<PimResult>;
  accessReviews: SectionResult<ReviewResult>;
  entitlements: SectionResult<EntitlementResult>;
};

export type DegradedSection = {
  section: SectionName;
  error: SectionFailure;
};

export type ReportScores = {
  conditionalAccess: number | null;
  pimCompliance: number | null;
  reviewCompletion: number | null;
  /** Weighted posture over the sections that succeeded; null when none did. */
  posture: number | null;
};

export type SummaryCounts = {
  total: number;
  bySeverity: Record<Severity, number>;
  byKind: Record<ViolationKind, number>;
};

export type Report = {
  generatedAt: string;
  scores: ReportScores;
  violations: Violation[];
  summaryCounts: SummaryCounts;
  sections: ReportSections;
  degradedSections: DegradedSection[];
};

export type PostureWeights = {
  conditionalAccess: number;
  pim: number;
};
