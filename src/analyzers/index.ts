export { analyzeCoverage, scorePolicy, DEFAULT_COVERAGE_WEIGHTS, POLICY_SCORE_WEIGHTS } from "./coverage.js";
export type { CoverageOptions } from "./coverage.js";
export { detectConflicts, comparePolicies } from "./conflicts.js";
export { detectPimViolations, DEFAULT_PIM_OPTIONS, DEFAULT_PRIVILEGED_ROLES } from "./pim.js";
export type { PimInput, PimOptions } from "./pim.js";
export { analyzeReviews, DEFAULT_REVIEW_OPTIONS } from "./access-reviews.js";
export type { ReviewOptions } from "./access-reviews.js";
export { analyzeEntitlements, DEFAULT_ENTITLEMENT_OPTIONS } from "./entitlements.js";
export type { EntitlementInput, EntitlementOptions } from "./entitlements.js";
export type * from "./types.js";
