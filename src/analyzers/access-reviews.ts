/**
 * Access Review Analyzer
 */

import type { ReviewInstance } from "../repositories/types.js";
import { DAY_MS, roundTo, type Violation } from "../types.js";
import type { InstanceCompletion, ReviewResult, ReviewerParticipation } from "./types.js";

export type ReviewOptions = {
  participationThreshold?: number;
  overdueHighAfterDays?: number;
};

export const DEFAULT_REVIEW_OPTIONS: Required<ReviewOptions> = {
  participationThreshold: 0.8,
  overdueHighAfterDays: 7,
};

/** Pending instances beyond this count earn a reminder recommendation. */
const PENDING_REMINDER_THRESHOLD = 5;

export function analyzeReviews(instances: readonly ReviewInstance[], now: number, options: ReviewOptions = {}): ReviewResult {
  const threshold = options.participationThreshold ?? DEFAULT_REVIEW_OPTIONS.participationThreshold;
  const highAfterDays = options.overdueHighAfterDays ?? DEFAULT_REVIEW_OPTIONS.overdueHighAfterDays;

  const completions = instances.map((instance) => completionOf(instance, now));
  const required = instances.reduce((sum, i) => sum + i.decisionsRequired, 0);
  const completed = instances.reduce((sum, i) => sum + i.decisionsCompleted, 0);
  const overallCompletionRate = required === 0 ? 1 : roundTo(completed / required, 4);

  const statusCounts = { NotStarted: 0, InProgress: 0, Completed: 0 };
  for (const instance of instances) statusCounts[instance.status]++;

  const overdue = completions.filter((c) => c.overdue);
  const reviewers = reviewerParticipation(instances, threshold);

  const violations: Violation[] = [
    ...overdue.map((c) =>
      Object.freeze({
        kind: "OverdueReview" as const,
        severity: c.daysOverdue > highAfterDays ? ("high" as const) : ("medium" as const),
        subjectRef: `review:${c.id}`,
        evidence: Object.freeze({
          displayName: c.displayName,
          daysOverdue: c.daysOverdue,
          decisionsCompleted: c.decisionsCompleted,
          decisionsRequired: c.decisionsRequired,
        }),
        recommendation: `Escalate "${c.displayName}" to its reviewers or apply the default decision.`,
      }),
    ),
    ...reviewers
      .filter((r) => r.participationRate < threshold)
      .map((r) =>
        Object.freeze({
          kind: "LowReviewerParticipation" as const,
          severity: "low" as const,
          subjectRef: `reviewer:${r.reviewerId}`,
          evidence: Object.freeze({
            decisionsMade: r.decisionsMade,
            decisionsAssigned: r.decisionsAssigned,
            participationRate: r.participationRate,
          }),
          recommendation: "Remind the reviewer of outstanding decisions or assign a backup reviewer.",
        }),
      ),
  ];

  const pendingInstances = instances
    .filter((i) => i.status !== "Completed" && i.decisionsCompleted < i.decisionsRequired)
    .map((i) => i.id);

  return {
    overallCompletionRate,
    statusCounts,
    instances: completions,
    pendingInstances,
    overdueInstances: overdue.map((c) => c.id),
    reviewers,
    violations,
    recommendations: reviewRecommendations(overallCompletionRate, overdue.length, pendingInstances.length),
  };
}

function completionOf(instance: ReviewInstance, now: number): InstanceCompletion {
  const overdue = instance.status !== "Completed" && instance.end !== null && now > instance.end;
  return {
    id: instance.id,
    displayName: instance.displayName,
    status: instance.status,
    decisionsRequired: instance.decisionsRequired,
    decisionsCompleted: instance.decisionsCompleted,
    completionRate: instance.decisionsRequired === 0 ? 1 : roundTo(instance.decisionsCompleted / instance.decisionsRequired, 4),
    overdue,
    daysOverdue: overdue && instance.end !== null ? roundTo((now - instance.end) / DAY_MS) : 0,
  };
}

/**
 * Decisions made versus decisions assigned, per reviewer. A decided item is
 * assigned to whoever decided it; an undecided item to its named reviewer, or
 * to every contacted reviewer when none is named.
 */
function reviewerParticipation(instances: readonly ReviewInstance[], threshold: number): ReviewerParticipation[] {
  const made = new Map<string, number>();
  const assigned = new Map<string, number>();
  const bump = (map: Map<string, number>, key: string) => map.set(key, (map.get(key) ?? 0) + 1);

  for (const instance of instances) {
    for (const decision of Object.values(instance.decisions)) {
      if (decision.outcome !== "none") {
        if (decision.reviewerId === null) continue;
        bump(made, decision.reviewerId);
        bump(assigned, decision.reviewerId);
      } else if (decision.reviewerId !== null) {
        bump(assigned, decision.reviewerId);
      } else {
        for (const reviewerId of instance.reviewers) bump(assigned, reviewerId);
      }
    }
  }

  return [...assigned.entries()]
    .map(([reviewerId, decisionsAssigned]): ReviewerParticipation => {
      const decisionsMade = made.get(reviewerId) ?? 0;
      const participationRate = roundTo(decisionsMade / decisionsAssigned, 4);
      return {
        reviewerId,
        decisionsMade,
        decisionsAssigned,
        participationRate,
        rating: participationRate >= threshold ? "Good" : "Needs Improvement",
      };
    })
    .sort((a, b) => b.participationRate - a.participationRate || a.reviewerId.localeCompare(b.reviewerId));
}

function reviewRecommendations(completionRate: number, overdue: number, pending: number): string[] {
  const recommendations: string[] = [];
  if (completionRate < 0.8) {
    recommendations.push("Completion rate is below 80%. Send reminders to reviewers and define an escalation path.");
  }
  if (overdue > 0) {
    recommendations.push(`${overdue} reviews are overdue. Immediate action required.`);
  }
  if (pending > PENDING_REMINDER_THRESHOLD) {
    recommendations.push(`${pending} reviews are pending. Consider automated reminders.`);
  }
  return recommendations;
}
