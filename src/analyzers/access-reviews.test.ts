/**
 * Access Review Analyzer Tests
 */

import { describe, it, expect } from "vitest";
import { decision, reviewInstance } from "../testing/builders.js";
import { DAY_MS } from "../types.js";
import { analyzeReviews } from "./access-reviews.js";

const NOW = Date.parse("2024-06-01T00:00:00Z");

describe("analyzeReviews", () => {
  const overdue = reviewInstance("i1", [decision("x1", "approve", "rev-1"), decision("x2", "none", null)], {
    end: NOW - 10 * DAY_MS,
    reviewers: ["rev-1", "rev-2"],
  });
  const done = reviewInstance("i2", [decision("y1", "approve", "rev-1"), decision("y2", "deny", "rev-1")], {
    status: "Completed",
    end: NOW - 20 * DAY_MS,
  });

  it("computes completion per instance and overall", () => {
    const result = analyzeReviews([overdue, done], NOW);

    expect(result.overallCompletionRate).toBe(0.75);
    expect(result.instances.map((i) => [i.id, i.completionRate, i.overdue, i.daysOverdue])).toEqual([
      ["i1", 0.5, true, 10],
      ["i2", 1, false, 0],
    ]);
    expect(result.statusCounts).toEqual({ NotStarted: 0, InProgress: 1, Completed: 1 });
    expect(result.pendingInstances).toEqual(["i1"]);
    expect(result.overdueInstances).toEqual(["i1"]);
  });

  it("flags overdue instances by how late they are", () => {
    const result = analyzeReviews([overdue], NOW);
    const late = result.violations.find((v) => v.kind === "OverdueReview");
    expect(late).toMatchObject({ severity: "high", subjectRef: "review:i1" });
    expect(late?.evidence.daysOverdue).toBe(10);

    const slightlyLate = reviewInstance("i3", [], { end: NOW - 1.5 * DAY_MS });
    const medium = analyzeReviews([slightlyLate], NOW).violations;
    expect(medium.map((v) => [v.severity, v.evidence.daysOverdue])).toEqual([["medium", 1.5]]);
  });

  it("does not flag an instance before its end", () => {
    const open = reviewInstance("i4", [decision("z1", "none", "rev-1")], { end: NOW + DAY_MS });
    expect(analyzeReviews([open], NOW).overdueInstances).toEqual([]);
  });

  it("measures reviewer participation", () => {
    const result = analyzeReviews([overdue, done], NOW);

    expect(result.reviewers).toEqual([
      { reviewerId: "rev-1", decisionsMade: 3, decisionsAssigned: 4, participationRate: 0.75, rating: "Needs Improvement" },
      { reviewerId: "rev-2", decisionsMade: 0, decisionsAssigned: 1, participationRate: 0, rating: "Needs Improvement" },
    ]);
    expect(result.violations.filter((v) => v.kind === "LowReviewerParticipation").map((v) => v.subjectRef)).toEqual([
      "reviewer:rev-1",
      "reviewer:rev-2",
    ]);
  });

  it("honours a custom participation threshold", () => {
    const result = analyzeReviews([overdue, done], NOW, { participationThreshold: 0.5 });
    expect(result.reviewers.map((r) => r.rating)).toEqual(["Good", "Needs Improvement"]);
  });

  it("treats no required decisions as complete", () => {
    const result = analyzeReviews([], NOW);
    expect(result.overallCompletionRate).toBe(1);
    expect(result.violations).toEqual([]);
    expect(result.recommendations).toEqual([]);
  });

  it("recommends escalation for low completion and overdue reviews", () => {
    expect(analyzeReviews([overdue, done], NOW).recommendations).toEqual([
      "Completion rate is below 80%. Send reminders to reviewers and define an escalation path.",
      "1 reviews are overdue. Immediate action required.",
    ]);
  });
});
