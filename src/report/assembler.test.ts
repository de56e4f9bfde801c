/**
 * Report Assembler Tests
 */

import { describe, it, expect } from "vitest";
import { RequestError } from "../errors.js";
import { SAMPLE_NOW as NOW, sampleSections } from "../testing/report-fixtures.js";
import { assembleReport, describeFailure, postureScore, sectionFailed, sortViolations } from "./assembler.js";
import type { ReportSections } from "./types.js";

describe("assembleReport", () => {
  it("merges scores and orders violations by severity, kind and subject", () => {
    const report = assembleReport(sampleSections(), { generatedAt: new Date(NOW) });

    expect(report.generatedAt).toBe("2024-06-01T00:00:00.000Z");
    expect(report.scores).toEqual({ conditionalAccess: 100, pimCompliance: 94, reviewCompletion: 0, posture: 97 });
    expect(report.violations.map((v) => [v.severity, v.kind, v.subjectRef])).toEqual([
      ["high", "OverdueReview", "review:i1"],
      ["high", "StandingAdminAccess", "assignment:a1"],
      ["low", "CoverageGap", "tenant:legacy-authentication"],
      ["low", "CoverageGap", "tenant:location-conditions"],
      ["low", "LowReviewerParticipation", "reviewer:rev-1"],
    ]);
    expect(report.summaryCounts.total).toBe(5);
    expect(report.summaryCounts.bySeverity).toEqual({ critical: 0, high: 2, medium: 0, low: 3 });
    expect(report.summaryCounts.byKind.CoverageGap).toBe(2);
    expect(report.summaryCounts.byKind.PolicyConflict).toBe(0);
    expect(report.degradedSections).toEqual([]);
  });

  it("is deterministic and deeply frozen", () => {
    const first = assembleReport(sampleSections(), { generatedAt: "2024-06-01T00:00:00.000Z" });
    const second = assembleReport(sampleSections(), { generatedAt: "2024-06-01T00:00:00.000Z" });

    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.scores)).toBe(true);
    expect(Object.isFrozen(first.violations)).toBe(true);
    expect(Object.isFrozen(first.violations[0].evidence)).toBe(true);
    expect(Object.isFrozen(first.sections.pim)).toBe(true);
  });

  it("does not share section objects with its input", () => {
    const sections = sampleSections();
    const report = assembleReport(sections, { generatedAt: new Date(NOW) });
    expect(report.sections).toEqual(sections);
    expect(report.sections.pim).not.toBe(sections.pim);
  });

  it("records failed sections and scores only what succeeded", () => {
    const sections: ReportSections = {
      ...sampleSections(),
      pim: sectionFailed(new RequestError("/roleManagement/directory/roleAssignmentScheduleInstances", 403, null)),
    };
    const report = assembleReport(sections, { generatedAt: new Date(NOW) });

    expect(report.scores.pimCompliance).toBeNull();
    expect(report.scores.posture).toBe(100);
    expect(report.degradedSections).toEqual([
      {
        section: "pim",
        error: {
          name: "RequestError",
          code: "REQUEST_FAILED",
          message: "Request to /roleManagement/directory/roleAssignmentScheduleInstances failed with HTTP 403",
        },
      },
    ]);
    expect(report.violations.some((v) => v.kind === "StandingAdminAccess")).toBe(false);
  });

  it("has no posture when no scored section succeeded", () => {
    const sections: ReportSections = {
      ...sampleSections(),
      conditionalAccess: sectionFailed(new Error("directory unavailable")),
      pim: sectionFailed("boom"),
    };
    const report = assembleReport(sections, { generatedAt: new Date(NOW) });

    expect(report.scores.posture).toBeNull();
    expect(report.scores.reviewCompletion).toBe(0);
    expect(report.degradedSections.map((d) => d.section)).toEqual(["conditionalAccess", "pim"]);
  });

  it("applies posture weights", () => {
    const report = assembleReport(sampleSections(), {
      generatedAt: new Date(NOW),
      postureWeights: { conditionalAccess: 0.75, pim: 0.25 },
    });
    expect(report.scores.posture).toBe(98.5);
  });
});

describe("postureScore", () => {
  it("renormalizes over the scores present", () => {
    expect(postureScore(80, 60, { conditionalAccess: 0.5, pim: 0.5 })).toBe(70);
    expect(postureScore(null, 60, { conditionalAccess: 0.5, pim: 0.5 })).toBe(60);
    expect(postureScore(null, null, { conditionalAccess: 0.5, pim: 0.5 })).toBeNull();
    expect(postureScore(80, null, { conditionalAccess: 0, pim: 1 })).toBeNull();
  });
});

describe("describeFailure", () => {
  it("keeps the code of governance errors only", () => {
    expect(describeFailure(new RequestError("/x", 400, null))).toMatchObject({ name: "RequestError", code: "REQUEST_FAILED" });
    expect(describeFailure(new TypeError("bad"))).toEqual({ name: "TypeError", code: null, message: "bad" });
    expect(describeFailure(42)).toEqual({ name: "Error", code: null, message: "42" });
  });
});

describe("sortViolations", () => {
  it("does not mutate its input", () => {
    const input = [
      { kind: "CoverageGap" as const, severity: "low" as const, subjectRef: "b", evidence: {}, recommendation: "" },
      { kind: "CoverageGap" as const, severity: "critical" as const, subjectRef: "a", evidence: {}, recommendation: "" },
    ];
    expect(sortViolations(input).map((v) => v.subjectRef)).toEqual(["a", "b"]);
    expect(input.map((v) => v.subjectRef)).toEqual(["b", "a"]);
  });
});
