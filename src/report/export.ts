/**
 * Report Export
 *
 * Renders an assembled report for external consumers:
 *   - JSON:      the full report, stable key order
 *   - CSV:       one row per violation
 *   - Markdown:  executive summary with scores, counts and top findings
 *
 * Rendering is pure; writing files is left to the caller.
 */

import { SEVERITIES, VIOLATION_KINDS, type Violation } from "../types.js";
import type { Report } from "./types.js";

export type ReportExportFormat = "json" | "csv" | "markdown";

export type ReportExportResult = {
  format: ReportExportFormat;
  content: string;
  violationCount: number;
};

// =============================================================================
// CSV
// =============================================================================

/** Escape a CSV field value. */
function csvEscape(value: string): string {
  if (value.includes(",") || value.includes('"') || value.includes("\n")) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function evidenceText(violation: Violation): string {
  return Object.entries(violation.evidence)
    .map(([key, value]) => `${key}=${Array.isArray(value) ? value.join("|") : String(value)}`)
    .join(";");
}

export function exportViolationsCsv(violations: readonly Violation[]): string {
  const rows = [["severity", "kind", "subject", "recommendation", "evidence"].join(",")];
  for (const v of violations) {
    rows.push(
      [csvEscape(v.severity), csvEscape(v.kind), csvEscape(v.subjectRef), csvEscape(v.recommendation), csvEscape(evidenceText(v))].join(","),
    );
  }
  return rows.join("\n");
}

// =============================================================================
// Markdown
// =============================================================================

function formatScore(score: number | null): string {
  return score === null ? "n/a" : String(score);
}

export function exportMarkdown(report: Report, options: { maxFindings?: number } = {}): string {
  const maxFindings = options.maxFindings ?? 20;
  const lines: string[] = [];

  lines.push("# Identity Governance Report");
  lines.push("");
  lines.push(`Generated: ${report.generatedAt}`);
  lines.push("");

  lines.push("## Scores");
  lines.push("");
  lines.push("| Area | Score |");
  lines.push("| --- | --- |");
  lines.push(`| Posture | ${formatScore(report.scores.posture)} |`);
  lines.push(`| Conditional access | ${formatScore(report.scores.conditionalAccess)} |`);
  lines.push(`| PIM compliance | ${formatScore(report.scores.pimCompliance)} |`);
  lines.push(`| Review completion (%) | ${formatScore(report.scores.reviewCompletion)} |`);
  lines.push("");

  lines.push("## Violations");
  lines.push("");
  lines.push("| Severity | Count |");
  lines.push("| --- | --- |");
  for (const severity of SEVERITIES) {
    lines.push(`| ${severity} | ${report.summaryCounts.bySeverity[severity]} |`);
  }
  lines.push("");

  const kinds = VIOLATION_KINDS.filter((k) => report.summaryCounts.byKind[k] > 0);
  if (kinds.length > 0) {
    for (const kind of kinds) lines.push(`- ${kind}: ${report.summaryCounts.byKind[kind]}`);
    lines.push("");
  }

  if (report.violations.length > 0) {
    lines.push("## Top Findings");
    lines.push("");
    for (const v of report.violations.slice(0, maxFindings)) {
      lines.push(`- **${v.severity.toUpperCase()}** ${v.kind} \`${v.subjectRef}\`: ${v.recommendation}`);
    }
    if (report.violations.length > maxFindings) {
      lines.push(`- ... and ${report.violations.length - maxFindings} more`);
    }
    lines.push("");
  }

  if (report.degradedSections.length > 0) {
    lines.push("## Degraded Sections");
    lines.push("");
    for (const d of report.degradedSections) {
      lines.push(`- ${d.section}: ${d.error.name}: ${d.error.message}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

// =============================================================================
// Main Export Function
// =============================================================================

export function exportReport(report: Report, format: ReportExportFormat): ReportExportResult {
  let content: string;
  switch (format) {
    case "json":
      content = JSON.stringify(report, null, 2);
      break;
    case "csv":
      content = exportViolationsCsv(report.violations);
      break;
    case "markdown":
      content = exportMarkdown(report);
      break;
  }
  return { format, content, violationCount: report.violations.length };
}
