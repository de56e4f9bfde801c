export {
  assembleReport,
  describeFailure,
  postureScore,
  sectionFailed,
  sectionOk,
  sortViolations,
  DEFAULT_POSTURE_WEIGHTS,
} from "./assembler.js";
export type { AssembleOptions } from "./assembler.js";
export { exportReport, exportMarkdown, exportViolationsCsv } from "./export.js";
export type { ReportExportFormat, ReportExportResult } from "./export.js";
export { SECTION_NAMES } from "./types.js";
export type {
  DegradedSection,
  PostureWeights,
  Report,
  ReportScores,
  ReportSections,
  SectionFailure,
  SectionName,
  SectionResult,
  SummaryCounts,
} from "./types.js";
