export { applyHintsToProject } from "./apply.ts";
export {
  createBatchProcessor,
  hasReplacement,
  processTree,
  ruleLabel,
} from "./processor.ts";
export type { BatchProcessor, SkippedRule } from "./processor.ts";
export {
  REPORT_CSV_COLUMNS,
  buildReport,
  formatReportCsv,
  formatReportJson,
  reportFromApplyResult,
} from "./report.ts";
export type { ReportEntry } from "./report.ts";
export { applyReplacementSpans, selectNonOverlappingSpans } from "./replacement-spans.ts";
export type { ReplacementSpan } from "./replacement-spans.ts";
export { StaleFileError } from "./errors.ts";
export type { StaleFileReason } from "./errors.ts";
export { replaceFileIfUnchanged } from "./file-write.ts";
export type { ReplaceFileInput, RewriteFs } from "./file-write.ts";
export type {
  ApplyFileResult,
  ApplyOccurrence,
  ApplyOptions,
  ApplyResult,
  GuardErrorInfo,
  ProcessOptions,
  TransformationResult,
} from "./types.ts";
export {
  DEFAULT_CONCURRENCY,
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_SOURCE_EXTENSIONS,
} from "./types.ts";
