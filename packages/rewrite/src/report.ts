import { sliceText, type SyntaxTree } from "@hintsmith/core";
import { DEFAULT_SEVERITY } from "@hintsmith/hint-file";
import type { ApplyResult, TransformationResult } from "./types.ts";

export type ReportEntry = {
  file: string;
  line: number;
  character: number;
  offset: number;
  length: number;
  pattern: string;
  matched: string;
  replacement: string | null;
  description: string | null;
  severity: string;
};

export const REPORT_CSV_COLUMNS = [
  "file",
  "line",
  "character",
  "offset",
  "length",
  "pattern",
  "matched",
  "replacement",
  "description",
  "severity",
] as const satisfies ReadonlyArray<keyof ReportEntry>;

/** One entry per result, for a single processed tree. */
export function buildReport(
  results: readonly TransformationResult[],
  tree: SyntaxTree,
  options: { severity?: string } = {},
): ReportEntry[] {
  const severity = options.severity ?? DEFAULT_SEVERITY;
  return results.map((result) => ({
    file: tree.fileName,
    line: result.line,
    character: result.character,
    offset: result.match.sourceOffset,
    length: result.match.sourceLength,
    pattern: result.rule.sourcePattern.text,
    matched: sliceText(tree.text, {
      offset: result.match.sourceOffset,
      length: result.match.sourceLength,
    }),
    replacement: result.replacementText,
    description: result.description,
    severity,
  }));
}

/** Flattens the occurrences of a project run, file by file. */
export function reportFromApplyResult(result: ApplyResult): ReportEntry[] {
  return result.files.flatMap((file) =>
    file.occurrences.map((occurrence) => ({
      file: file.file,
      line: occurrence.line,
      character: occurrence.character,
      offset: occurrence.start,
      length: occurrence.end - occurrence.start,
      pattern: occurrence.pattern,
      matched: occurrence.matched,
      replacement: occurrence.replacement,
      description: occurrence.description,
      severity: occurrence.severity,
    })),
  );
}

export function formatReportJson(entries: readonly ReportEntry[]): string {
  return JSON.stringify(entries, null, 2);
}

export function formatReportCsv(entries: readonly ReportEntry[]): string {
  const rows = [REPORT_CSV_COLUMNS.join(",")];
  for (const entry of entries) {
    rows.push(REPORT_CSV_COLUMNS.map((column) => csvField(entry[column])).join(","));
  }
  return rows.join("\n");
}

// RFC 4180 quoting: fields holding a comma, quote or line break are wrapped and quotes doubled.
function csvField(value: string | number | null): string {
  if (value === null) {
    return "";
  }
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}
