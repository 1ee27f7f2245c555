import { describe, expect, test } from "vitest";
import { parseTypeScript } from "@hintsmith/core";
import { parseHintFile } from "@hintsmith/hint-file";
import {
  buildReport,
  formatReportCsv,
  formatReportJson,
  processTree,
  reportFromApplyResult,
  type ApplyResult,
  type ReportEntry,
} from "../src/index.ts";

const HINTS = ['"Use g, not f":', "f($x) => g($x) ;;", "eval($code) ;;"].join("\n");

function reportFor(source: string, severity?: string): ReportEntry[] {
  const tree = parseTypeScript("sample.ts", source);
  const results = processTree(tree, parseHintFile(HINTS).rules);
  return buildReport(results, tree, severity === undefined ? {} : { severity });
}

describe("buildReport", () => {
  test("describes every result", () => {
    expect(reportFor('f("a");\neval(code);\n', "warning")).toEqual([
      {
        file: "sample.ts",
        line: 1,
        character: 1,
        offset: 0,
        length: 6,
        pattern: "f($x)",
        matched: 'f("a")',
        replacement: 'g("a")',
        description: "Use g, not f",
        severity: "warning",
      },
      {
        file: "sample.ts",
        line: 2,
        character: 1,
        offset: 8,
        length: 10,
        pattern: "eval($code)",
        matched: "eval(code)",
        replacement: null,
        description: null,
        severity: "warning",
      },
    ]);
  });

  test("defaults the severity to info", () => {
    expect(reportFor("f(1);").map((entry) => entry.severity)).toEqual(["info"]);
  });
});

describe("formatReportCsv", () => {
  test("quotes fields that need it and leaves nulls empty", () => {
    expect(formatReportCsv(reportFor('f("a");\neval(code);\n')).split("\n")).toEqual([
      "file,line,character,offset,length,pattern,matched,replacement,description,severity",
      'sample.ts,1,1,0,6,f($x),"f(""a"")","g(""a"")","Use g, not f",info',
      "sample.ts,2,1,8,10,eval($code),eval(code),,,info",
    ]);
  });

  test("keeps line breaks inside quoted fields", () => {
    const csv = formatReportCsv(reportFor("f(\n  1\n);"));

    expect(csv).toBe(
      [
        "file,line,character,offset,length,pattern,matched,replacement,description,severity",
        'sample.ts,1,1,0,9,f($x),"f(\n  1\n)",g(1),"Use g, not f",info',
      ].join("\n"),
    );
  });

  test("writes only the header for an empty report", () => {
    expect(formatReportCsv([])).toBe(
      "file,line,character,offset,length,pattern,matched,replacement,description,severity",
    );
  });
});

describe("formatReportJson", () => {
  test("round-trips through JSON.parse", () => {
    const entries = reportFor("f(1);");

    expect(JSON.parse(formatReportJson(entries))).toEqual(entries);
    expect(formatReportJson([])).toBe("[]");
  });
});

describe("reportFromApplyResult", () => {
  test("flattens occurrences file by file", () => {
    const result: ApplyResult = {
      dryRun: true,
      scope: "/work",
      hints: "<inline>",
      ruleCount: 1,
      skippedRules: 0,
      filesScanned: 2,
      filesMatched: 1,
      filesChanged: 1,
      totalMatches: 1,
      totalReplacements: 1,
      elapsedMs: 3,
      files: [
        {
          file: "src/a.ts",
          matchCount: 1,
          replacementCount: 1,
          changed: true,
          byteDelta: 0,
          imports: null,
          occurrences: [
            {
              start: 10,
              end: 14,
              line: 2,
              character: 3,
              matched: "f(1)",
              replacement: "g(1)",
              applied: true,
              description: null,
              severity: "error",
              pattern: "f($x)",
              imports: null,
            },
          ],
        },
      ],
    };

    expect(reportFromApplyResult(result)).toEqual([
      {
        file: "src/a.ts",
        line: 2,
        character: 3,
        offset: 10,
        length: 4,
        pattern: "f($x)",
        matched: "f(1)",
        replacement: "g(1)",
        description: null,
        severity: "error",
      },
    ]);
  });
});
