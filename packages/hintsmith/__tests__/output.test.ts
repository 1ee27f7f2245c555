import { Chalk } from "chalk";
import { expect, test } from "vitest";
import { createImportDirective } from "@hintsmith/core";
import type { ApplyResult, ReportEntry } from "@hintsmith/rewrite";
import {
  countLines,
  formatApplyOutput,
  formatImportDirective,
  formatReportText,
  splitDiffLines,
} from "../src/command/output.ts";

function applyResult(overrides: Partial<ApplyResult> = {}): ApplyResult {
  return {
    dryRun: true,
    scope: "/tmp/workspace",
    hints: "<inline>",
    ruleCount: 3,
    skippedRules: 1,
    filesScanned: 1,
    filesMatched: 1,
    filesChanged: 1,
    totalMatches: 2,
    totalReplacements: 1,
    elapsedMs: 1,
    files: [
      {
        file: "src/sample.ts",
        matchCount: 2,
        replacementCount: 1,
        changed: true,
        byteDelta: 0,
        imports: createImportDirective({ addImports: ["lodash.Util"] }),
        occurrences: [
          {
            start: 0,
            end: 4,
            line: 1,
            character: 1,
            matched: "f(1)",
            replacement: "g(1)",
            applied: true,
            description: "Rename f",
            severity: "info",
            pattern: "f($x)",
            imports: null,
          },
          {
            start: 20,
            end: 30,
            line: 3,
            character: 5,
            matched: "eval(code)",
            replacement: null,
            applied: false,
            description: null,
            severity: "warning",
            pattern: "eval($code)",
            imports: null,
          },
        ],
      },
    ],
    ...overrides,
  };
}

test("formatApplyOutput renders compact diff-like output", () => {
  expect(formatApplyOutput(applyResult()).split("\n")).toEqual([
    "diff --git a/src/sample.ts b/src/sample.ts",
    "--- a/src/sample.ts",
    "+++ b/src/sample.ts",
    "@@ -1,1 +1,1 @@ Rename f",
    "-f(1)",
    "+g(1)",
    "# add import lodash.Util",
    "src/sample.ts:3:5 warning eval($code)",
    "1 file changed, 1 replacement, 2 matches, 1 rule skipped, (dry-run)",
  ]);
});

test("formatApplyOutput reports when nothing matched", () => {
  const output = formatApplyOutput(
    applyResult({
      dryRun: false,
      skippedRules: 0,
      filesMatched: 0,
      filesChanged: 0,
      totalMatches: 0,
      totalReplacements: 0,
      files: [],
    }),
  );

  expect(output).toBe("No matches.\n0 files changed, 0 replacements, 0 matches");
});

test("formatApplyOutput colors output when a chalk instance is given", () => {
  const chalkInstance = new Chalk({ level: 1 });
  const output = formatApplyOutput(applyResult(), { chalkInstance });

  expect(output.split("\n")[4]).toBe(chalkInstance.red("-f(1)"));
  expect(output.split("\n")[7]).toBe(
    `src/sample.ts:3:5 ${chalkInstance.yellow("warning")} eval($code)`,
  );
});

test("formatReportText lists findings", () => {
  const entries: ReportEntry[] = [
    {
      file: "a.ts",
      line: 2,
      character: 3,
      offset: 12,
      length: 6,
      pattern: "f($x)",
      matched: "f(\n1)",
      replacement: "g(1)",
      description: null,
      severity: "info",
    },
    {
      file: "b.ts",
      line: 1,
      character: 1,
      offset: 0,
      length: 10,
      pattern: "eval($code)",
      matched: "eval(code)",
      replacement: null,
      description: "Avoid eval",
      severity: "error",
    },
  ];

  expect(formatReportText(entries).split("\n")).toEqual([
    "a.ts:2:3 info f($x)",
    "  f( ... => g(1)",
    "b.ts:1:1 error Avoid eval",
    "  eval(code)",
    "2 findings",
  ]);
  expect(formatReportText([])).toBe("0 findings");
});

test("formatImportDirective describes every change", () => {
  expect(
    formatImportDirective(
      createImportDirective({
        addImports: ["a.B"],
        removeImports: ["c.D"],
        addStaticImports: ["e.F.g"],
        removeStaticImports: ["h.I.j"],
        replaceStaticImports: [["k.L.m", "k.L.n"]],
      }),
    ),
  ).toEqual([
    "add import a.B",
    "remove import c.D",
    "add static import e.F.g",
    "remove static import h.I.j",
    "replace static import k.L.m with k.L.n",
  ]);
});

test("splitDiffLines ignores one trailing newline", () => {
  expect(splitDiffLines("a\r\nb\n")).toEqual(["a", "b"]);
  expect(splitDiffLines("")).toEqual([]);
  expect(countLines("one\ntwo\nthree")).toBe(3);
});
