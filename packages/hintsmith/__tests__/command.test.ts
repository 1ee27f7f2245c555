import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { expect, test } from "vitest";
import { jsonReplacer, runApplyCommand, runReportCommand } from "../src/command.ts";
import { parseSourceVersion, validateApplyCommandFlags } from "../src/command/flags.ts";

const HINTS = '"Rename f":\nf($x)\n=> g($x)\n;;\n';

test("runApplyCommand applies inline hints in scope", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");

    const result = await runApplyCommand(HINTS, workspace, { cwd: workspace });

    expect(result.totalMatches).toBe(1);
    expect(result.filesChanged).toBe(1);
    expect(await readFile(target, "utf8")).toBe("g(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand resolves a hint file from cwd", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");
    await writeFile(path.join(workspace, "rename.hint"), HINTS, "utf8");

    const result = await runApplyCommand("rename.hint", ".", { cwd: workspace });

    expect(result.hints).toBe(path.join(workspace, "rename.hint"));
    expect(await readFile(target, "utf8")).toBe("g(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand can read hints from stdin when the input is '-'", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");

    const result = await runApplyCommand(
      "-",
      workspace,
      { cwd: workspace },
      { readStdin: async () => HINTS },
    );

    expect(result.hints).toBe("<inline>");
    expect(await readFile(target, "utf8")).toBe("g(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand can read hints from a provided stdin stream", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");

    const result = await runApplyCommand(
      "-",
      workspace,
      { cwd: workspace },
      { stdinStream: Readable.from([HINTS.slice(0, 10), HINTS.slice(10)]) },
    );

    expect(result.totalReplacements).toBe(1);
    expect(await readFile(target, "utf8")).toBe("g(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand rejects empty hints from stdin", async () => {
  await expect(runApplyCommand("-", ".", {}, { readStdin: async () => "  \n" })).rejects.toThrow(
    "Hint file read from stdin was empty.",
  );
});

test("runApplyCommand supports the dry-run and check flags", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");

    const dryRun = await runApplyCommand(HINTS, workspace, { cwd: workspace, "dry-run": true });
    const check = await runApplyCommand(HINTS, workspace, { cwd: workspace, check: true });

    expect(dryRun.dryRun).toBe(true);
    expect(check.dryRun).toBe(true);
    expect(check.totalReplacements).toBe(1);
    expect(await readFile(target, "utf8")).toBe("f(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand rejects --check combined with --dry-run", async () => {
  await expect(runApplyCommand(HINTS, ".", { check: true, "dry-run": true })).rejects.toThrow(
    "Cannot combine --check with --dry-run.",
  );
  expect(() => validateApplyCommandFlags({ check: true })).not.toThrow();
});

test("runApplyCommand passes the source version to guards", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    await writeFile(path.join(workspace, "sample.ts"), "f(1);\n", "utf8");
    const hints = "f($x) :: sourceVersionGE(2020)\n=> g($x)\n;;\n";

    const unset = await runApplyCommand(hints, workspace, { cwd: workspace, "dry-run": true });
    const newer = await runApplyCommand(hints, workspace, {
      cwd: workspace,
      "dry-run": true,
      "source-version": "2021",
    });

    expect(unset.totalMatches).toBe(0);
    expect(newer.totalReplacements).toBe(1);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runApplyCommand logs phase timings through the provided logger", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    await writeFile(path.join(workspace, "sample.ts"), "f(1);\n", "utf8");
    const logs: string[] = [];

    await runApplyCommand(
      HINTS,
      workspace,
      { cwd: workspace, verbose: 1 },
      { logger: (line) => logs.push(line) },
    );

    expect(logs).toContain(
      "[apply] summary mode=apply outcome=rewrite flow=1->1->1 totals=matches:1,replacements:1",
    );
    expect(logs.some((line) => line.startsWith("[apply] collectFiles "))).toBe(true);
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("runReportCommand lists matches without writing", async () => {
  const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-command-"));

  try {
    const target = path.join(workspace, "sample.ts");
    await writeFile(target, "f(1);\n", "utf8");

    const entries = await runReportCommand(HINTS, workspace, { cwd: workspace });

    expect(entries).toEqual([
      {
        file: "sample.ts",
        line: 1,
        character: 1,
        offset: 0,
        length: 4,
        pattern: "f($x)",
        matched: "f(1)",
        replacement: "g(1)",
        description: "Rename f",
        severity: "info",
      },
    ]);
    expect(await readFile(target, "utf8")).toBe("f(1);\n");
  } finally {
    await rm(workspace, { recursive: true, force: true });
  }
});

test("parseSourceVersion accepts dotted numbers only", () => {
  expect(parseSourceVersion(" 1.8 ")).toBe("1.8");
  expect(parseSourceVersion("2020")).toBe("2020");
  expect(() => parseSourceVersion("v2020")).toThrow(
    "--source-version must be a dotted number such as 2020 or 1.8",
  );
});

test("jsonReplacer prints maps as objects", () => {
  const value = { replaceStaticImports: new Map([["a.B.c", "a.B.d"]]) };

  expect(JSON.stringify(value, jsonReplacer)).toBe('{"replaceStaticImports":{"a.B.c":"a.B.d"}}');
});
