import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { StaleFileError, replaceFileIfUnchanged, type RewriteFs } from "../src/index.ts";

function memoryFs(text: string, failOn: "writeFile" | "rename", events: string[]): RewriteFs {
  return {
    readFile: async () => text,
    stat: async () => ({ mode: 0o600 }),
    writeFile: async (file, _data, options) => {
      events.push(`write ${path.basename(file).startsWith(".sample.ts.hintsmith-")} ${options.mode}`);
      if (failOn === "writeFile") throw new Error("disk full");
    },
    rename: async () => {
      events.push("rename");
      if (failOn === "rename") throw new Error("busy");
    },
    rm: async (_file, options) => {
      events.push(`rm force=${options.force}`);
    },
  };
}

describe("replaceFileIfUnchanged", () => {
  test("replaces the file and leaves no temporary file behind", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-write-"));

    try {
      const file = path.join(workspace, "sample.ts");
      await writeFile(file, "f(1);\n", "utf8");

      await replaceFileIfUnchanged({
        filePath: file,
        expectedText: "f(1);\n",
        text: "g(1);\n",
        encoding: "utf8",
      });

      expect(await readFile(file, "utf8")).toBe("g(1);\n");
      expect(await readdir(workspace)).toEqual(["sample.ts"]);
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  test("keeps a file that changed after it was read", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-write-"));

    try {
      const file = path.join(workspace, "sample.ts");
      await writeFile(file, "f(2);\n", "utf8");

      const failure = await replaceFileIfUnchanged({
        filePath: file,
        expectedText: "f(1);\n",
        text: "g(1);\n",
        encoding: "utf8",
      }).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(StaleFileError);
      expect(failure instanceof StaleFileError ? failure.reason : null).toBe("changed");
      expect(failure instanceof Error ? failure.message : "").toBe(
        `${file} changed on disk after it was read; run apply again.`,
      );
      expect(await readFile(file, "utf8")).toBe("f(2);\n");
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  test("reports a file that can no longer be read", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "hintsmith-write-"));

    try {
      const file = path.join(workspace, "gone.ts");

      const failure = await replaceFileIfUnchanged({
        filePath: file,
        expectedText: "f(1);\n",
        text: "g(1);\n",
        encoding: "utf8",
      }).catch((error: unknown) => error);

      expect(failure instanceof StaleFileError ? failure.reason : null).toBe("unreadable");
      expect(failure instanceof Error ? failure.cause : null).toBeInstanceOf(Error);
      expect(await readdir(workspace)).toEqual([]);
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  test.each([
    ["writeFile", "disk full", ["write true 384", "rm force=true"]],
    ["rename", "busy", ["write true 384", "rename", "rm force=true"]],
  ] as const)("removes the temporary file when %s fails", async (failOn, message, expected) => {
    const events: string[] = [];

    await expect(
      replaceFileIfUnchanged({
        filePath: "/work/sample.ts",
        expectedText: "f(1);\n",
        text: "g(1);\n",
        encoding: "utf8",
        fs: memoryFs("f(1);\n", failOn, events),
      }),
    ).rejects.toThrow(message);

    expect(events).toEqual(expected);
  });
});
