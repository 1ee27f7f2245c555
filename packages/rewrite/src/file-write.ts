import { randomUUID } from "node:crypto";
import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { StaleFileError } from "./errors.ts";

/** The file operations a rewrite needs; tests pass an in-memory version. */
export type RewriteFs = {
  readFile: (path: string, encoding: BufferEncoding) => Promise<string>;
  stat: (path: string) => Promise<{ mode: number }>;
  writeFile: (
    path: string,
    data: string,
    options: { encoding: BufferEncoding; mode: number },
  ) => Promise<void>;
  rename: (oldPath: string, newPath: string) => Promise<void>;
  rm: (path: string, options: { force: boolean }) => Promise<void>;
};

export type ReplaceFileInput = {
  filePath: string;
  /** Text the rewrite was computed from. */
  expectedText: string;
  text: string;
  encoding: BufferEncoding;
  fs?: RewriteFs;
};

const nodeFs: RewriteFs = { readFile, stat, writeFile, rename, rm };

/**
 * Swaps in `text` through a temporary sibling file and a rename. Fails with
 * `StaleFileError` when the file no longer holds `expectedText`; the file is
 * then left as found.
 */
export async function replaceFileIfUnchanged(input: ReplaceFileInput): Promise<void> {
  const fs = input.fs ?? nodeFs;
  const { filePath, encoding } = input;

  const [currentText, { mode }] = await Promise.all([
    fs.readFile(filePath, encoding),
    fs.stat(filePath),
  ]).catch((error: unknown) => {
    throw new StaleFileError(filePath, "unreadable", { cause: error });
  });
  if (currentText !== input.expectedText) {
    throw new StaleFileError(filePath, "changed");
  }

  const tempPath = siblingTempPath(filePath);
  let replaced = false;
  try {
    await fs.writeFile(tempPath, input.text, { encoding, mode });
    await fs.rename(tempPath, filePath);
    replaced = true;
  } finally {
    if (!replaced) {
      // Cleanup only; the write or rename error propagates.
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
    }
  }
}

function siblingTempPath(filePath: string): string {
  return path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.hintsmith-${randomUUID()}.tmp`,
  );
}
