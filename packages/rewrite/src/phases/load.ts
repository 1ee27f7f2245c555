import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  assertWithinWorkspace,
  isErrorWithCode,
  resolveTextInput,
  type TransformationRule,
} from "@hintsmith/core";
import {
  HintFileStore,
  isBundledLibrary,
  readBundledLibrary,
  type HintFile,
} from "@hintsmith/hint-file";
import type { ApplyOptions } from "../types.ts";

const INLINE_HINTS_KEY = "<inline>";
const HINT_FILE_EXTENSION = ".hint";

export type LoadedHints = {
  /** File the hints were read from, or `<inline>`. */
  source: string;
  hintFile: HintFile;
  rules: readonly TransformationRule[];
};

/**
 * Resolves `hintInput` (inline text or a path) and its includes. An include
 * `<id>` is read from `<id>.hint` beside the root file (or in cwd for inline
 * text), then from the bundled libraries.
 */
export async function loadHints(hintInput: string, options: ApplyOptions): Promise<LoadedHints> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const encoding = options.encoding ?? "utf8";
  const input = await resolveTextInput(hintInput, { cwd, encoding });
  const rootKey = input.filePath
    ? path.basename(input.filePath, HINT_FILE_EXTENSION)
    : INLINE_HINTS_KEY;
  const includeDirectory = input.filePath ? path.dirname(input.filePath) : cwd;

  const store = new HintFileStore();
  const root = store.load(rootKey, input.text);

  const pending = [...root.includes];
  while (pending.length > 0) {
    const id = pending.shift();
    if (id === undefined || store.has(id)) {
      continue;
    }
    const text = await readInclude({ id, cwd, directory: includeDirectory, encoding });
    // Missing includes surface from `resolveRules` as `IncludeLoadError`.
    if (text === null) {
      continue;
    }
    pending.push(...store.load(id, text).includes);
  }

  const resolved = store.resolveRules(rootKey);
  return {
    source: input.filePath ?? INLINE_HINTS_KEY,
    hintFile: resolved.hintFile,
    rules: resolved.rules,
  };
}

async function readInclude(input: {
  id: string;
  cwd: string;
  directory: string;
  encoding: BufferEncoding;
}): Promise<string | null> {
  const { id, encoding } = input;
  const sibling = path.resolve(input.directory, `${id}${HINT_FILE_EXTENSION}`);
  await assertWithinWorkspace(input.cwd, sibling, "Include path");
  try {
    return await readFile(sibling, encoding);
  } catch (error) {
    if (!isErrorWithCode(error) || error.code !== "ENOENT") {
      throw error;
    }
  }
  return isBundledLibrary(id) ? readBundledLibrary(id) : null;
}
