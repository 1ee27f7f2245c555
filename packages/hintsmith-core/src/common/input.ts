import { readFile, realpath, stat } from "node:fs/promises";
import path from "node:path";

export type ResolveTextInputOptions = {
  cwd?: string;
  encoding?: BufferEncoding;
};

export type ResolvedTextInput = {
  text: string;
  /** Absolute path of the file the text was read from, `null` for inline text. */
  filePath: string | null;
};

/**
 * Treats `input` as inline text when it spans lines or names no existing file.
 * Otherwise reads the file, which must stay inside the nearest git root (or cwd).
 */
export async function resolveTextInput(
  input: string,
  options: ResolveTextInputOptions = {},
): Promise<ResolvedTextInput> {
  if (input.includes("\n") || input.includes("\r")) {
    return { text: input, filePath: null };
  }

  const cwd = path.resolve(options.cwd ?? process.cwd());
  const inputPath = path.resolve(cwd, input);

  let inputStats: Awaited<ReturnType<typeof stat>>;
  try {
    inputStats = await stat(inputPath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return { text: input, filePath: null };
    }
    throw error;
  }

  if (!inputStats.isFile()) {
    throw new Error(`Input path is not a file: ${inputPath}`);
  }

  await assertWithinWorkspace(cwd, inputPath, "Input path");
  return {
    text: await readFile(inputPath, options.encoding ?? "utf8"),
    filePath: inputPath,
  };
}

export async function assertWithinWorkspace(
  cwd: string,
  candidatePath: string,
  label: string,
): Promise<void> {
  const repoRoot = await findNearestGitRepoRoot(cwd);
  const boundary = repoRoot ?? cwd;
  const canonicalBoundary = await resolveCanonicalPath(boundary);
  const canonicalCandidate = await resolveCanonicalPath(candidatePath);
  if (isPathWithinBase(canonicalBoundary, canonicalCandidate)) {
    return;
  }

  if (repoRoot) {
    throw new Error(
      `${label} resolves outside repository root: path=${candidatePath} repoRoot=${repoRoot}.`,
    );
  }
  throw new Error(`${label} resolves outside cwd: path=${candidatePath} cwd=${cwd}.`);
}

export function isErrorWithCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error;
}

export async function findNearestGitRepoRoot(startDirectory: string): Promise<string | null> {
  let current = path.resolve(startDirectory);

  while (true) {
    if (await pathExists(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

export function isRelativeWithinBase(relativePath: string): boolean {
  if (relativePath.length === 0) {
    return true;
  }

  if (path.isAbsolute(relativePath)) {
    return false;
  }

  return relativePath !== ".." && !relativePath.startsWith(`..${path.sep}`);
}

export function isPathWithinBase(basePath: string, candidatePath: string): boolean {
  return isRelativeWithinBase(path.relative(basePath, candidatePath));
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrorWithCode(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

async function resolveCanonicalPath(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return path.resolve(filePath);
    }
    throw error;
  }
}
