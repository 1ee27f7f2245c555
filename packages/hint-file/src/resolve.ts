import { HintsmithError, type TransformationRule } from "@hintsmith/core";
import { CircularIncludeError, IncludeLoadError } from "./errors.ts";
import { parseHintFile } from "./parser.ts";
import type { HintFile, IncludeLoader } from "./types.ts";

export type ResolvedHintFile = {
  hintFile: HintFile;
  /** Rules of every include (depth first, in include order) followed by the file's own rules. */
  rules: readonly TransformationRule[];
};

/** Finds an already parsed unit; throws `IncludeLoadError` when there is none. */
export type HintFileLookup = (id: string) => HintFile;

/**
 * Loads `id` through `loader`, parses it and splices in its includes.
 * A unit included twice along different paths contributes its rules twice.
 */
export function resolveHintFile(id: string, loader: IncludeLoader): ResolvedHintFile {
  return resolveWithLookup(id, (unitId) => parseHintFile(loadText(unitId, loader), { unitId }));
}

export function resolveWithLookup(id: string, lookup: HintFileLookup): ResolvedHintFile {
  return resolveUnit(id, lookup, new Set(), []);
}

function resolveUnit(
  id: string,
  lookup: HintFileLookup,
  resolving: ReadonlySet<string>,
  path: readonly string[],
): ResolvedHintFile {
  if (resolving.has(id)) {
    throw new CircularIncludeError([...path, id]);
  }

  const hintFile = lookup(id);
  const nextResolving = new Set(resolving).add(id);
  const nextPath = [...path, id];
  const rules: TransformationRule[] = [];
  for (const include of hintFile.includes) {
    rules.push(...resolveUnit(include, lookup, nextResolving, nextPath).rules);
  }
  rules.push(...hintFile.rules);

  return { hintFile, rules: Object.freeze(rules) };
}

function loadText(id: string, loader: IncludeLoader): string {
  try {
    return loader(id);
  } catch (error) {
    if (error instanceof HintsmithError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new IncludeLoadError(id, reason, { cause: error });
  }
}
