import { loadHints, type LoadedHints } from "./phases/load.ts";
import { buildApplyResult } from "./phases/output.ts";
import { rewriteProject } from "./phases/rewrite.ts";
import type { ApplyOptions, ApplyResult } from "./types.ts";

/**
 * Runs a hint file over every source file under `options.scope`.
 *
 * `hintInput` is either inline hint text or a path to a `.hint` file;
 * includes are looked up beside it and then among the bundled libraries.
 */
export async function applyHintsToProject(
  hintInput: string,
  options: ApplyOptions = {},
): Promise<ApplyResult> {
  const hints = await loadHints(hintInput, options);

  return runApplyPhases(hints, options);
}

async function runApplyPhases(hints: LoadedHints, options: ApplyOptions): Promise<ApplyResult> {
  const startedAt = Date.now();

  const rewrite = await rewriteProject(hints, options);
  return buildApplyResult({
    hints,
    rewrite,
    elapsedMs: Date.now() - startedAt,
  });
}
