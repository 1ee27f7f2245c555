import type { ApplyResult } from "../types.ts";
import type { LoadedHints } from "./load.ts";
import type { RewritePhaseResult } from "./rewrite.ts";

type OutputPhaseInput = {
  hints: LoadedHints;
  rewrite: RewritePhaseResult;
  elapsedMs: number;
};

export function buildApplyResult(input: OutputPhaseInput): ApplyResult {
  return {
    dryRun: input.rewrite.dryRun,
    scope: input.rewrite.scope,
    hints: input.hints.source,
    ruleCount: input.hints.rules.length,
    skippedRules: input.rewrite.skippedRules,
    filesScanned: input.rewrite.filesScanned,
    filesMatched: input.rewrite.filesMatched,
    filesChanged: input.rewrite.filesChanged,
    totalMatches: input.rewrite.totalMatches,
    totalReplacements: input.rewrite.totalReplacements,
    elapsedMs: input.elapsedMs,
    files: input.rewrite.files,
  };
}
