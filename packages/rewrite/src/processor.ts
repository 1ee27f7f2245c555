import {
  HintsmithError,
  ProcessingCancelledError,
  compilePattern,
  compileReplacement,
  createGuardContext,
  createGuardRegistry,
  createImportDirective,
  createLineStarts,
  detectImports,
  evaluateGuard,
  findMatches,
  findMatchingAlternative,
  formatMs,
  isEmptyImportDirective,
  mergeImportDirectives,
  nowNs,
  nsToMs,
  renderCompiledReplacement,
  toLineCharacter,
  typescriptLanguage,
  type CompiledPattern,
  type CompiledReplacement,
  type GuardContext,
  type GuardFunctionResolver,
  type ImportDirective,
  type Match,
  type RewriteAlternative,
  type SyntaxTree,
  type TransformationRule,
} from "@hintsmith/core";
import type { ProcessOptions, TransformationResult } from "./types.ts";

type CompiledRule = {
  rule: TransformationRule;
  pattern: CompiledPattern;
  replacements: ReadonlyMap<RewriteAlternative, CompiledReplacement>;
};

export type SkippedRule = {
  rule: TransformationRule;
  reason: string;
};

export type BatchProcessor = {
  /** Rules whose patterns compiled, in input order. */
  readonly rules: readonly TransformationRule[];
  readonly skippedRules: readonly SkippedRule[];
  process(tree: SyntaxTree): TransformationResult[];
};

export function hasReplacement(result: TransformationResult): boolean {
  return result.replacementText !== null;
}

/** Processes one tree; see `createBatchProcessor` to reuse compiled rules. */
export function processTree(
  tree: SyntaxTree,
  rules: readonly TransformationRule[],
  options: ProcessOptions = {},
): TransformationResult[] {
  return createBatchProcessor(rules, options).process(tree);
}

/**
 * Compiles `rules` once. Rules whose source pattern the language rejects are
 * logged and left out; the rest run in order against every processed tree.
 */
export function createBatchProcessor(
  rules: readonly TransformationRule[],
  options: ProcessOptions = {},
): BatchProcessor {
  const verbose = options.verbose ?? 0;
  const log = options.logger ?? (() => {});
  const language = options.language ?? typescriptLanguage;
  const resolver = options.guards ?? createGuardRegistry().resolver;

  const compileStarted = verbose > 0 ? nowNs() : 0n;
  const compiled: CompiledRule[] = [];
  const skippedRules: SkippedRule[] = [];
  for (const rule of rules) {
    try {
      compiled.push({
        rule,
        pattern: compilePattern(rule.sourcePattern, language),
        replacements: new Map(
          rule.alternatives.map((alternative) => [
            alternative,
            compileReplacement(alternative.replacementPattern.text),
          ]),
        ),
      });
    } catch (error) {
      if (!(error instanceof HintsmithError)) {
        throw error;
      }
      skippedRules.push({ rule, reason: error.message });
      log(`[process] skip rule "${ruleLabel(rule)}": ${error.message}`);
    }
  }
  if (verbose > 0) {
    log(
      `[process] compileRules ${formatMs(nsToMs(nowNs() - compileStarted))} rules=${rules.length} compiled=${compiled.length} skipped=${skippedRules.length}`,
    );
  }

  return {
    rules: compiled.map((entry) => entry.rule),
    skippedRules,
    process(tree) {
      const started = verbose > 1 ? nowNs() : 0n;
      const results = runRules(tree, compiled, resolver, options);
      if (verbose > 1) {
        log(
          `[process] tree ${formatMs(nsToMs(nowNs() - started))} file=${tree.fileName} results=${results.length}`,
        );
      }
      return results;
    },
  };
}

function runRules(
  tree: SyntaxTree,
  compiled: readonly CompiledRule[],
  resolver: GuardFunctionResolver,
  options: ProcessOptions,
): TransformationResult[] {
  const log = options.logger ?? (() => {});
  const lineStarts = createLineStarts(tree.text);
  const results: TransformationResult[] = [];

  compiled.forEach((entry, completedRules) => {
    if (options.isCancelled?.()) {
      throw new ProcessingCancelledError(completedRules);
    }

    for (const match of findMatches(tree, entry.pattern)) {
      const context = createGuardContext({
        match,
        tree,
        sourceVersion: options.sourceVersion ?? null,
        semantics: options.semantics ?? null,
      });

      const skipOccurrence = (stage: "guard" | "render", error: unknown): void => {
        if (!(error instanceof HintsmithError)) {
          throw error;
        }
        options.onGuardError?.(error, { rule: entry.rule, match, tree });
        log(
          `[process] ${stage} error rule="${ruleLabel(entry.rule)}" file=${tree.fileName} offset=${match.sourceOffset}: ${error.message}`,
        );
      };

      let selection: { alternative: RewriteAlternative | null } | null;
      try {
        selection = selectAlternative(entry.rule, context, resolver);
      } catch (error) {
        skipOccurrence("guard", error);
        continue;
      }
      if (!selection) {
        continue;
      }

      const { alternative } = selection;
      const replacement = alternative ? entry.replacements.get(alternative) : undefined;
      let replacementText: string | null = null;
      if (replacement) {
        try {
          replacementText = renderCompiledReplacement(replacement, match.bindings, tree.text);
        } catch (error) {
          skipOccurrence("render", error);
          continue;
        }
      }
      results.push(
        buildResult({
          rule: entry.rule,
          match,
          alternative,
          replacementText,
          detect: options.detectImports ?? true,
          position: toLineCharacter(lineStarts, match.sourceOffset),
        }),
      );
    }
  });

  return results;
}

// `null` when the source guard rejects the occurrence.
function selectAlternative(
  rule: TransformationRule,
  context: GuardContext,
  resolver: GuardFunctionResolver,
): { alternative: RewriteAlternative | null } | null {
  if (rule.sourceGuard && !evaluateGuard(rule.sourceGuard, context, resolver)) {
    return null;
  }
  return { alternative: findMatchingAlternative(rule, context, resolver) };
}

function buildResult(input: {
  rule: TransformationRule;
  match: Match;
  alternative: RewriteAlternative | null;
  replacementText: string | null;
  detect: boolean;
  position: { line: number; character: number };
}): TransformationResult {
  const detected =
    input.detect && input.replacementText !== null
      ? createImportDirective({ addImports: detectImports(input.replacementText) })
      : null;
  const imports: ImportDirective = mergeImportDirectives(
    input.rule.imports,
    input.alternative?.imports,
    detected,
  );

  return Object.freeze({
    rule: input.rule,
    match: input.match,
    replacementText: input.replacementText,
    importDirective: isEmptyImportDirective(imports) ? null : imports,
    description: input.rule.description ?? null,
    line: input.position.line,
    character: input.position.character,
  });
}

export function ruleLabel(rule: TransformationRule): string {
  return rule.description ?? rule.sourcePattern.text;
}
