import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  collectSourceFiles,
  compareVersions,
  createTypeScriptProject,
  findNearestGitRepoRoot,
  formatMs,
  isPathWithinBase,
  isRelativeWithinBase,
  mapLimit,
  mergeImportDirectives,
  nowNs,
  nsToMs,
  sliceText,
  typescriptLanguage,
  type SemanticModel,
  type SyntaxTree,
} from "@hintsmith/core";
import { replaceFileIfUnchanged } from "../file-write.ts";
import { createBatchProcessor, hasReplacement, type BatchProcessor } from "../processor.ts";
import { applyReplacementSpans, selectNonOverlappingSpans } from "../replacement-spans.ts";
import { DEFAULT_CONCURRENCY, type ApplyFileResult, type ApplyOccurrence, type ApplyOptions } from "../types.ts";
import type { LoadedHints } from "./load.ts";

export type RewritePhaseResult = {
  cwd: string;
  scope: string;
  dryRun: boolean;
  skippedRules: number;
  filesScanned: number;
  filesMatched: number;
  filesChanged: number;
  totalMatches: number;
  totalReplacements: number;
  files: ApplyFileResult[];
};

type RewritePerfStats = {
  readNs: bigint;
  parseNs: bigint;
  processNs: bigint;
  writeNs: bigint;
};

type TreeSource = {
  semantics: SemanticModel | null;
  parse(filePath: string, text: string): SyntaxTree;
};

export async function rewriteProject(
  hints: LoadedHints,
  options: ApplyOptions,
): Promise<RewritePhaseResult> {
  const verbose = options.verbose ?? 0;
  const log = options.logger ?? (() => {});
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const scope = options.scope ?? ".";
  const dryRun = options.dryRun ?? false;
  const encoding = options.encoding ?? "utf8";
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const sourceVersion = options.sourceVersion ?? null;
  const resolvedScope = path.resolve(cwd, scope);
  const repoRoot = await findNearestGitRepoRoot(cwd);
  const scopeBoundary = repoRoot ?? cwd;
  if (!isPathWithinBase(scopeBoundary, resolvedScope)) {
    if (repoRoot) {
      throw new Error(
        `Scope resolves outside repository root: scope=${resolvedScope} repoRoot=${repoRoot}.`,
      );
    }
    throw new Error(`Scope resolves outside cwd: scope=${resolvedScope} cwd=${cwd}.`);
  }

  const collectStarted = verbose > 0 ? nowNs() : 0n;
  const files = await collectSourceFiles({
    cwd,
    scope,
    extensions: options.extensions,
    excludedDirectories: options.excludedDirectories,
  });
  if (verbose > 0) {
    log(`[apply] collectFiles ${formatMs(nsToMs(nowNs() - collectStarted))} files=${files.length}`);
  }

  const minSourceVersion = hints.hintFile.metadata.minSourceVersion;
  if (
    minSourceVersion !== undefined &&
    sourceVersion !== null &&
    compareVersions(sourceVersion, minSourceVersion) < 0
  ) {
    log(
      `[apply] skip hints=${hints.source} sourceVersion=${sourceVersion} minSourceVersion=${minSourceVersion}`,
    );
    return emptyResult({ cwd, scope: resolvedScope, dryRun, filesScanned: files.length });
  }

  const programStarted = verbose > 0 ? nowNs() : 0n;
  const treeSource = buildTreeSource(files, options.semantic ?? false);
  if (verbose > 0 && options.semantic) {
    log(`[apply] buildProgram ${formatMs(nsToMs(nowNs() - programStarted))}`);
  }

  const processor = createBatchProcessor(hints.rules, {
    guards: options.guards,
    sourceVersion,
    semantics: treeSource.semantics,
    detectImports: options.detectImports,
    onGuardError: options.onGuardError,
    verbose,
    logger: options.logger,
  });
  const severity = hints.hintFile.metadata.severity;

  const stats: RewritePerfStats = { readNs: 0n, parseNs: 0n, processNs: 0n, writeNs: 0n };
  const rewriteStarted = verbose > 0 ? nowNs() : 0n;
  const results = await mapLimit(
    files,
    (filePath) =>
      rewriteFile({
        cwd,
        scopePath: resolvedScope,
        filePath,
        processor,
        treeSource,
        severity,
        encoding,
        dryRun,
        stats: verbose > 0 ? stats : undefined,
      }),
    { concurrency },
  );
  if (verbose > 0) {
    log(
      `[apply] rewriteFiles ${formatMs(nsToMs(nowNs() - rewriteStarted))} concurrency=${concurrency} dryRun=${dryRun}`,
    );
    log(
      `[apply] breakdown read=${formatMs(nsToMs(stats.readNs))} parse=${formatMs(nsToMs(stats.parseNs))} process=${formatMs(nsToMs(stats.processNs))} write=${formatMs(nsToMs(stats.writeNs))}`,
    );
  }

  let filesMatched = 0;
  let filesChanged = 0;
  let totalMatches = 0;
  let totalReplacements = 0;
  const fileResults: ApplyFileResult[] = [];
  for (const fileResult of results) {
    if (!fileResult) {
      continue;
    }

    filesMatched += 1;
    totalMatches += fileResult.matchCount;
    totalReplacements += fileResult.replacementCount;
    if (fileResult.changed) {
      filesChanged += 1;
    }
    fileResults.push(fileResult);
  }

  if (verbose > 0) {
    const mode = dryRun ? "preview" : "apply";
    const outcome = totalReplacements === 0 ? "no-op" : "rewrite";
    log(
      `[apply] summary mode=${mode} outcome=${outcome} flow=${files.length}->${filesMatched}->${filesChanged} totals=matches:${totalMatches},replacements:${totalReplacements}`,
    );
  }

  return {
    cwd,
    scope: resolvedScope,
    dryRun,
    skippedRules: processor.skippedRules.length,
    filesScanned: files.length,
    filesMatched,
    filesChanged,
    totalMatches,
    totalReplacements,
    files: fileResults,
  };
}

function buildTreeSource(files: readonly string[], semantic: boolean): TreeSource {
  if (!semantic) {
    return {
      semantics: null,
      parse: (filePath, text) => typescriptLanguage.parse(filePath, text),
    };
  }

  const project = createTypeScriptProject(files);
  return {
    semantics: project.semantics,
    parse: (filePath, text) => {
      const tree = project.parse(filePath);
      // The program read the file earlier; fall back to a plain parse if it changed since.
      return tree && tree.text === text ? tree : typescriptLanguage.parse(filePath, text);
    },
  };
}

type RewriteFileInput = {
  cwd: string;
  scopePath: string;
  filePath: string;
  processor: BatchProcessor;
  treeSource: TreeSource;
  severity: string;
  encoding: BufferEncoding;
  dryRun: boolean;
  stats?: RewritePerfStats;
};

async function rewriteFile(input: RewriteFileInput): Promise<ApplyFileResult | null> {
  const readStarted = input.stats ? nowNs() : 0n;
  const originalText = await readFile(input.filePath, input.encoding);
  if (input.stats) {
    input.stats.readNs += nowNs() - readStarted;
  }

  const parseStarted = input.stats ? nowNs() : 0n;
  const tree = input.treeSource.parse(input.filePath, originalText);
  if (input.stats) {
    input.stats.parseNs += nowNs() - parseStarted;
  }

  const processStarted = input.stats ? nowNs() : 0n;
  const results = input.processor.process(tree);
  if (input.stats) {
    input.stats.processNs += nowNs() - processStarted;
  }
  if (results.length === 0) {
    return null;
  }

  const occurrences: ApplyOccurrence[] = results.map((result) => ({
    start: result.match.sourceOffset,
    end: result.match.sourceOffset + result.match.sourceLength,
    line: result.line,
    character: result.character,
    matched: sliceText(tree.text, {
      offset: result.match.sourceOffset,
      length: result.match.sourceLength,
    }),
    replacement: hasReplacement(result) ? result.replacementText : null,
    applied: false,
    description: result.description,
    severity: input.severity,
    pattern: result.rule.sourcePattern.text,
    imports: result.importDirective,
  }));

  const applicable = selectNonOverlappingSpans(
    occurrences.filter(
      (occurrence) => occurrence.replacement !== null && occurrence.replacement !== occurrence.matched,
    ),
  );
  for (const occurrence of applicable) {
    occurrence.applied = true;
  }

  const rewrittenText = applyReplacementSpans(
    originalText,
    applicable.map((occurrence) => ({
      start: occurrence.start,
      end: occurrence.end,
      replacement: occurrence.replacement ?? occurrence.matched,
    })),
  );
  const changed = rewrittenText !== originalText;

  if (changed && !input.dryRun) {
    const writeStarted = input.stats ? nowNs() : 0n;
    await replaceFileIfUnchanged({
      filePath: input.filePath,
      expectedText: originalText,
      text: rewrittenText,
      encoding: input.encoding,
    });
    if (input.stats) {
      input.stats.writeNs += nowNs() - writeStarted;
    }
  }

  const imports = mergeImportDirectives(...applicable.map((occurrence) => occurrence.imports));
  return {
    file: toDisplayFilePath(input),
    matchCount: occurrences.length,
    replacementCount: applicable.length,
    changed,
    byteDelta: changed
      ? Buffer.byteLength(rewrittenText, input.encoding) -
        Buffer.byteLength(originalText, input.encoding)
      : 0,
    occurrences,
    imports: applicable.some((occurrence) => occurrence.imports !== null) ? imports : null,
  };
}

function emptyResult(input: {
  cwd: string;
  scope: string;
  dryRun: boolean;
  filesScanned: number;
}): RewritePhaseResult {
  return {
    ...input,
    skippedRules: 0,
    filesMatched: 0,
    filesChanged: 0,
    totalMatches: 0,
    totalReplacements: 0,
    files: [],
  };
}

function toDisplayFilePath(input: { cwd: string; scopePath: string; filePath: string }): string {
  const relativeToCwd = path.relative(input.cwd, input.filePath);
  if (isRelativeWithinBase(relativeToCwd)) {
    return relativeToCwd.length > 0 ? relativeToCwd : path.basename(input.filePath);
  }

  const relativeToScope = path.relative(input.scopePath, input.filePath);
  if (isRelativeWithinBase(relativeToScope)) {
    return relativeToScope.length > 0 ? relativeToScope : path.basename(input.filePath);
  }

  return input.filePath;
}
