import type {
  GuardFunctionResolver,
  HintsmithError,
  ImportDirective,
  Match,
  SemanticModel,
  SyntaxLanguage,
  SyntaxTree,
  TransformationRule,
} from "@hintsmith/core";

export { DEFAULT_EXCLUDED_DIRECTORIES, DEFAULT_SOURCE_EXTENSIONS } from "@hintsmith/core";

export const DEFAULT_CONCURRENCY = 8;

export type GuardErrorInfo = {
  rule: TransformationRule;
  match: Match;
  tree: SyntaxTree;
};

export type ProcessOptions = {
  /** Guard functions; defaults to a registry holding the built-ins. */
  guards?: GuardFunctionResolver;
  /** Parser for patterns; defaults to `typescriptLanguage`. */
  language?: SyntaxLanguage;
  /** Declared source version; `null` makes version guards answer `false`. */
  sourceVersion?: string | null;
  semantics?: SemanticModel | null;
  /** Polled before every rule. */
  isCancelled?: () => boolean;
  /** Add fully qualified names found in replacement text to the imports. Defaults to `true`. */
  detectImports?: boolean;
  /** Called when a guard or a replacement fails; the occurrence is skipped and processing continues. */
  onGuardError?: (error: HintsmithError, info: GuardErrorInfo) => void;
  verbose?: number;
  logger?: (line: string) => void;
};

export type TransformationResult = {
  readonly rule: TransformationRule;
  readonly match: Match;
  /** `null` for hint-only rules and when no alternative applied. */
  readonly replacementText: string | null;
  readonly importDirective: ImportDirective | null;
  readonly description: string | null;
  /** One-based position of the match start. */
  readonly line: number;
  readonly character: number;
};

export type ApplyOptions = Omit<ProcessOptions, "semantics" | "language" | "isCancelled"> & {
  scope?: string;
  cwd?: string;
  dryRun?: boolean;
  extensions?: readonly string[];
  excludedDirectories?: readonly string[];
  encoding?: BufferEncoding;
  concurrency?: number;
  /** Build a `ts.Program` over the scanned files so type guards can answer. */
  semantic?: boolean;
};

export type ApplyOccurrence = {
  start: number;
  end: number;
  line: number;
  character: number;
  matched: string;
  /** `null` when the rule only reports. */
  replacement: string | null;
  /** Whether the replacement was written (or would be, in a dry run). */
  applied: boolean;
  description: string | null;
  severity: string;
  pattern: string;
  imports: ImportDirective | null;
};

export type ApplyFileResult = {
  file: string;
  matchCount: number;
  replacementCount: number;
  changed: boolean;
  byteDelta: number;
  occurrences: ApplyOccurrence[];
  imports: ImportDirective | null;
};

export type ApplyResult = {
  dryRun: boolean;
  scope: string;
  hints: string;
  ruleCount: number;
  skippedRules: number;
  filesScanned: number;
  filesMatched: number;
  filesChanged: number;
  totalMatches: number;
  totalReplacements: number;
  elapsedMs: number;
  files: ApplyFileResult[];
};
