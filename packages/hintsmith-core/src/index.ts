export {
  GuardArgumentError,
  GuardRegistrationError,
  GuardSyntaxError,
  HintsmithError,
  PatternCompileError,
  ProcessingCancelledError,
  TemplateRenderError,
  UnknownGuardFunctionError,
} from "./errors.ts";

export {
  AUTO_BINDINGS,
  ENCLOSING_TYPE_BINDING,
  MATCHED_NODE_BINDING,
  PATTERN_KINDS,
  createPattern,
  patternEquals,
} from "./pattern/types.ts";
export type {
  Binding,
  Bindings,
  CompiledPattern,
  Match,
  Pattern,
  PatternKind,
} from "./pattern/types.ts";
export { compilePattern } from "./pattern/compile.ts";
export { inferPatternKind } from "./pattern/kind.ts";
export { findMatches, matchPattern } from "./pattern/match.ts";
export {
  extractConstraints,
  isPlaceholderName,
  isVariadicPlaceholder,
  placeholdersIn,
} from "./pattern/placeholders.ts";
export {
  compileReplacement,
  renderCompiledReplacement,
  renderReplacement,
} from "./pattern/render.ts";
export type { CompiledReplacement, TemplateToken } from "./pattern/render.ts";

export {
  OTHERWISE_GUARD,
  formatGuardExpression,
  guardAnd,
  guardCall,
  guardNot,
  guardOr,
} from "./guard/types.ts";
export type {
  GuardContext,
  GuardExpression,
  GuardFunction,
  GuardFunctionResolver,
} from "./guard/types.ts";
export { parseGuardExpression } from "./guard/parse.ts";
export { evaluateGuard } from "./guard/evaluate.ts";
export { createGuardContext } from "./guard/context.ts";
export type { CreateGuardContextInput } from "./guard/context.ts";
export { BUILTIN_GUARDS, compareVersions } from "./guard/builtins.ts";
export { GuardRegistry, createGuardRegistry } from "./guard/registry.ts";
export type { GuardConflictPolicy, GuardRegistryOptions } from "./guard/registry.ts";

export {
  EMPTY_IMPORT_DIRECTIVE,
  createImportDirective,
  detectImports,
  isEmptyImportDirective,
  mergeImportDirectives,
} from "./rules/imports.ts";
export type { ImportDirective, ImportDirectiveInput } from "./rules/imports.ts";
export {
  createRewriteAlternative,
  createTransformationRule,
  findMatchingAlternative,
  isHintOnly,
} from "./rules/rule.ts";
export type {
  RewriteAlternative,
  RewriteAlternativeInput,
  TransformationRule,
  TransformationRuleInput,
} from "./rules/rule.ts";

export {
  childNodes,
  findAncestor,
  hasRole,
  nodeListsEqual,
  sliceText,
  someNode,
  structurallyEqual,
  walkTree,
} from "./syntax/tree.ts";
export type {
  DeclarationFacts,
  ElementKind,
  NodeRole,
  PatternTree,
  SemanticModel,
  SyntaxLanguage,
  SyntaxNode,
  SyntaxSlot,
  SyntaxTree,
  TypeFacts,
} from "./syntax/types.ts";
export {
  TypeScriptSyntaxNode,
  parseTypeScript,
  parseTypeScriptPattern,
  placeholderNameOf,
  syntaxKindName,
  toTypeScriptNode,
  typescriptLanguage,
} from "./syntax/typescript.ts";
export type { ParseTypeScriptOptions } from "./syntax/typescript.ts";
export {
  DEFAULT_PROGRAM_OPTIONS,
  createCheckerSemanticModel,
  createTypeScriptProject,
} from "./syntax/typescript-program.ts";
export type { TypeScriptProject } from "./syntax/typescript-program.ts";

export { mapLimit } from "./common/async.ts";
export type { MapLimitOptions } from "./common/async.ts";
export {
  DEFAULT_EXCLUDED_DIRECTORIES,
  DEFAULT_SOURCE_EXTENSIONS,
  collectSourceFiles,
} from "./common/files.ts";
export type { CollectSourceFilesOptions } from "./common/files.ts";
export {
  assertWithinWorkspace,
  findNearestGitRepoRoot,
  isErrorWithCode,
  isPathWithinBase,
  isRelativeWithinBase,
  resolveTextInput,
} from "./common/input.ts";
export type { ResolveTextInputOptions, ResolvedTextInput } from "./common/input.ts";
export { findClosingBracket, findTopLevel, forEachCodeChar } from "./common/scan.ts";
export type { CodeCharVisitor } from "./common/scan.ts";
export { createLineStarts, toLineCharacter } from "./common/text.ts";
export { formatMs, nowNs, nsToMs } from "./common/trace.ts";
