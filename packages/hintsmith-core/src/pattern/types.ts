import type { PatternTree, SyntaxLanguage, SyntaxNode } from "../syntax/types.ts";

export const PATTERN_KINDS = [
  "EXPRESSION",
  "STATEMENT",
  "BLOCK",
  "STATEMENT_SEQUENCE",
  "METHOD_CALL",
  "CONSTRUCTOR",
  "ANNOTATION",
  "IMPORT",
  "FIELD",
  "METHOD_DECLARATION",
] as const;

export type PatternKind = (typeof PATTERN_KINDS)[number];

export type Pattern = {
  readonly text: string;
  readonly kind: PatternKind;
  readonly id?: string;
  readonly displayName?: string;
};

export function createPattern(
  text: string,
  kind: PatternKind,
  details: { id?: string; displayName?: string } = {},
): Pattern {
  return Object.freeze({ text, kind, ...details });
}

/** Patterns are equal when text and kind are; id and display name are labels. */
export function patternEquals(left: Pattern, right: Pattern): boolean {
  return left.text === right.text && left.kind === right.kind;
}

export type Binding =
  | { kind: "node"; node: SyntaxNode; offset: number; length: number }
  | { kind: "list"; nodes: readonly SyntaxNode[]; offset: number; length: number };

export type Bindings = ReadonlyMap<string, Binding>;

export type Match = {
  /** Root of the match; the first statement for statement sequences. */
  matchedNode: SyntaxNode;
  /** Every top-level node covered by the match, in source order. */
  matchedNodes: readonly SyntaxNode[];
  bindings: Bindings;
  sourceOffset: number;
  sourceLength: number;
};

export type CompiledPattern = {
  pattern: Pattern;
  language: SyntaxLanguage;
  tree: PatternTree;
  /** Type constraints keyed by placeholder name (`$x`, `$xs$`). */
  constraints: ReadonlyMap<string, string>;
  placeholders: ReadonlySet<string>;
};

/** Bound automatically by every match: the matched node itself. */
export const MATCHED_NODE_BINDING = "$_";
/** Bound automatically when the match sits inside a type declaration. */
export const ENCLOSING_TYPE_BINDING = "$this";

export const AUTO_BINDINGS: ReadonlySet<string> = new Set([
  MATCHED_NODE_BINDING,
  ENCLOSING_TYPE_BINDING,
]);
