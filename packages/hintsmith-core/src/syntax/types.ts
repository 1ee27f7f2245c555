import type { PatternKind } from "../pattern/types.ts";

/**
 * Coarse classification of a node, independent of the source language.
 * Pattern kinds and guard functions reason in roles instead of concrete kinds.
 */
export type NodeRole =
  | "expression"
  | "statement"
  | "block"
  | "method-call"
  | "constructor-call"
  | "annotation"
  | "import"
  | "field"
  | "method-declaration"
  | "type-declaration"
  | "identifier"
  | "literal"
  | "string-literal"
  | "number-literal"
  | "side-effect";

/** Declaration category used by `elementKindMatches`. */
export type ElementKind = "FIELD" | "METHOD" | "LOCAL_VARIABLE" | "PARAMETER" | "TYPE" | "FUNCTION";

export type DeclarationFacts = {
  /** Declared name, when the declaration has one. */
  name: string | null;
  elementKind: ElementKind;
  /** Lower-case modifier keywords (`static`, `readonly`, `const`, ...). */
  modifiers: readonly string[];
  /** Decorator names without the leading `@`. */
  annotations: readonly string[];
};

export type SyntaxSlot =
  | { kind: "node"; node: SyntaxNode | null }
  | { kind: "list"; listKind: "statements" | "elements"; nodes: readonly SyntaxNode[] };

/**
 * Uniform view over a parsed tree. Matching only ever looks at `kind`, `token`
 * and `slots()`, so any parser that can produce this shape plugs in.
 */
export interface SyntaxNode {
  /** Concrete node kind name, e.g. `CallExpression`. */
  readonly kind: string;
  readonly roles: ReadonlySet<NodeRole>;
  /**
   * Text that tells apart nodes of the same kind: identifier name, literal
   * text, or operator. `null` when kind and children are enough.
   */
  readonly token: string | null;
  /** Start of the node without leading trivia. */
  readonly offset: number;
  readonly length: number;
  readonly parent: SyntaxNode | null;
  readonly declaration: DeclarationFacts | null;
  slots(): readonly SyntaxSlot[];
}

export type SyntaxTree = {
  fileName: string;
  text: string;
  root: SyntaxNode;
};

/** The node(s) a pattern text parses to, inside the snippet it was wrapped in. */
export type PatternTree = {
  tree: SyntaxTree;
  /** One node for every kind except `STATEMENT_SEQUENCE`. */
  nodes: readonly SyntaxNode[];
};

export type TypeFacts = {
  name: string;
  qualifiedName: string;
  /** Names and qualified names of every base class and implemented interface. */
  supertypes: readonly string[];
  elementType: TypeFacts | null;
};

/** Optional semantic layer. Guards that need it answer `false` when it is absent. */
export type SemanticModel = {
  typeOf?(node: SyntaxNode): TypeFacts | null;
  declarationOf?(node: SyntaxNode): DeclarationFacts | null;
  isDeprecated?(node: SyntaxNode): boolean;
};

/** Parser collaborator used for both source files and pattern text. */
export interface SyntaxLanguage {
  readonly name: string;
  parse(fileName: string, text: string): SyntaxTree;
  /** Throws `PatternCompileError` when `text` does not parse as `kind`. */
  parsePattern(text: string, kind: PatternKind): PatternTree;
  /** Placeholder spelled by `node` (including `$` markers), or `null`. */
  placeholderName(node: SyntaxNode): string | null;
}
