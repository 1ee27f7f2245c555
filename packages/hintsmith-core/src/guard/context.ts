import { isPlaceholderName } from "../pattern/placeholders.ts";
import type { Match } from "../pattern/types.ts";
import { findAncestor, sliceText } from "../syntax/tree.ts";
import type { DeclarationFacts, SemanticModel, SyntaxNode, SyntaxTree } from "../syntax/types.ts";
import type { GuardContext } from "./types.ts";

export type CreateGuardContextInput = {
  match: Match;
  tree: SyntaxTree;
  sourceVersion?: string | null;
  semantics?: SemanticModel | null;
};

export function createGuardContext(input: CreateGuardContextInput): GuardContext {
  const { match, tree } = input;
  const semantics = input.semantics ?? null;

  const context: GuardContext = {
    match,
    tree,
    sourceVersion: input.sourceVersion ?? null,
    semantics,
    binding: (name) => match.bindings.get(name),
    node(argument) {
      const binding = match.bindings.get(argument);
      return binding?.kind === "node" ? binding.node : null;
    },
    nodes(argument) {
      const binding = match.bindings.get(argument);
      if (!binding) {
        return [];
      }
      return binding.kind === "node" ? [binding.node] : binding.nodes;
    },
    text(argument) {
      if (!isPlaceholderName(argument)) {
        return argumentValue(argument);
      }
      const binding = match.bindings.get(argument);
      return binding ? sliceText(tree.text, binding) : "";
    },
    declarationOf: (node) =>
      node.declaration ?? semantics?.declarationOf?.(node) ?? ownerDeclaration(node),
    enclosingDeclaration: (node) =>
      findAncestor(node, (ancestor) => ancestor.declaration !== null)?.declaration ?? null,
    enclosingMethod: (node) =>
      findAncestor(node, (ancestor) => {
        const kind = ancestor.declaration?.elementKind;
        return kind === "METHOD" || kind === "FUNCTION";
      }),
  };
  return context;
}

// An identifier naming a declaration stands for that declaration.
function ownerDeclaration(node: SyntaxNode): DeclarationFacts | null {
  const parentDeclaration = node.parent?.declaration;
  if (parentDeclaration && node.token !== null && parentDeclaration.name === node.token) {
    return parentDeclaration;
  }
  return null;
}

/** Literal value of a guard argument: quotes removed and escapes resolved for strings. */
export function argumentValue(argument: string): string {
  if (argument.length >= 2 && argument.startsWith('"') && argument.endsWith('"')) {
    return argument.slice(1, -1).replace(/\\(.)/g, "$1");
  }
  return argument;
}

/** Removes one pair of matching quotes from source text such as a string literal. */
export function unquote(text: string): string {
  const first = text[0];
  if (text.length >= 2 && (first === '"' || first === "'" || first === "`") && text.endsWith(first)) {
    return text.slice(1, -1);
  }
  return text;
}
