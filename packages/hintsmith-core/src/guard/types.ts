import type { Binding, Match } from "../pattern/types.ts";
import type { DeclarationFacts, SemanticModel, SyntaxNode, SyntaxTree } from "../syntax/types.ts";

export type GuardExpression =
  | { readonly kind: "call"; readonly name: string; readonly args: readonly string[] }
  | { readonly kind: "and"; readonly left: GuardExpression; readonly right: GuardExpression }
  | { readonly kind: "or"; readonly left: GuardExpression; readonly right: GuardExpression }
  | { readonly kind: "not"; readonly operand: GuardExpression };

/** What a guard function can see about the occurrence under evaluation. */
export type GuardContext = {
  readonly match: Match;
  readonly tree: SyntaxTree;
  /** Declared source version; `null` makes every version guard answer `false`. */
  readonly sourceVersion: string | null;
  readonly semantics: SemanticModel | null;
  binding(name: string): Binding | undefined;
  /** Node bound to a scalar placeholder argument, or `null`. */
  node(argument: string): SyntaxNode | null;
  /** Nodes bound to a placeholder argument: one for scalars, the run for variadics. */
  nodes(argument: string): readonly SyntaxNode[];
  /** Source text bound to a placeholder argument, or the argument's literal value. */
  text(argument: string): string;
  /** Declaration of `node` itself or of what it refers to. */
  declarationOf(node: SyntaxNode): DeclarationFacts | null;
  /** Innermost declaration around `node`, excluding `node` itself. */
  enclosingDeclaration(node: SyntaxNode): DeclarationFacts | null;
  /** Innermost method or function around `node`. */
  enclosingMethod(node: SyntaxNode): SyntaxNode | null;
};

export type GuardFunction = (context: GuardContext, args: readonly string[]) => boolean;

export type GuardFunctionResolver = (name: string) => GuardFunction | undefined;

export function guardCall(name: string, args: readonly string[] = []): GuardExpression {
  return Object.freeze({ kind: "call", name, args: Object.freeze([...args]) });
}

export function guardAnd(left: GuardExpression, right: GuardExpression): GuardExpression {
  return Object.freeze({ kind: "and", left, right });
}

export function guardOr(left: GuardExpression, right: GuardExpression): GuardExpression {
  return Object.freeze({ kind: "or", left, right });
}

export function guardNot(operand: GuardExpression): GuardExpression {
  return Object.freeze({ kind: "not", operand });
}

export const OTHERWISE_GUARD = "otherwise";

export function formatGuardExpression(expression: GuardExpression): string {
  switch (expression.kind) {
    case "call":
      return expression.args.length === 0
        ? expression.name
        : `${expression.name}(${expression.args.join(", ")})`;
    case "and":
      return `${formatOperand(expression.left, "and")} && ${formatOperand(expression.right, "and")}`;
    case "or":
      return `${formatGuardExpression(expression.left)} || ${formatGuardExpression(expression.right)}`;
    case "not":
      return `!${formatOperand(expression.operand, "not")}`;
  }
}

function formatOperand(expression: GuardExpression, parent: "and" | "not"): string {
  const needsParens =
    expression.kind === "or" || (parent === "not" && expression.kind === "and");
  const formatted = formatGuardExpression(expression);
  return needsParens ? `(${formatted})` : formatted;
}
