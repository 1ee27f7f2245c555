import type { NodeRole, SyntaxNode } from "../syntax/types.ts";
import type { Binding } from "./types.ts";

const PLACEHOLDER_SOURCE = String.raw`\$[A-Za-z_][A-Za-z0-9_]*\$?`;
const CONSTRAINED_PLACEHOLDER = new RegExp(`(${PLACEHOLDER_SOURCE}):([A-Z][A-Za-z]*)`, "g");

const CONSTRAINT_ALIASES = new Map<string, NodeRole>([
  ["StringLiteral", "string-literal"],
  ["NumberLiteral", "number-literal"],
  ["NumericLiteral", "number-literal"],
  ["Literal", "literal"],
  ["Identifier", "identifier"],
  ["SimpleName", "identifier"],
  ["MethodInvocation", "method-call"],
  ["CallExpression", "method-call"],
  ["ClassInstanceCreation", "constructor-call"],
  ["NewExpression", "constructor-call"],
  ["Expression", "expression"],
  ["Statement", "statement"],
  ["Block", "block"],
]);

const CONCRETE_KIND_SUFFIXES = ["Expression", "Literal", "Statement", "Declaration", "Function"];

export function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_SOURCE, "g");
}

export function isPlaceholderName(text: string): boolean {
  return new RegExp(`^${PLACEHOLDER_SOURCE}$`).test(text);
}

export function isVariadicPlaceholder(name: string): boolean {
  return name.length > 2 && name.endsWith("$");
}

export function placeholdersIn(text: string): Set<string> {
  return new Set(text.match(placeholderPattern()) ?? []);
}

export function isKnownConstraint(constraint: string): boolean {
  return (
    CONSTRAINT_ALIASES.has(constraint) ||
    CONCRETE_KIND_SUFFIXES.some((suffix) => constraint.endsWith(suffix))
  );
}

/**
 * Removes `:Constraint` suffixes from placeholders so the remaining text
 * parses as ordinary source. Unknown constraint words are left untouched,
 * which keeps type annotations such as `$x:Foo` intact.
 */
export function extractConstraints(text: string): {
  text: string;
  constraints: Map<string, string>;
} {
  const constraints = new Map<string, string>();
  const stripped = text.replace(
    CONSTRAINED_PLACEHOLDER,
    (whole: string, name: string, constraint: string) => {
      if (!isKnownConstraint(constraint)) {
        return whole;
      }
      constraints.set(name, constraint);
      return name;
    },
  );
  return { text: stripped, constraints };
}

export function nodeSatisfiesConstraint(node: SyntaxNode, constraint: string): boolean {
  const role = CONSTRAINT_ALIASES.get(constraint);
  if (role) {
    return node.roles.has(role);
  }
  return node.kind === constraint;
}

export function bindingSatisfiesConstraint(binding: Binding, constraint: string): boolean {
  if (binding.kind === "node") {
    return nodeSatisfiesConstraint(binding.node, constraint);
  }
  return binding.nodes.every((node) => nodeSatisfiesConstraint(node, constraint));
}
