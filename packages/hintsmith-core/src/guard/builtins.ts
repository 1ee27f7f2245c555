import { GuardArgumentError } from "../errors.ts";
import { isPlaceholderName, nodeSatisfiesConstraint } from "../pattern/placeholders.ts";
import { MATCHED_NODE_BINDING } from "../pattern/types.ts";
import { hasRole, sliceText, someNode } from "../syntax/tree.ts";
import type { DeclarationFacts, SyntaxNode, TypeFacts } from "../syntax/types.ts";
import { argumentValue, unquote } from "./context.ts";
import { OTHERWISE_GUARD, type GuardContext, type GuardFunction } from "./types.ts";

const PRIMITIVE_WRAPPERS = new Map([
  ["string", "String"],
  ["number", "Number"],
  ["boolean", "Boolean"],
  ["bigint", "BigInt"],
  ["symbol", "Symbol"],
]);

const FINAL_MODIFIERS = new Set(["readonly", "const", "final"]);

function expectArity(name: string, args: readonly string[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    throw new GuardArgumentError(name, `expected ${expected} arguments, got ${args.length}.`);
  }
}

function argumentAt(args: readonly string[], index: number): string {
  return args[index] ?? "";
}

/** Splits `[$x,] rest` calls: the leading placeholder is optional and defaults to `$_`. */
function targetAndRest(args: readonly string[]): { target: string; rest: readonly string[] } {
  const first = args[0];
  if (first !== undefined && isPlaceholderName(first)) {
    return { target: first, rest: args.slice(1) };
  }
  return { target: MATCHED_NODE_BINDING, rest: args };
}

function isBoundAndNonEmpty(context: GuardContext, name: string): boolean {
  const binding = context.binding(name);
  if (!binding) {
    return false;
  }
  return binding.kind === "node" || binding.nodes.length > 0;
}

function literalSetContains(context: GuardContext, args: readonly string[]): boolean {
  const value = unquote(context.text(argumentAt(args, 0)));
  return args.slice(1).some((literal) => argumentValue(literal) === value);
}

function typeIs(facts: TypeFacts, expected: string): boolean {
  const candidates = [facts.name, facts.qualifiedName, ...facts.supertypes];
  const wrapper = PRIMITIVE_WRAPPERS.get(expected);
  return candidates.some(
    (candidate) =>
      candidate === expected ||
      candidate === wrapper ||
      PRIMITIVE_WRAPPERS.get(candidate) === expected,
  );
}

function nodeIsInstanceOf(context: GuardContext, node: SyntaxNode, typeName: string): boolean {
  const facts = context.semantics?.typeOf?.(node);
  if (!facts) {
    return false;
  }
  if (typeName.endsWith("[]")) {
    return facts.elementType !== null && typeIs(facts.elementType, typeName.slice(0, -2));
  }
  return typeIs(facts, typeName);
}

function kindOrRoleIs(node: SyntaxNode, kind: string): boolean {
  const roles: ReadonlySet<string> = node.roles;
  return nodeSatisfiesConstraint(node, kind) || roles.has(kind);
}

/** Dotted numeric comparison; `1.8` < `11` < `17.0.2`. Missing parts count as zero. */
export function compareVersions(left: string, right: string): number {
  const leftParts = left.split(".").map((part) => Number.parseInt(part, 10) || 0);
  const rightParts = right.split(".").map((part) => Number.parseInt(part, 10) || 0);
  const length = Math.max(leftParts.length, rightParts.length);
  for (let index = 0; index < length; index += 1) {
    const difference = (leftParts[index] ?? 0) - (rightParts[index] ?? 0);
    if (difference !== 0) {
      return Math.sign(difference);
    }
  }
  return 0;
}

function declarationGuard(
  name: string,
  test: (declaration: DeclarationFacts, value: string) => boolean,
  options: { enclosing: boolean; extraArgs: number },
): GuardFunction {
  return (context, args) => {
    expectArity(name, args, 1 + options.extraArgs);
    const node = context.node(argumentAt(args, 0));
    if (!node) {
      return false;
    }
    const declaration =
      context.declarationOf(node) ?? (options.enclosing ? context.enclosingDeclaration(node) : null);
    return declaration !== null && test(declaration, argumentValue(argumentAt(args, 1)));
  };
}

function containsGuard(name: string, expected: boolean): GuardFunction {
  return (context, args) => {
    expectArity(name, args, 1, 2);
    const { target, rest } = targetAndRest(args);
    const needle = argumentValue(argumentAt(rest, 0));
    const node = context.node(target) ?? context.match.matchedNode;
    const method = context.enclosingMethod(node);
    const haystack = method ? sliceText(context.tree.text, method) : context.tree.text;
    return haystack.includes(needle) === expected;
  };
}

function versionGuard(
  name: string,
  test: (version: string, args: readonly string[]) => boolean,
  arity: number,
): GuardFunction {
  return (context, args) => {
    expectArity(name, args, arity);
    return context.sourceVersion !== null && test(context.sourceVersion, args.map(argumentValue));
  };
}

export const BUILTIN_GUARDS: ReadonlyMap<string, GuardFunction> = new Map<string, GuardFunction>([
  [
    "instanceof",
    (context, args) => {
      expectArity("instanceof", args, 2);
      const nodes = context.nodes(argumentAt(args, 0));
      const typeName = argumentValue(argumentAt(args, 1));
      return nodes.length > 0 && nodes.every((node) => nodeIsInstanceOf(context, node, typeName));
    },
  ],
  [
    "matchesAny",
    (context, args) => {
      expectArity("matchesAny", args, 1, Number.POSITIVE_INFINITY);
      return args.length === 1
        ? isBoundAndNonEmpty(context, argumentAt(args, 0))
        : literalSetContains(context, args);
    },
  ],
  [
    "matchesNone",
    (context, args) => {
      expectArity("matchesNone", args, 1, Number.POSITIVE_INFINITY);
      return args.length === 1
        ? !isBoundAndNonEmpty(context, argumentAt(args, 0))
        : !literalSetContains(context, args);
    },
  ],
  [
    "referencedIn",
    (context, args) => {
      expectArity("referencedIn", args, 2);
      const variable = context.node(argumentAt(args, 0));
      if (!variable?.token) {
        return false;
      }
      const token = variable.token;
      return context
        .nodes(argumentAt(args, 1))
        .some((scope) =>
          someNode(scope, (node) => node.roles.has("identifier") && node.token === token),
        );
    },
  ],
  [
    "hasNoSideEffect",
    (context, args) => {
      expectArity("hasNoSideEffect", args, 1);
      if (!context.binding(argumentAt(args, 0))) {
        return false;
      }
      return context
        .nodes(argumentAt(args, 0))
        .every((node) => !someNode(node, hasRole("side-effect")));
    },
  ],
  [
    "sourceVersionGE",
    versionGuard(
      "sourceVersionGE",
      (version, [minimum = ""]) => compareVersions(version, minimum) >= 0,
      1,
    ),
  ],
  [
    "sourceVersionLE",
    versionGuard(
      "sourceVersionLE",
      (version, [maximum = ""]) => compareVersions(version, maximum) <= 0,
      1,
    ),
  ],
  [
    "sourceVersionBetween",
    versionGuard(
      "sourceVersionBetween",
      (version, [minimum = "", maximum = ""]) =>
        compareVersions(version, minimum) >= 0 && compareVersions(version, maximum) <= 0,
      2,
    ),
  ],
  [
    "kindMatches",
    (context, args) => {
      expectArity("kindMatches", args, 2);
      const kind = argumentValue(argumentAt(args, 1));
      const nodes = context.nodes(argumentAt(args, 0));
      return nodes.length > 0 && nodes.every((node) => kindOrRoleIs(node, kind));
    },
  ],
  [
    "parentKindMatches",
    (context, args) => {
      expectArity("parentKindMatches", args, 2);
      const parent = context.node(argumentAt(args, 0))?.parent;
      return parent ? kindOrRoleIs(parent, argumentValue(argumentAt(args, 1))) : false;
    },
  ],
  [
    "elementKindMatches",
    declarationGuard("elementKindMatches", (declaration, kind) => declaration.elementKind === kind, {
      enclosing: false,
      extraArgs: 1,
    }),
  ],
  [
    "hasAnnotation",
    declarationGuard(
      "hasAnnotation",
      (declaration, annotation) => declaration.annotations.includes(annotation.replace(/^@/, "")),
      { enclosing: true, extraArgs: 1 },
    ),
  ],
  [
    "isStatic",
    declarationGuard("isStatic", (declaration) => declaration.modifiers.includes("static"), {
      enclosing: true,
      extraArgs: 0,
    }),
  ],
  [
    "isFinal",
    declarationGuard(
      "isFinal",
      (declaration) => declaration.modifiers.some((modifier) => FINAL_MODIFIERS.has(modifier)),
      { enclosing: false, extraArgs: 0 },
    ),
  ],
  [
    "isDeprecated",
    (context, args) => {
      expectArity("isDeprecated", args, 1);
      const node = context.node(argumentAt(args, 0));
      if (!node) {
        return false;
      }
      if (context.semantics?.isDeprecated?.(node)) {
        return true;
      }
      const declaration = context.declarationOf(node) ?? context.enclosingDeclaration(node);
      return declaration?.annotations.some((annotation) => /^deprecated$/i.test(annotation)) ?? false;
    },
  ],
  ["contains", containsGuard("contains", true)],
  ["notContains", containsGuard("notContains", false)],
  [
    "textMatches",
    (context, args) => {
      expectArity("textMatches", args, 2);
      const source = argumentValue(argumentAt(args, 1));
      let pattern: RegExp;
      try {
        pattern = new RegExp(source);
      } catch (error) {
        throw new GuardArgumentError(
          "textMatches",
          `invalid regular expression ${source}: ${String(error)}`,
        );
      }
      const target = argumentAt(args, 0);
      return context.binding(target) !== undefined && pattern.test(context.text(target));
    },
  ],
  [
    "enclosingMethodIs",
    (context, args) => {
      expectArity("enclosingMethodIs", args, 1, 2);
      const { target, rest } = targetAndRest(args);
      const node = context.node(target);
      const method = node ? context.enclosingMethod(node) : null;
      return method?.declaration?.name === argumentValue(argumentAt(rest, 0));
    },
  ],
  [OTHERWISE_GUARD, () => true],
]);
