import { describe, expect, test } from "vitest";
import {
  GuardArgumentError,
  GuardRegistrationError,
  GuardSyntaxError,
  UnknownGuardFunctionError,
  compareVersions,
  compilePattern,
  createGuardContext,
  createGuardRegistry,
  createPattern,
  evaluateGuard,
  findMatches,
  formatGuardExpression,
  guardAnd,
  guardCall,
  guardNot,
  guardOr,
  inferPatternKind,
  parseGuardExpression,
  parseTypeScript,
  typescriptLanguage,
  type GuardContext,
  type GuardFunction,
  type PatternKind,
  type SemanticModel,
  type TypeFacts,
} from "../src/index.ts";

type ContextOptions = {
  kind?: PatternKind;
  sourceVersion?: string | null;
  semantics?: SemanticModel | null;
};

function contextsFor(source: string, patternText: string, options: ContextOptions = {}): GuardContext[] {
  const tree = parseTypeScript("sample.ts", source);
  const compiled = compilePattern(
    createPattern(patternText, options.kind ?? inferPatternKind(patternText)),
    typescriptLanguage,
  );
  return findMatches(tree, compiled).map((match) =>
    createGuardContext({
      match,
      tree,
      sourceVersion: options.sourceVersion,
      semantics: options.semantics,
    }),
  );
}

const builtins = createGuardRegistry().resolver;

function check(guard: string, contexts: readonly GuardContext[]): boolean[] {
  const expression = parseGuardExpression(guard);
  return contexts.map((context) => evaluateGuard(expression, context, builtins));
}

describe("parseGuardExpression", () => {
  test("|| binds looser than &&, which binds looser than !", () => {
    expect(parseGuardExpression("a() || b() && !c()")).toEqual(
      guardOr(guardCall("a"), guardAnd(guardCall("b"), guardNot(guardCall("c")))),
    );
  });

  test("parentheses group", () => {
    const expression = parseGuardExpression("(a || b) && c");

    expect(expression).toEqual(guardAnd(guardOr(guardCall("a"), guardCall("b")), guardCall("c")));
    expect(formatGuardExpression(expression)).toBe("(a || b) && c");
  });

  test("arguments are kept as written", () => {
    expect(parseGuardExpression('matchesAny($x, "a, b", 2016, java.util.List)')).toEqual(
      guardCall("matchesAny", ["$x", '"a, b"', "2016", "java.util.List"]),
    );
  });

  test("instanceof and bare placeholders are sugar for calls", () => {
    expect(parseGuardExpression("$x instanceof java.util.List[]")).toEqual(
      guardCall("instanceof", ["$x", "java.util.List[]"]),
    );
    expect(parseGuardExpression("!$rest$")).toEqual(guardNot(guardCall("matchesAny", ["$rest$"])));
  });

  test("reports the column of a syntax error", () => {
    let caught: unknown;
    try {
      parseGuardExpression("a() &&");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GuardSyntaxError);
    expect(caught instanceof GuardSyntaxError ? caught.column : -1).toBe(7);
    expect(caught instanceof GuardSyntaxError ? caught.message : "").toMatch(/ at column 7\.$/);
  });
});

describe("evaluateGuard", () => {
  const [context] = contextsFor("f(1);\n", "f($x)");
  const resolver = (name: string): GuardFunction | undefined => {
    if (name === "yes") return () => true;
    if (name === "no") return () => false;
    return undefined;
  };

  test("short-circuits && and ||", () => {
    if (!context) throw new Error("expected a match");

    expect(evaluateGuard(parseGuardExpression("yes() || missing()"), context, resolver)).toBe(true);
    expect(evaluateGuard(parseGuardExpression("no() && missing()"), context, resolver)).toBe(false);
    expect(evaluateGuard(parseGuardExpression("!no() && yes()"), context, resolver)).toBe(true);
  });

  test("an unknown function name fails at evaluation time", () => {
    if (!context) throw new Error("expected a match");

    expect(() => evaluateGuard(parseGuardExpression("missing()"), context, resolver)).toThrow(
      UnknownGuardFunctionError,
    );
    expect(() => evaluateGuard(parseGuardExpression("missing()"), context, resolver)).toThrow(
      'Unknown guard function "missing".',
    );
  });
});

describe("GuardRegistry", () => {
  const alwaysTrue: GuardFunction = () => true;

  test("starts with the built-in functions", () => {
    const registry = createGuardRegistry();

    expect(registry.has("sourceVersionGE")).toBe(true);
    expect(registry.has("otherwise")).toBe(true);
    expect(createGuardRegistry({ builtins: false }).names()).toEqual([]);
  });

  test("rejects a second registration by default", () => {
    const registry = createGuardRegistry().register("isTest", alwaysTrue);

    expect(() => registry.register("isTest", alwaysTrue)).toThrow(GuardRegistrationError);
    expect(() => registry.register("isStatic", alwaysTrue)).toThrow(
      'Guard function "isStatic" is already registered.',
    );
  });

  test("replaces an existing function under the override policy", () => {
    const registry = createGuardRegistry({ onConflict: "override" });
    registry.register("isStatic", alwaysTrue);

    expect(registry.get("isStatic")).toBe(alwaysTrue);
    expect(registry.resolver("isStatic")).toBe(alwaysTrue);
  });

  test("registries do not share functions", () => {
    const first = createGuardRegistry({ builtins: false }).register("isTest", alwaysTrue);
    const second = createGuardRegistry({ builtins: false });

    expect(first.names()).toEqual(["isTest"]);
    expect(second.resolver("isTest")).toBeUndefined();
    expect(first.unregister("isTest")).toBe(true);
    expect(first.has("isTest")).toBe(false);
  });
});

describe("built-in guards", () => {
  test("compareVersions compares dotted numbers", () => {
    expect(compareVersions("1.8", "11")).toBe(-1);
    expect(compareVersions("17.0.2", "17")).toBe(1);
    expect(compareVersions("2016", "2016.0")).toBe(0);
  });

  test("version guards compare against the declared source version", () => {
    const contexts = contextsFor("f(1);\n", "f($x)", { sourceVersion: "2016" });

    expect(check("sourceVersionGE(2015)", contexts)).toEqual([true]);
    expect(check("sourceVersionGE(2017)", contexts)).toEqual([false]);
    expect(check("sourceVersionLE(2016)", contexts)).toEqual([true]);
    expect(check("sourceVersionBetween(2015, 2016)", contexts)).toEqual([true]);
  });

  test("version guards are false without a source version", () => {
    const contexts = contextsFor("f(1);\n", "f($x)");

    expect(check("sourceVersionGE(1)", contexts)).toEqual([false]);
    expect(check("sourceVersionLE(9999)", contexts)).toEqual([false]);
  });

  test("matchesAny compares bound text with literals", () => {
    const contexts = contextsFor('pick("a");\npick("c");\n', "pick($x)");

    expect(check('matchesAny($x, "a", "b")', contexts)).toEqual([true, false]);
    expect(check('matchesNone($x, "a", "b")', contexts)).toEqual([false, true]);
  });

  test("a bare variadic placeholder is true when its run is not empty", () => {
    const contexts = contextsFor("call(1);\ncall(1, 2);\n", "call($first, $rest$)");

    expect(check("$rest$", contexts)).toEqual([false, true]);
    expect(check("matchesNone($rest$)", contexts)).toEqual([true, false]);
  });

  test("referencedIn looks for the variable inside another binding", () => {
    const source = [
      "function f() { let n = 1; use(n); }",
      "function g() { let m = 1; other(); }",
      "",
    ].join("\n");
    const contexts = contextsFor(source, "{ let $v = $init; $body$; }");

    expect(check("referencedIn($v, $body$)", contexts)).toEqual([true, false]);
  });

  test("hasNoSideEffect rejects calls and assignments", () => {
    const contexts = contextsFor("f(a + b);\nf(g());\nf(x = 1);\n", "f($x)");

    expect(check("hasNoSideEffect($x)", contexts)).toEqual([true, false, false]);
  });

  test("kind guards accept concrete kinds and roles", () => {
    const contexts = contextsFor("f(a + b);\nf(1);\n", "f($x)");

    expect(check("kindMatches($x, BinaryExpression)", contexts)).toEqual([true, false]);
    expect(check("kindMatches($x, Literal)", contexts)).toEqual([false, true]);
    expect(check("parentKindMatches($x, CallExpression)", contexts)).toEqual([true, true]);
  });

  test("textMatches tests the bound source text", () => {
    const contexts = contextsFor("f(a + b);\nf(1);\n", "f($x)");

    expect(check('textMatches($x, "^a [+]")', contexts)).toEqual([true, false]);
    expect(() => check('textMatches($x, "(")', contexts)).toThrow(GuardArgumentError);
  });

  test("a wrong argument count is a guard argument error", () => {
    const contexts = contextsFor("f(1);\n", "f($x)");

    expect(() => check("kindMatches($x)", contexts)).toThrow(
      "kindMatches: expected 2 arguments, got 1.",
    );
  });

  test("contains searches the enclosing function", () => {
    const source = [
      'function withLog() { log("needle"); f(1); }',
      "function without() { f(2); }",
      "",
    ].join("\n");
    const contexts = contextsFor(source, "f($x)");

    expect(check('contains("needle")', contexts)).toEqual([true, false]);
    expect(check('notContains("needle")', contexts)).toEqual([false, true]);
    expect(check('enclosingMethodIs("without")', contexts)).toEqual([false, true]);
  });

  test("declaration guards read modifiers of the declared name", () => {
    const source = ["class Config {", "  static readonly limit = 10;", "  size = 2;", "}", ""].join(
      "\n",
    );
    const constant = contextsFor(source, "static readonly $name = $value;", { kind: "FIELD" });
    const plain = contextsFor(source, "$name = $value;", { kind: "FIELD" });

    expect(check("isStatic($name) && isFinal($name)", constant)).toEqual([true]);
    expect(check("isStatic($name) || isFinal($name)", plain)).toEqual([false]);
    expect(check("elementKindMatches($name, FIELD)", [...constant, ...plain])).toEqual([true, true]);
  });

  test("annotation guards fall back to the enclosing declaration", () => {
    const source = [
      "class Cache {",
      "  @Memo size() { return compute(1); }",
      "  @Deprecated old() { return compute(2); }",
      "}",
      "",
    ].join("\n");
    const contexts = contextsFor(source, "compute($x)");

    expect(check('hasAnnotation($_, "@Memo")', contexts)).toEqual([true, false]);
    expect(check("isDeprecated($_)", contexts)).toEqual([false, true]);
    expect(check("isStatic($_)", contexts)).toEqual([false, false]);
  });

  test("instanceof asks the semantic model", () => {
    const stringFacts: TypeFacts = {
      name: "string",
      qualifiedName: "string",
      supertypes: [],
      elementType: null,
    };
    const semantics: SemanticModel = {
      typeOf(node) {
        if (node.token === "label") return stringFacts;
        if (node.token === "names") {
          return { name: "Array", qualifiedName: "Array", supertypes: [], elementType: stringFacts };
        }
        return null;
      },
    };
    const source = "use(label);\nuse(names);\nuse(other);\n";
    const contexts = contextsFor(source, "use($x)", { semantics });

    expect(check("$x instanceof String", contexts)).toEqual([true, false, false]);
    expect(check("$x instanceof string[]", contexts)).toEqual([false, true, false]);
    expect(check("$x instanceof String", contextsFor(source, "use($x)"))).toEqual([
      false,
      false,
      false,
    ]);
  });

  test("otherwise is always true", () => {
    expect(check("otherwise", contextsFor("f(1);\n", "f($x)"))).toEqual([true]);
  });
});
