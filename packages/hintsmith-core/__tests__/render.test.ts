import { expect, test } from "vitest";
import {
  TemplateRenderError,
  compilePattern,
  compileReplacement,
  createPattern,
  findMatches,
  inferPatternKind,
  parseTypeScript,
  renderReplacement,
  typescriptLanguage,
  type Bindings,
} from "../src/index.ts";

function bindingsFor(source: string, patternText: string): Bindings {
  const tree = parseTypeScript("sample.ts", source);
  const compiled = compilePattern(
    createPattern(patternText, inferPatternKind(patternText)),
    typescriptLanguage,
  );
  const [match] = findMatches(tree, compiled);
  if (!match) {
    throw new Error(`no match for ${patternText}`);
  }
  return match.bindings;
}

test("pastes the original source text of each binding", () => {
  const source = "items.indexOf( needle ) !== -1;\n";
  const bindings = bindingsFor(source, "$xs.indexOf($x) !== -1");

  expect(renderReplacement("$xs.includes($x)", bindings, source)).toBe("items.includes(needle)");
});

test("a variadic binding pastes everything from its first to its last item", () => {
  const source = "call(1, /* two */ 2, 3);\n";
  const bindings = bindingsFor(source, "call($first, $rest$)");

  expect(renderReplacement("next($rest$, $first)", bindings, source)).toBe("next(2, 3, 1)");
});

test("an empty variadic binding drops the separator after it", () => {
  const source = "call(1);\n";
  const bindings = bindingsFor(source, "call($first, $rest$)");

  expect(renderReplacement("next($rest$, $first)", bindings, source)).toBe("next(1)");
});

test("an empty variadic binding drops a dangling comma before a closing bracket", () => {
  const source = "call(1);\n";
  const bindings = bindingsFor(source, "call($first, $rest$)");

  expect(renderReplacement("next($first, $rest$)", bindings, source)).toBe("next(1)");
});

test("a semicolon after pasted statements is not doubled", () => {
  const source = "function g() { log(); return 6; }\n";
  const bindings = bindingsFor(source, "{ $before$; return $x; }");

  expect(renderReplacement("{ $before$; cleanup(); return $x; }", bindings, source)).toBe(
    "{ log(); cleanup(); return 6; }",
  );
});

test("empty statements vanish together with their semicolon", () => {
  const source = "function f() { return 5; }\n";
  const bindings = bindingsFor(source, "{ $before$; return $x; }");

  expect(renderReplacement("{ $before$; cleanup(); return $x; }", bindings, source)).toBe(
    "{ cleanup(); return 5; }",
  );
});

test("constraints in the template are ignored", () => {
  expect(compileReplacement("Math.sqrt($x:Identifier)").tokens).toEqual([
    { kind: "text", value: "Math.sqrt(" },
    { kind: "placeholder", name: "$x" },
    { kind: "text", value: ")" },
  ]);
});

test("unknown placeholders throw", () => {
  expect(() => renderReplacement("f($missing)", new Map<string, never>(), "")).toThrow(TemplateRenderError);
});
